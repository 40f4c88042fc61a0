/**
 * 错误分类
 *
 * UnauthorizedError / MalformedPayloadError 在 webhook 入口被拒绝，不产生构建；
 * PreconditionError 表示基础设施前置条件失败（检出、凭据、传输不可达），构建记为 errored。
 */

export type PipelineErrorCode = "UNAUTHORIZED" | "MALFORMED_PAYLOAD" | "ERRORED" | "CONFIG_ERROR";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

export class UnauthorizedError extends PipelineError {
  constructor(message = "Webhook signature verification failed") {
    super(message, "UNAUTHORIZED");
    this.name = "UnauthorizedError";
  }
}

export class MalformedPayloadError extends PipelineError {
  constructor(
    message: string,
    public readonly missing: string[] = [],
  ) {
    super(message, "MALFORMED_PAYLOAD");
    this.name = "MalformedPayloadError";
  }
}

export class PreconditionError extends PipelineError {
  constructor(message: string) {
    super(message, "ERRORED");
    this.name = "PreconditionError";
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
  }
}

/** 提取错误消息 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
