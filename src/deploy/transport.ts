/**
 * 部署传输抽象 — 按 DeployTarget.transport 选择实现
 */

import type { DeployTarget, TransferResult, TransportKind } from "../types/index.js";
import type { ArtifactSet } from "./artifacts.js";

export interface DeploymentTransport {
  readonly kind: TransportKind;
  /**
   * 不抛出：连接、传输、远端命令的失败都体现在 TransferResult 中。
   * signal 中止后应尽快停止传输并返回。
   */
  deploy(
    artifacts: ArtifactSet,
    target: DeployTarget,
    log: (chunk: string) => void,
    signal?: AbortSignal,
  ): Promise<TransferResult>;
}

export type TransportSet = Record<TransportKind, DeploymentTransport>;

/** 传输失败的结果 */
export function failedTransfer(target: DeployTarget, error: string, transferred = false): TransferResult {
  return { target: target.name, host: target.host, transferred, files: 0, error };
}

/** 中止原因的文字描述 */
export function abortMessage(signal: AbortSignal): string {
  return signal.reason instanceof Error ? `aborted: ${signal.reason.message}` : "aborted";
}
