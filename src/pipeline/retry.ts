/**
 * 外围操作重试（通知投递等）— 指数退避 + 抖动
 *
 * 构建本身从不自动重试，重新运行即新的触发。
 */

import { createLogger } from "../logger.js";

const logger = createLogger("retry");

export interface BackoffOptions {
  baseDelay?: number;
  maxDelay?: number;
}

export interface RetryOptions extends BackoffOptions {
  /** 首次尝试之后的最大重试次数 */
  maxRetries: number;
  /** 返回 false 时立即放弃 */
  retryIf?: (err: Error) => boolean;
  /** 日志中的操作名 */
  label?: string;
}

const DEFAULT_BASE_DELAY = 1_000;
const DEFAULT_MAX_DELAY = 30_000;

/** 第 attempt 次重试前的等待：base·2^attempt 封顶后，再加至多 10% 抖动 */
export function getRetryDelay(attempt: number, options: BackoffOptions = {}): number {
  const capped = Math.min(
    (options.baseDelay ?? DEFAULT_BASE_DELAY) * 2 ** attempt,
    options.maxDelay ?? DEFAULT_MAX_DELAY,
  );
  return capped + capped * 0.1 * Math.random();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** 执行 fn，失败时按退避策略重试；耗尽或不可重试时抛出最后一个错误 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const error = toError(err);
      const retryable = options.retryIf?.(error) ?? true;
      if (!retryable || attempt >= options.maxRetries) {
        throw error;
      }
      const delay = getRetryDelay(attempt, options);
      logger.warn(
        { op: options.label, attempt: attempt + 1, delayMs: Math.round(delay), err: error.message },
        "Operation failed, retrying",
      );
      await sleep(delay);
    }
  }
}
