/**
 * 通知渠道接口 — 定义通用通知消息结构与渠道抽象
 */

import type { BuildState, EventSource, StageResult } from "../types/index.js";

/** 通知消息，每个终态构建恰好投递一次 */
export interface NotificationMessage {
  buildId: number;
  jobId: string;
  finalState: BuildState;
  stageResults: StageResult[];
  durationMs: number;
  source: EventSource;
  repositoryId: string;
  ref: string;
  commitSha: string;
  /** post 阶段失败、部分部署失败等需要额外提示的情况 */
  warnings: string[];
  error?: string;
  timestamp: string;
}

/** 通知渠道抽象 */
export interface NotificationChannel {
  readonly name: string;
  send(message: NotificationMessage): Promise<void>;
}

/** 构建结果的一行摘要 */
export function summarize(message: NotificationMessage): string {
  const stages = message.stageResults.map((s) => `${s.stage}:${s.status}`).join(" ");
  return `Build #${message.buildId} (${message.jobId}) ${message.finalState} in ${Math.round(message.durationMs / 1000)}s | ${stages}`;
}
