/**
 * 构建相关类型定义
 */

import type { TriggerEvent } from "./events.js";
import type { StageKind } from "./job.js";

/** 构建状态 */
export type BuildState = "queued" | "running" | "succeeded" | "failed" | "errored" | "cancelled";

/** 终态 */
export const TERMINAL_STATES: readonly BuildState[] = ["succeeded", "failed", "errored", "cancelled"];

/** 阶段状态 */
export type StageStatus = "passed" | "failed" | "skipped";

/** 阶段结束原因 */
export type ExitReason = "ok" | "exit" | "timeout" | "infrastructure" | "deploy" | "not_run";

export interface ExitDetail {
  reason: ExitReason;
  exitCode?: number;
  message?: string;
}

/** 单个部署目标的传输结果 */
export interface TransferResult {
  target: string;
  host: string;
  transferred: boolean;
  /** 未配置 postCommand 时不出现 */
  postCommandOk?: boolean;
  files: number;
  error?: string;
}

/** 阶段执行结果，按阶段顺序追加，追加后不再修改 */
export interface StageResult {
  stage: string;
  kind: StageKind;
  status: StageStatus;
  exitDetail: ExitDetail;
  logsRef?: string;
  durationMs: number;
  targets?: TransferResult[];
}

/** 一次构建 */
export interface Build {
  id: number;
  jobId: string;
  trigger: TriggerEvent;
  state: BuildState;
  stageResults: StageResult[];
  createdAt: string;
  startedAt?: string;
  finishedAt?: string;
  /** errored / cancelled 时的说明 */
  error?: string;
}

/** 审计记录事件类型 */
export type AuditEvent =
  | "build_queued"
  | "build_start"
  | "build_complete"
  | "build_cancelled"
  | "stage_start"
  | "stage_complete"
  | "stage_failed"
  | "stage_skipped"
  | "deploy_target"
  | "notify";

/** 审计记录 */
export interface AuditRecord {
  timestamp: string;
  buildId: number;
  stage?: string;
  event: AuditEvent;
  duration?: number;
  metadata?: Record<string, unknown>;
}
