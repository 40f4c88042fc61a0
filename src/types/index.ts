export type { EventSource, RawWebhookRequest, TriggerEvent } from "./events.js";
export type {
  ConcurrencyPolicy,
  DeployTarget,
  JobDefinition,
  StageDefinition,
  StageKind,
  TransportKind,
} from "./job.js";
export type {
  AuditEvent,
  AuditRecord,
  Build,
  BuildState,
  ExitDetail,
  ExitReason,
  StageResult,
  StageStatus,
  TransferResult,
} from "./pipeline.js";
export { TERMINAL_STATES } from "./pipeline.js";
