/**
 * 统一触发事件定义
 */

/** 事件来源 */
export type EventSource = "github" | "gitlab" | "generic";

/** 归一化后的 push 触发事件，创建后不可变 */
export interface TriggerEvent {
  readonly id: string;
  readonly source: EventSource;
  /** 仓库标识，GitHub 为 owner/repo，GitLab 为 path_with_namespace */
  readonly repositoryId: string;
  readonly repositoryUrl?: string;
  readonly ref: string;
  readonly commitSha: string;
  readonly receivedAt: string;
  /** 去重窗口内的重复投递 */
  readonly duplicate: boolean;
}

/** Receiver 收到的原始请求 */
export interface RawWebhookRequest {
  provider: EventSource;
  headers: Record<string, string | string[] | undefined>;
  rawBody: string;
}
