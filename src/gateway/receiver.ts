/**
 * Webhook Receiver — 鉴权、解析、去重后把 TriggerEvent 交给调度器
 *
 * 调度器的 submit 只做非阻塞的入队决策，接收方在确认收到后立即返回，
 * 响应状态只表示“已收到”，与构建结果无关。
 */

import { randomUUID } from "node:crypto";
import { MalformedPayloadError, UnauthorizedError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { RawWebhookRequest, TriggerEvent } from "../types/index.js";
import { DedupWindow } from "./dedup.js";
import {
  normalizeGenericEvent,
  normalizeGitHubEvent,
  normalizeGitLabEvent,
  type NormalizedPush,
} from "./event-normalizer.js";
import { header, verifyGenericToken, verifyGitHubSignature, verifyGitLabToken } from "./signature.js";

const logger = createLogger("webhook-receiver");

export interface WebhookSecrets {
  github: string;
  gitlab: string;
  generic: string;
}

export interface ReceiverOptions {
  secrets: WebhookSecrets;
  dedup: DedupWindow;
  submit: (trigger: TriggerEvent) => void;
}

/** 处理结果：accepted 已入队；ignored 为无需处理的事件类型 */
export type ReceiveResult =
  | { status: "accepted"; trigger: TriggerEvent }
  | { status: "ignored"; reason: string };

export class WebhookReceiver {
  private received = 0;
  private lastReceivedAt: string | null = null;

  constructor(private readonly options: ReceiverOptions) {}

  /**
   * @throws UnauthorizedError 签名或令牌不匹配
   * @throws MalformedPayloadError 载荷不是 JSON 或缺少必填字段
   */
  handle(req: RawWebhookRequest): ReceiveResult {
    this.authenticate(req);

    let payload: unknown;
    try {
      payload = JSON.parse(req.rawBody);
    } catch {
      throw new MalformedPayloadError("Payload is not valid JSON");
    }

    const push = this.normalize(req, payload);
    if (!push) {
      return { status: "ignored", reason: "not a push event" };
    }

    const duplicate = this.options.dedup.check(DedupWindow.key(push.repositoryId, push.ref, push.commitSha));
    const trigger: TriggerEvent = Object.freeze({
      id: randomUUID(),
      source: req.provider,
      repositoryId: push.repositoryId,
      repositoryUrl: push.repositoryUrl,
      ref: push.ref,
      commitSha: push.commitSha,
      receivedAt: new Date().toISOString(),
      duplicate,
    });

    this.received++;
    this.lastReceivedAt = trigger.receivedAt;
    logger.info(
      { triggerId: trigger.id, source: trigger.source, repositoryId: trigger.repositoryId, ref: trigger.ref, commitSha: trigger.commitSha, duplicate },
      "Trigger accepted",
    );

    this.options.submit(trigger);
    return { status: "accepted", trigger };
  }

  stats(): { receivedEvents: number; lastEventAt: string | null } {
    return { receivedEvents: this.received, lastEventAt: this.lastReceivedAt };
  }

  private authenticate(req: RawWebhookRequest): void {
    const { secrets } = this.options;
    const ok =
      req.provider === "github"
        ? verifyGitHubSignature(req, secrets.github)
        : req.provider === "gitlab"
          ? verifyGitLabToken(req, secrets.gitlab)
          : verifyGenericToken(req, secrets.generic);
    if (!ok) {
      logger.warn({ provider: req.provider }, "Webhook authentication failed");
      throw new UnauthorizedError(`${req.provider} webhook authentication failed`);
    }
  }

  private normalize(req: RawWebhookRequest, payload: unknown): NormalizedPush | null {
    switch (req.provider) {
      case "github": {
        const eventType = header(req.headers, "x-github-event");
        if (!eventType) {
          throw new MalformedPayloadError("Missing X-GitHub-Event header", ["X-GitHub-Event"]);
        }
        return normalizeGitHubEvent(eventType, payload);
      }
      case "gitlab":
        return normalizeGitLabEvent(payload);
      case "generic":
        return normalizeGenericEvent(payload);
      default:
        throw new Error(`Unsupported webhook provider: ${req.provider satisfies never}`);
    }
  }
}
