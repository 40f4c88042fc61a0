/**
 * 构建结果通知 — 每个终态构建向所有已注册渠道投递一次
 *           单个渠道失败只记录日志，不影响构建已记录的状态
 */

import { createLogger } from "../logger.js";
import { summarize, type NotificationChannel, type NotificationMessage } from "../notification/channel.js";
import type { Build } from "../types/index.js";

const logger = createLogger("notifier");

/** 各渠道的投递结果 */
export interface DeliveryReport {
  delivered: string[];
  failed: { channel: string; error: string }[];
}

/** 需要额外提示的情况：post 阶段失败、部分部署失败 */
export function collectWarnings(build: Build): string[] {
  const warnings: string[] = [];
  for (const result of build.stageResults) {
    if (result.kind === "post" && result.status === "failed") {
      warnings.push(`post stage "${result.stage}" failed: ${result.exitDetail.message ?? result.exitDetail.reason}`);
    }
    const targets = result.targets ?? [];
    const failedTargets = targets.filter((t) => !t.transferred || t.postCommandOk === false);
    if (failedTargets.length > 0 && failedTargets.length < targets.length) {
      warnings.push(
        `partial deploy: ${failedTargets.map((t) => `${t.target} (${t.transferred ? "post command failed" : "transfer failed"})`).join(", ")}`,
      );
    }
  }
  return warnings;
}

export function buildMessage(build: Build): NotificationMessage {
  const started = Date.parse(build.startedAt ?? build.createdAt);
  const finished = Date.parse(build.finishedAt ?? new Date().toISOString());
  return {
    buildId: build.id,
    jobId: build.jobId,
    finalState: build.state,
    stageResults: build.stageResults,
    durationMs: Math.max(0, finished - started),
    source: build.trigger.source,
    repositoryId: build.trigger.repositoryId,
    ref: build.trigger.ref,
    commitSha: build.trigger.commitSha,
    warnings: collectWarnings(build),
    error: build.error,
    timestamp: new Date().toISOString(),
  };
}

export class Notifier {
  private channels: NotificationChannel[];

  constructor(channels: NotificationChannel[] = []) {
    this.channels = channels;
  }

  /** 通知构建终态 */
  async notify(build: Build): Promise<DeliveryReport> {
    const message = buildMessage(build);
    logger.info({ buildId: build.id, jobId: build.jobId, state: build.state }, summarize(message));
    return this.sendToChannels(message);
  }

  /** 遍历渠道发送通知，单个失败不影响其他渠道 */
  private async sendToChannels(message: NotificationMessage): Promise<DeliveryReport> {
    const report: DeliveryReport = { delivered: [], failed: [] };
    if (this.channels.length === 0) return report;

    await Promise.allSettled(
      this.channels.map(async (ch) => {
        try {
          await ch.send(message);
          report.delivered.push(ch.name);
        } catch (err) {
          const error = err instanceof Error ? err.message : String(err);
          report.failed.push({ channel: ch.name, error });
          logger.warn({ channel: ch.name, buildId: message.buildId, err: error }, "Notification channel delivery failed");
        }
      }),
    );
    return report;
  }
}
