/**
 * 企业微信 Webhook 机器人通知渠道
 *
 * 使用 undici fetch 发送 markdown 格式消息到企业微信群机器人。
 * 非 2xx 响应抛出，由 Notifier 记录。
 */

import { fetch } from "undici";
import type { NotificationChannel, NotificationMessage } from "./channel.js";

const STATE_LABEL: Record<string, string> = {
  succeeded: "<font color=\"info\">succeeded</font>",
  failed: "<font color=\"warning\">failed</font>",
  errored: "<font color=\"warning\">errored</font>",
  cancelled: "<font color=\"comment\">cancelled</font>",
};

export class WeComChannel implements NotificationChannel {
  readonly name = "wecom";

  constructor(private webhookUrl: string) {}

  /** 渲染 markdown 内容 */
  render(message: NotificationMessage): string {
    const lines = [
      `## Build #${message.buildId} ${STATE_LABEL[message.finalState] ?? message.finalState}`,
      `> **作业**: ${message.jobId}`,
      `> **仓库**: ${message.repositoryId} @ ${message.ref}`,
      `> **提交**: ${message.commitSha.slice(0, 12)}`,
      `> **耗时**: ${Math.round(message.durationMs / 1000)}s`,
      ``,
      ...message.stageResults.map((s) => `- ${s.stage}: ${s.status}${s.exitDetail.message ? ` (${s.exitDetail.message})` : ""}`),
    ];
    if (message.error) {
      lines.push(``, `错误信息: ${message.error}`);
    }
    if (message.warnings.length > 0) {
      lines.push(``, ...message.warnings.map((w) => `⚠ ${w}`));
    }
    return lines.join("\n");
  }

  async send(message: NotificationMessage): Promise<void> {
    const resp = await fetch(this.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        msgtype: "markdown",
        markdown: { content: this.render(message) },
      }),
    });

    if (!resp.ok) {
      const body = await resp.text();
      throw new Error(`WeCom webhook responded ${resp.status}: ${body}`);
    }
  }
}
