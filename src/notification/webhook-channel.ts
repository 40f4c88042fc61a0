/**
 * 通用 JSON Webhook 通知渠道（Slack 兼容的 text 字段 + 完整构建结果）
 */

import { fetch } from "undici";
import { withRetry } from "../pipeline/retry.js";
import { summarize, type NotificationChannel, type NotificationMessage } from "./channel.js";

/** 4xx 响应重试无意义 */
class ClientRejectedError extends Error {}

export interface WebhookChannelOptions {
  maxRetries?: number;
  baseDelay?: number;
}

export class WebhookChannel implements NotificationChannel {
  readonly name = "webhook";

  constructor(
    private readonly url: string,
    private readonly options: WebhookChannelOptions = {},
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    const body = JSON.stringify({ text: summarize(message), build: message });
    await withRetry(
      async () => {
        const resp = await fetch(this.url, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body,
        });
        if (resp.status >= 400 && resp.status < 500) {
          throw new ClientRejectedError(`Notification webhook rejected the message: ${resp.status}`);
        }
        if (!resp.ok) {
          throw new Error(`Notification webhook responded ${resp.status}`);
        }
      },
      {
        maxRetries: this.options.maxRetries ?? 3,
        baseDelay: this.options.baseDelay,
        retryIf: (err) => !(err instanceof ClientRejectedError),
        label: "notify-webhook",
      },
    );
  }
}
