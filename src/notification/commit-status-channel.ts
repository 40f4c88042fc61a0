/**
 * Commit status 通知渠道 — 将构建终态回写到 GitHub / GitLab 对应提交
 */

import type { GitAdapter } from "../adapters/git-adapter.js";
import type { EventSource } from "../types/index.js";
import type { NotificationChannel, NotificationMessage } from "./channel.js";

export class CommitStatusChannel implements NotificationChannel {
  readonly name = "commit-status";

  constructor(
    private readonly getAdapter: (source: EventSource) => GitAdapter,
    private readonly publicUrl = "",
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    if (message.source === "generic") return;
    const adapter = this.getAdapter(message.source);
    await adapter.setCommitStatus({
      repositoryId: message.repositoryId,
      commitSha: message.commitSha,
      state: message.finalState,
      context: `pipeline/${message.jobId}`,
      description: `Build #${message.buildId} ${message.finalState}`,
      targetUrl: this.publicUrl ? `${this.publicUrl.replace(/\/+$/, "")}/api/builds/${message.buildId}` : undefined,
    });
  }
}
