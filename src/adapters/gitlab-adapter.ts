/**
 * GitLab 适配器 — 基于 @gitbeaker/rest
 */

import { Gitlab } from "@gitbeaker/rest";
import { config } from "../config.js";
import type { BuildState } from "../types/index.js";
import type { CheckoutOptions, CommitStatusOptions, GitAdapter } from "./git-adapter.js";
import { checkoutCommit } from "./git-checkout.js";

type GitLabStatusState = "pending" | "running" | "success" | "failed" | "canceled";

const STATE_MAP: Record<BuildState, GitLabStatusState> = {
  queued: "pending",
  running: "running",
  succeeded: "success",
  failed: "failed",
  errored: "failed",
  cancelled: "canceled",
};

export class GitLabAdapter implements GitAdapter {
  private readonly api: InstanceType<typeof Gitlab>;

  constructor(host: string = config.gitlab.url, token: string = config.gitlab.token) {
    this.api = new Gitlab({ host: host || undefined, token });
  }

  async checkout(opts: CheckoutOptions): Promise<void> {
    await checkoutCommit(opts);
  }

  async setCommitStatus(opts: CommitStatusOptions): Promise<void> {
    await this.api.Commits.editStatus(opts.repositoryId, opts.commitSha, STATE_MAP[opts.state], {
      name: opts.context,
      description: opts.description,
      targetUrl: opts.targetUrl,
    });
  }
}
