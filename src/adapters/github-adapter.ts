/**
 * GitHub 适配器 — 基于 @octokit/rest
 */

import { Octokit } from "@octokit/rest";
import { config } from "../config.js";
import type { BuildState } from "../types/index.js";
import type { CheckoutOptions, CommitStatusOptions, GitAdapter } from "./git-adapter.js";
import { checkoutCommit } from "./git-checkout.js";

type GitHubStatusState = "error" | "failure" | "pending" | "success";

const STATE_MAP: Record<BuildState, GitHubStatusState> = {
  queued: "pending",
  running: "pending",
  succeeded: "success",
  failed: "failure",
  errored: "error",
  cancelled: "error",
};

export class GitHubAdapter implements GitAdapter {
  private readonly api: Octokit;

  constructor(token: string = config.github.token) {
    this.api = new Octokit({ auth: token });
  }

  /** 将 "owner/repo" 拆分为 owner 和 repo */
  private split(repositoryId: string): { owner: string; repo: string } {
    const [owner = "", repo = ""] = repositoryId.split("/");
    return { owner, repo };
  }

  async checkout(opts: CheckoutOptions): Promise<void> {
    await checkoutCommit(opts);
  }

  async setCommitStatus(opts: CommitStatusOptions): Promise<void> {
    const { owner, repo } = this.split(opts.repositoryId);
    await this.api.repos.createCommitStatus({
      owner,
      repo,
      sha: opts.commitSha,
      state: STATE_MAP[opts.state],
      context: opts.context,
      description: opts.description.slice(0, 140),
      target_url: opts.targetUrl,
    });
  }
}
