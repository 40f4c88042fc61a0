/**
 * 通用 Git 适配器 — 仅检出，无 commit status 回写
 */

import type { CheckoutOptions, CommitStatusOptions, GitAdapter } from "./git-adapter.js";
import { checkoutCommit } from "./git-checkout.js";

export class GenericGitAdapter implements GitAdapter {
  async checkout(opts: CheckoutOptions): Promise<void> {
    await checkoutCommit(opts);
  }

  async setCommitStatus(_opts: CommitStatusOptions): Promise<void> {
    // 通用来源没有可回写的平台
  }
}
