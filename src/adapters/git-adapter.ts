/**
 * Git 适配器接口定义 — 检出代码与回写 commit status 的统一抽象
 */

import type { BuildState } from "../types/index.js";

export interface CheckoutOptions {
  repositoryUrl: string;
  ref: string;
  commitSha: string;
  workspace: string;
  /** HTTPS 访问令牌 */
  token?: string;
  /** 阶段超时时中止 git 子进程 */
  signal?: AbortSignal;
}

export interface CommitStatusOptions {
  repositoryId: string;
  commitSha: string;
  state: BuildState;
  description: string;
  context: string;
  targetUrl?: string;
}

export interface GitAdapter {
  checkout(opts: CheckoutOptions): Promise<void>;
  setCommitStatus(opts: CommitStatusOptions): Promise<void>;
}
