/**
 * 浅检出指定提交 — 每个构建独占一个工作目录
 */

import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import { promisify } from "node:util";
import type { CheckoutOptions } from "./git-adapter.js";

const execFileAsync = promisify(execFile);

const BRANCH_PREFIX = "refs/heads/";

/** 将令牌写入 HTTPS 克隆地址 */
export function withToken(repositoryUrl: string, token: string): string {
  if (!/^https?:\/\//.test(repositoryUrl)) return repositoryUrl;
  const url = new URL(repositoryUrl);
  url.username = "oauth2";
  url.password = token;
  return url.toString();
}

/** 隐去错误信息中的令牌 */
export function redact(text: string, token?: string): string {
  return token ? text.split(token).join("***") : text;
}

async function git(args: string[], cwd: string, signal?: AbortSignal): Promise<string> {
  const { stdout } = await execFileAsync("git", args, {
    cwd,
    signal,
    env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    maxBuffer: 16 * 1024 * 1024,
  });
  return stdout.trim();
}

export async function checkoutCommit(opts: CheckoutOptions): Promise<void> {
  const { workspace, commitSha, ref, token, signal } = opts;
  const url = token ? withToken(opts.repositoryUrl, token) : opts.repositoryUrl;

  signal?.throwIfAborted();
  await fs.mkdir(workspace, { recursive: true });
  try {
    await git(["init", "--quiet"], workspace, signal);
    try {
      await git(["fetch", "--quiet", "--depth", "1", url, commitSha], workspace, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      // 部分服务端不允许按 SHA 拉取，退回按 ref 拉取再定位提交
      const branch = ref.startsWith(BRANCH_PREFIX) ? ref : `${BRANCH_PREFIX}${ref}`;
      await git(["fetch", "--quiet", "--depth", "50", url, branch], workspace, signal);
    }
    await git(["checkout", "--quiet", "--force", commitSha], workspace, signal);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(redact(`git checkout of ${commitSha} failed: ${message}`, token));
  }
}
