/**
 * CLI 手动触发 — 对指定提交重新运行流水线（重试即新的触发）
 *
 * 使用方式：
 *   node dist/gateway/cli-trigger.js --repo acme/site --ref main --sha abc123
 */

import { fetch } from "undici";

/** 手动触发参数 */
export interface ManualTriggerOptions {
  repositoryId?: string;
  repositoryUrl?: string;
  ref: string;
  commitSha: string;
}

/** 通用 push 载荷 */
export interface GenericPushBody {
  repository_id?: string;
  repository_url?: string;
  ref: string;
  commit_sha: string;
}

/**
 * 创建通用触发载荷
 */
export function createManualTrigger(opts: ManualTriggerOptions): GenericPushBody {
  if (!opts.repositoryId && !opts.repositoryUrl) {
    throw new Error("--repo or --repo-url is required");
  }
  return {
    repository_id: opts.repositoryId,
    repository_url: opts.repositoryUrl,
    ref: opts.ref,
    commit_sha: opts.commitSha,
  };
}

/** 解析 --name value 形式的参数 */
export function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg?.startsWith("--") && next !== undefined && !next.startsWith("--")) {
      parsed[arg.slice(2)] = next;
      i++;
    }
  }
  return parsed;
}

/**
 * CLI 入口 — 解析命令行参数并发送到本地服务
 */
async function main(): Promise<number> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(`
Pipeline CLI

用法:
  node dist/gateway/cli-trigger.js --repo <id> --ref <ref> --sha <commit> [--url <server>]

选项:
  --repo <id>         仓库标识，与作业配置中的 repository 一致
  --repo-url <url>    仓库地址（可替代 --repo）
  --ref <ref>         分支或 ref (默认: main)
  --sha <commit>      提交 SHA (必填)
  --url <server>      服务地址 (默认: http://localhost:$PORT)

令牌取自环境变量 GENERIC_WEBHOOK_TOKEN。
`);
    return 0;
  }

  const opts = parseArgs(args);
  const sha = opts["sha"];
  if (!sha) {
    console.error("错误: --sha 是必填参数");
    return 1;
  }

  let body: GenericPushBody;
  try {
    body = createManualTrigger({
      repositoryId: opts["repo"],
      repositoryUrl: opts["repo-url"],
      ref: opts["ref"] ?? "main",
      commitSha: sha,
    });
  } catch (err) {
    console.error(`错误: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  const base = opts["url"] ?? `http://localhost:${process.env.PORT ?? "8080"}`;
  const url = `${base.replace(/\/+$/, "")}/api/trigger`;
  console.log(`发送触发到 ${url}...`);

  try {
    const response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${process.env.GENERIC_WEBHOOK_TOKEN ?? ""}`,
      },
      body: JSON.stringify(body),
    });
    const result = await response.text();
    if (response.ok) {
      console.log("✅ 触发已接收:", result);
      return 0;
    }
    console.error("❌ 触发被拒绝:", response.status, result);
    return 1;
  } catch (err) {
    console.error("❌ 连接失败，请确保服务正在运行:", err);
    return 1;
  }
}

// 仅在直接运行时执行
if (process.argv[1]?.includes("cli-trigger")) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    },
  );
}
