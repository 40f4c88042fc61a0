/**
 * 事件归一化 — 将 GitHub / GitLab / 通用 push 载荷转换为统一的 push 描述
 *
 * 返回 null 表示事件无需处理（非 push、分支删除等）；
 * 缺少必填字段时抛出 MalformedPayloadError。
 */

import { z } from "zod";
import { MalformedPayloadError } from "../errors.js";

/** 归一化后的 push，尚未分配 id 与去重标记 */
export interface NormalizedPush {
  repositoryId: string;
  repositoryUrl?: string;
  ref: string;
  commitSha: string;
}

/** 全零 SHA 表示分支删除 */
const ZERO_SHA = /^0+$/;

const SHA = z.string().regex(/^[0-9a-fA-F]{4,64}$/, "must be a hex commit SHA");

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, source: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const missing = result.error.issues.map((issue) => issue.path.join(".") || "<root>");
    throw new MalformedPayloadError(
      `Malformed ${source} push payload: ${result.error.issues.map((i) => `${i.path.join(".") || "<root>"} ${i.message}`).join("; ")}`,
      missing,
    );
  }
  return result.data;
}

// ---------- GitHub ----------

const githubPushSchema = z.object({
  ref: z.string().min(1),
  after: z.string().min(1),
  deleted: z.boolean().optional(),
  repository: z.object({
    full_name: z.string().min(1),
    clone_url: z.string().optional(),
  }),
});

/**
 * 归一化 GitHub webhook 事件
 * @param eventType X-GitHub-Event header 值
 */
export function normalizeGitHubEvent(eventType: string, payload: unknown): NormalizedPush | null {
  // ping 与其他事件类型只确认收到
  if (eventType !== "push") return null;

  const push = parseOrThrow(githubPushSchema, payload, "GitHub");
  if (push.deleted || ZERO_SHA.test(push.after)) return null;
  const commitSha = parseOrThrow(SHA, push.after, "GitHub");

  return {
    repositoryId: push.repository.full_name,
    repositoryUrl: push.repository.clone_url,
    ref: push.ref,
    commitSha: commitSha.toLowerCase(),
  };
}

// ---------- GitLab ----------

const gitlabPushSchema = z.object({
  object_kind: z.string(),
  ref: z.string().min(1),
  after: z.string().optional(),
  checkout_sha: z.string().nullable().optional(),
  project: z.object({
    // GitLab project ID 是数字，路径作为仓库标识
    path_with_namespace: z.string().min(1),
    git_http_url: z.string().optional(),
  }),
});

/** 归一化 GitLab webhook 事件（Push Hook / Tag Push Hook） */
export function normalizeGitLabEvent(payload: unknown): NormalizedPush | null {
  const kind = z.object({ object_kind: z.string() }).safeParse(payload);
  if (!kind.success) {
    throw new MalformedPayloadError("Malformed GitLab payload: object_kind is required", ["object_kind"]);
  }
  if (kind.data.object_kind !== "push" && kind.data.object_kind !== "tag_push") return null;

  const push = parseOrThrow(gitlabPushSchema, payload, "GitLab");
  const sha = push.checkout_sha ?? push.after;
  if (!sha) {
    throw new MalformedPayloadError("Malformed GitLab push payload: checkout_sha is required", ["checkout_sha"]);
  }
  if (ZERO_SHA.test(sha)) return null;
  const commitSha = parseOrThrow(SHA, sha, "GitLab");

  return {
    repositoryId: push.project.path_with_namespace,
    repositoryUrl: push.project.git_http_url,
    ref: push.ref,
    commitSha: commitSha.toLowerCase(),
  };
}

// ---------- 通用 ----------

const genericPushSchema = z
  .object({
    repository_id: z.string().min(1).optional(),
    repository_url: z.string().min(1).optional(),
    ref: z.string().min(1),
    commit_sha: SHA,
  })
  .refine((p) => p.repository_id !== undefined || p.repository_url !== undefined, {
    message: "repository_id or repository_url is required",
    path: ["repository_id"],
  });

/** 归一化通用 push 通知：{repository_id | repository_url, ref, commit_sha} */
export function normalizeGenericEvent(payload: unknown): NormalizedPush {
  const push = parseOrThrow(genericPushSchema, payload, "generic");
  const repositoryId = push.repository_id ?? push.repository_url ?? "";
  return {
    repositoryId,
    repositoryUrl: push.repository_url,
    ref: push.ref,
    commitSha: push.commit_sha.toLowerCase(),
  };
}
