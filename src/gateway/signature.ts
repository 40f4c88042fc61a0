/**
 * Webhook 身份校验
 *
 * GitHub: X-Hub-Signature-256 = "sha256=" + HMAC-SHA256(secret, rawBody)
 * GitLab: X-Gitlab-Token 与密钥比对
 * 通用:   Authorization: Bearer <token> 或 X-Webhook-Token
 * 未配置密钥的来源拒绝所有请求。
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { RawWebhookRequest } from "../types/index.js";

/** 读取单值 header（Node 会把 header 名转为小写） */
export function header(headers: RawWebhookRequest["headers"], name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/** 等长比较，防止时序攻击 */
function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  // 长度不一致时 timingSafeEqual 会抛出，先做长度检查
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export function signGitHubPayload(secret: string, rawBody: string): string {
  return "sha256=" + createHmac("sha256", secret).update(rawBody).digest("hex");
}

export function verifyGitHubSignature(req: RawWebhookRequest, secret: string): boolean {
  if (!secret) return false;
  const signature = header(req.headers, "x-hub-signature-256");
  if (!signature) return false;
  return safeEqual(signature, signGitHubPayload(secret, req.rawBody));
}

export function verifyGitLabToken(req: RawWebhookRequest, secret: string): boolean {
  if (!secret) return false;
  const token = header(req.headers, "x-gitlab-token");
  return token !== undefined && safeEqual(token, secret);
}

export function verifyGenericToken(req: RawWebhookRequest, secret: string): boolean {
  if (!secret) return false;
  const auth = header(req.headers, "authorization");
  const bearer = auth?.match(/^Bearer\s+(.+)$/i)?.[1];
  const token = bearer ?? header(req.headers, "x-webhook-token");
  return token !== undefined && safeEqual(token.trim(), secret);
}
