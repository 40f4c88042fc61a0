import { describe, expect, it } from "vitest";
import {
  signGitHubPayload,
  verifyGenericToken,
  verifyGitHubSignature,
  verifyGitLabToken,
} from "../../src/gateway/signature.js";
import type { RawWebhookRequest } from "../../src/types/index.js";

const SECRET = "test-secret";
const BODY = '{"ref":"refs/heads/main"}';

function request(provider: RawWebhookRequest["provider"], headers: RawWebhookRequest["headers"]): RawWebhookRequest {
  return { provider, headers, rawBody: BODY };
}

describe("verifyGitHubSignature", () => {
  it("正确的 HMAC 签名通过", () => {
    const req = request("github", { "x-hub-signature-256": signGitHubPayload(SECRET, BODY) });
    expect(verifyGitHubSignature(req, SECRET)).toBe(true);
  });

  it("签名使用其他密钥时拒绝", () => {
    const req = request("github", { "x-hub-signature-256": signGitHubPayload("other-secret", BODY) });
    expect(verifyGitHubSignature(req, SECRET)).toBe(false);
  });

  it("请求体被篡改时拒绝", () => {
    const req: RawWebhookRequest = {
      provider: "github",
      headers: { "x-hub-signature-256": signGitHubPayload(SECRET, BODY) },
      rawBody: BODY + " ",
    };
    expect(verifyGitHubSignature(req, SECRET)).toBe(false);
  });

  it("缺少签名 header 时拒绝", () => {
    expect(verifyGitHubSignature(request("github", {}), SECRET)).toBe(false);
  });

  it("未配置密钥时拒绝所有请求", () => {
    const req = request("github", { "x-hub-signature-256": signGitHubPayload("", BODY) });
    expect(verifyGitHubSignature(req, "")).toBe(false);
  });
});

describe("verifyGitLabToken", () => {
  it("令牌一致时通过", () => {
    expect(verifyGitLabToken(request("gitlab", { "x-gitlab-token": SECRET }), SECRET)).toBe(true);
  });

  it("令牌不一致时拒绝", () => {
    expect(verifyGitLabToken(request("gitlab", { "x-gitlab-token": "wrong" }), SECRET)).toBe(false);
  });
});

describe("verifyGenericToken", () => {
  it("接受 Bearer 令牌", () => {
    expect(verifyGenericToken(request("generic", { authorization: `Bearer ${SECRET}` }), SECRET)).toBe(true);
  });

  it("接受 X-Webhook-Token", () => {
    expect(verifyGenericToken(request("generic", { "x-webhook-token": SECRET }), SECRET)).toBe(true);
  });

  it("没有令牌时拒绝", () => {
    expect(verifyGenericToken(request("generic", {}), SECRET)).toBe(false);
  });
});
