/**
 * 通知渠道测试 — mock 掉 undici fetch
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("undici", async (importOriginal) => ({
  ...(await importOriginal<typeof import("undici")>()),
  fetch: vi.fn(),
}));

import { fetch, Response } from "undici";
import { FakeAdapter } from "../helpers/factories.js";
import { summarize, type NotificationMessage } from "../../src/notification/channel.js";
import { CommitStatusChannel } from "../../src/notification/commit-status-channel.js";
import { WebhookChannel } from "../../src/notification/webhook-channel.js";
import { WeComChannel } from "../../src/notification/wecom-channel.js";

const fetchMock = vi.mocked(fetch);

function makeMessage(overrides: Partial<NotificationMessage> = {}): NotificationMessage {
  return {
    buildId: 12,
    jobId: "site",
    finalState: "failed",
    stageResults: [
      { stage: "checkout", kind: "checkout", status: "passed", exitDetail: { reason: "ok" }, durationMs: 800 },
      { stage: "test", kind: "command", status: "failed", exitDetail: { reason: "exit", exitCode: 1, message: "exited with code 1" }, durationMs: 4200 },
      { stage: "deploy", kind: "deploy", status: "skipped", exitDetail: { reason: "not_run" }, durationMs: 0 },
    ],
    durationMs: 5_400,
    source: "github",
    repositoryId: "acme/site",
    ref: "refs/heads/main",
    commitSha: "9f2c4e1a7b3d5f6e8a0c2b4d6f8e0a1c3b5d7f9e",
    warnings: [],
    timestamp: "2024-05-01T10:00:31.000Z",
    ...overrides,
  };
}

describe("summarize", () => {
  it("输出一行摘要", () => {
    expect(summarize(makeMessage())).toBe(
      "Build #12 (site) failed in 5s | checkout:passed test:failed deploy:skipped",
    );
  });
});

describe("WeComChannel", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("渲染阶段列表与提示", () => {
    const content = new WeComChannel("https://example.test/wecom").render(
      makeMessage({ warnings: ["partial deploy: web-2 (transfer failed)"] }),
    );
    expect(content.split("\n")).toEqual([
      '## Build #12 <font color="warning">failed</font>',
      "> **作业**: site",
      "> **仓库**: acme/site @ refs/heads/main",
      "> **提交**: 9f2c4e1a7b3d",
      "> **耗时**: 5s",
      "",
      "- checkout: passed",
      "- test: failed (exited with code 1)",
      "- deploy: skipped",
      "",
      "⚠ partial deploy: web-2 (transfer failed)",
    ]);
  });

  it("非 2xx 响应抛出", async () => {
    fetchMock.mockResolvedValue(new Response("bad key", { status: 403 }));
    await expect(new WeComChannel("https://example.test/wecom").send(makeMessage())).rejects.toThrow(
      "WeCom webhook responded 403: bad key",
    );
  });
});

describe("WebhookChannel", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("POST 摘要与完整构建结果", async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    const message = makeMessage();

    await new WebhookChannel("https://example.test/hook").send(message);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toEqual({ text: summarize(message), build: message });
  });

  it("5xx 响应按次数重试", async () => {
    fetchMock.mockResolvedValue(new Response("down", { status: 502 }));

    await expect(
      new WebhookChannel("https://example.test/hook", { maxRetries: 2, baseDelay: 1 }).send(makeMessage()),
    ).rejects.toThrow("Notification webhook responded 502");
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("4xx 响应不重试", async () => {
    fetchMock.mockResolvedValue(new Response("nope", { status: 404 }));

    await expect(
      new WebhookChannel("https://example.test/hook", { maxRetries: 2, baseDelay: 1 }).send(makeMessage()),
    ).rejects.toThrow("Notification webhook rejected the message: 404");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("CommitStatusChannel", () => {
  it("回写提交状态并附带构建链接", async () => {
    const adapter = new FakeAdapter();
    const channel = new CommitStatusChannel(() => adapter, "https://ci.example.test/");

    await channel.send(makeMessage());

    expect(adapter.statuses).toEqual([
      {
        repositoryId: "acme/site",
        commitSha: "9f2c4e1a7b3d5f6e8a0c2b4d6f8e0a1c3b5d7f9e",
        state: "failed",
        context: "pipeline/site",
        description: "Build #12 failed",
        targetUrl: "https://ci.example.test/api/builds/12",
      },
    ]);
  });

  it("通用来源不回写", async () => {
    const adapter = new FakeAdapter();
    await new CommitStatusChannel(() => adapter).send(makeMessage({ source: "generic" }));
    expect(adapter.statuses).toEqual([]);
  });
});
