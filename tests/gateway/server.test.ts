/**
 * Gateway HTTP 服务测试 — 使用 Fastify inject，不监听端口
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AuditLogger } from "../../src/audit/logger.js";
import { DedupWindow } from "../../src/gateway/dedup.js";
import { WebhookReceiver } from "../../src/gateway/receiver.js";
import { createServer } from "../../src/gateway/server.js";
import { signGitHubPayload } from "../../src/gateway/signature.js";
import { JobRegistry } from "../../src/jobs/registry.js";
import type { BuildExecutor } from "../../src/pipeline/engine.js";
import { Notifier } from "../../src/pipeline/notifier.js";
import { TaskQueue } from "../../src/pipeline/queue.js";
import { Scheduler } from "../../src/pipeline/scheduler.js";
import { StateStore } from "../../src/pipeline/state.js";
import type { Build } from "../../src/types/index.js";
import { makeJob, makeTrigger, readFixture } from "../helpers/factories.js";

/** 立即成功的执行器 */
const instantExecutor: BuildExecutor = {
  async execute(build: Build) {
    build.state = "succeeded";
    build.finishedAt = new Date().toISOString();
    return build;
  },
};

describe("Gateway server", () => {
  let tmpDir: string;
  let stateStore: StateStore;
  let auditLogger: AuditLogger;
  let scheduler: Scheduler;
  let app: FastifyInstance;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "server-test-"));
    stateStore = new StateStore(":memory:");
    auditLogger = new AuditLogger(path.join(tmpDir, "audit"));
    const registry = new JobRegistry([
      makeJob(),
      makeJob({ id: "acme-site", repository: "acme/site", refPattern: "main" }),
    ]);
    scheduler = new Scheduler({
      registry,
      executor: instantExecutor,
      stateStore,
      auditLogger,
      notifier: new Notifier(),
      queue: new TaskQueue(2),
    });
    const receiver = new WebhookReceiver({
      secrets: { github: "test-secret", gitlab: "test-gitlab-token", generic: "test-generic-token" },
      dedup: new DedupWindow(60_000),
      submit: (trigger) => {
        scheduler.submit(trigger);
      },
    });
    app = await createServer({ receiver, stateStore, auditLogger, registry, scheduler, logLevel: false });
  });

  afterEach(async () => {
    await app.close();
    await scheduler.drain();
    stateStore.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("通用 webhook 返回 202 并创建构建", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/webhook/generic",
      headers: { "content-type": "application/json", authorization: "Bearer test-generic-token" },
      payload: JSON.stringify({ repository_id: "site", ref: "main", commit_sha: "abc123" }),
    });

    expect(res.statusCode).toBe(202);
    expect(res.json()).toMatchObject({ ok: true, duplicate: false });
    await scheduler.drain();
    expect(stateStore.get(1)?.state).toBe("succeeded");
  });

  it("窗口内重复投递同一触发只产生一个构建", async () => {
    const send = () =>
      app.inject({
        method: "POST",
        url: "/webhook/generic",
        headers: { "content-type": "application/json", authorization: "Bearer test-generic-token" },
        payload: JSON.stringify({ repository_id: "site", ref: "main", commit_sha: "abc123" }),
      });

    const first = await send();
    const second = await send();

    expect(first.json().duplicate).toBe(false);
    expect(second.statusCode).toBe(202);
    expect(second.json().duplicate).toBe(true);
    await scheduler.drain();
    expect(stateStore.list().map((b) => b.id)).toEqual([1]);
  });

  it("GitHub 签名基于原始请求体校验", async () => {
    const rawBody = readFixture("github-push.json");
    const res = await app.inject({
      method: "POST",
      url: "/webhook/github",
      headers: {
        "content-type": "application/json",
        "x-github-event": "push",
        "x-hub-signature-256": signGitHubPayload("test-secret", rawBody),
      },
      payload: rawBody,
    });

    expect(res.statusCode).toBe(202);
    await scheduler.drain();
    expect(stateStore.get(1)?.jobId).toBe("acme-site");
  });

  it("签名错误返回 401", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/webhook/github",
      headers: { "content-type": "application/json", "x-github-event": "push", "x-hub-signature-256": "sha256=00" },
      payload: readFixture("github-push.json"),
    });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ ok: false, error: "github webhook authentication failed" });
    expect(stateStore.list()).toEqual([]);
  });

  it("缺少字段返回 400", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/webhook/generic",
      headers: { "content-type": "application/json", "x-webhook-token": "test-generic-token" },
      payload: JSON.stringify({ repository_id: "site", ref: "main" }),
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().ok).toBe(false);
  });

  it("查询构建列表与详情", async () => {
    stateStore.save({
      id: 3,
      jobId: "site",
      trigger: makeTrigger(),
      state: "failed",
      stageResults: [],
      createdAt: new Date().toISOString(),
    });

    const list = await app.inject({ method: "GET", url: "/api/builds?state=failed" });
    expect(list.statusCode).toBe(200);
    expect(list.json().map((b: Build) => b.id)).toEqual([3]);

    const detail = await app.inject({ method: "GET", url: "/api/builds/3" });
    expect(detail.json().state).toBe("failed");
  });

  it("非法状态过滤返回 400", async () => {
    const res = await app.inject({ method: "GET", url: "/api/builds?state=done" });
    expect(res.statusCode).toBe(400);
  });

  it("不存在的构建返回 404", async () => {
    expect((await app.inject({ method: "GET", url: "/api/builds/99" })).statusCode).toBe(404);
    expect((await app.inject({ method: "GET", url: "/api/builds/abc" })).statusCode).toBe(404);
  });

  it("返回阶段输出日志", async () => {
    const stageLog = auditLogger.openStageLog(5, 0, "test");
    stageLog.write("ok 1 - renders\n");
    stateStore.save({
      id: 5,
      jobId: "site",
      trigger: makeTrigger(),
      state: "succeeded",
      stageResults: [
        { stage: "test", kind: "command", status: "passed", exitDetail: { reason: "ok", exitCode: 0 }, logsRef: stageLog.ref, durationMs: 10 },
      ],
      createdAt: new Date().toISOString(),
    });

    const res = await app.inject({ method: "GET", url: "/api/builds/5/stages/0/log" });
    expect(res.statusCode).toBe(200);
    expect(res.body).toBe("ok 1 - renders\n");
  });

  it("列出作业定义", async () => {
    const res = await app.inject({ method: "GET", url: "/api/jobs" });
    expect(res.json().map((j: { id: string }) => j.id)).toEqual(["site", "acme-site"]);
  });

  it("服务状态包含执行队列与 lane", async () => {
    const res = await app.inject({ method: "GET", url: "/status" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ queue: { running: 0, waiting: 0 }, lanes: [] });
  });

  it("健康检查", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.json()).toEqual({ status: "ok" });
  });
});
