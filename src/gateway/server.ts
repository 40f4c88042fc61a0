/**
 * Gateway HTTP 服务 — Fastify 实例，接收 push webhook + 构建查询 API
 */

import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import { MalformedPayloadError, UnauthorizedError, errorMessage } from "../errors.js";
import type { JobRegistry } from "../jobs/registry.js";
import type { AuditLogger } from "../audit/logger.js";
import type { Scheduler } from "../pipeline/scheduler.js";
import type { StateStore } from "../pipeline/state.js";
import type { BuildState, EventSource } from "../types/index.js";
import { TERMINAL_STATES } from "../types/index.js";
import type { WebhookReceiver } from "./receiver.js";

/** 服务依赖 */
export interface ServerDeps {
  receiver: WebhookReceiver;
  stateStore: StateStore;
  auditLogger: AuditLogger;
  registry: JobRegistry;
  scheduler: Scheduler;
  /** Fastify 请求日志级别，false 关闭 */
  logLevel?: string | false;
}

const BUILD_STATES: readonly BuildState[] = ["queued", "running", ...TERMINAL_STATES];

function isBuildState(value: string): value is BuildState {
  return BUILD_STATES.some((s) => s === value);
}

/** 解析路径中的 build_id，非正整数返回 0（不存在的 id） */
function parseBuildId(raw: string): number {
  return /^\d+$/.test(raw) ? Number(raw) : 0;
}

/** 错误分类到 HTTP 状态码 */
function statusFor(err: unknown): number {
  if (err instanceof UnauthorizedError) return 401;
  if (err instanceof MalformedPayloadError) return 400;
  return 500;
}

/**
 * 创建 Fastify 服务实例
 */
export async function createServer(deps: ServerDeps) {
  const { receiver, stateStore, auditLogger, registry, scheduler } = deps;
  const app = Fastify({
    logger: deps.logLevel === false ? false : { level: deps.logLevel ?? "info" },
    bodyLimit: 5 * 1024 * 1024,
  });

  const startedAt = Date.now();

  // 签名需要原始请求体：JSON 以字符串形式交给 Receiver 解析
  app.addContentTypeParser("application/json", { parseAs: "string" }, (_request, body, done) => {
    done(null, body);
  });

  /** webhook 公共处理：202 只表示已收到 */
  function webhookHandler(provider: EventSource) {
    return async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const result = receiver.handle({
          provider,
          headers: request.headers,
          rawBody: typeof request.body === "string" ? request.body : "",
        });
        if (result.status === "ignored") {
          return reply.code(202).send({ ok: true, ignored: true, reason: result.reason });
        }
        return reply.code(202).send({
          ok: true,
          triggerId: result.trigger.id,
          duplicate: result.trigger.duplicate,
        });
      } catch (err) {
        const code = statusFor(err);
        if (code === 500) {
          request.log.error(err, `${provider} webhook handling failed`);
        } else {
          request.log.warn({ err: errorMessage(err) }, `${provider} webhook rejected`);
        }
        return reply.code(code).send({ ok: false, error: errorMessage(err) });
      }
    };
  }

  // ========== Webhook 路由 ==========

  app.post("/webhook/github", webhookHandler("github"));
  app.post("/webhook/gitlab", webhookHandler("gitlab"));
  app.post("/webhook/generic", webhookHandler("generic"));

  /** 手动触发（通用载荷格式），重新运行即提交新的触发 */
  app.post("/api/trigger", webhookHandler("generic"));

  // ========== 查询 API ==========

  /** 构建列表 */
  app.get<{ Querystring: { state?: string; job_id?: string; limit?: string } }>("/api/builds", async (request, reply) => {
    const { state, job_id: jobId, limit } = request.query;
    const stateFilter = state === undefined ? undefined : isBuildState(state) ? state : null;
    if (stateFilter === null) {
      return reply.code(400).send({ ok: false, error: `Invalid state: ${state}` });
    }
    const parsedLimit = limit ? parseInt(limit, 10) : undefined;
    return reply.send(
      stateStore.list({
        state: stateFilter,
        jobId,
        limit: parsedLimit && parsedLimit > 0 ? Math.min(parsedLimit, 1000) : undefined,
      }),
    );
  });

  /** 构建详情 */
  app.get<{ Params: { id: string } }>("/api/builds/:id", async (request, reply) => {
    const build = stateStore.get(parseBuildId(request.params.id));
    if (!build) {
      return reply.code(404).send({ ok: false, error: "Build not found" });
    }
    return reply.send(build);
  });

  /** 构建审计日志 */
  app.get<{ Params: { id: string } }>("/api/builds/:id/audit", async (request, reply) => {
    const buildId = parseBuildId(request.params.id);
    if (!stateStore.get(buildId)) {
      return reply.code(404).send({ ok: false, error: "Build not found" });
    }
    return reply.send(auditLogger.getBuildLog(buildId));
  });

  /** 阶段输出日志（纯文本） */
  app.get<{ Params: { id: string; index: string } }>("/api/builds/:id/stages/:index/log", async (request, reply) => {
    const build = stateStore.get(parseBuildId(request.params.id));
    const stage = build?.stageResults[Number(request.params.index)];
    const content = stage?.logsRef ? auditLogger.readStageLog(stage.logsRef) : null;
    if (content === null) {
      return reply.code(404).send({ ok: false, error: "Stage log not found" });
    }
    return reply.type("text/plain; charset=utf-8").send(content);
  });

  /** 作业定义（凭据只以句柄出现） */
  app.get("/api/jobs", async (_request, reply) => {
    return reply.send(registry.list());
  });

  // ========== 基础路由 ==========

  /** 健康检查 */
  app.get("/health", async (_request, reply) => {
    return reply.code(200).send({ status: "ok" });
  });

  /** 服务状态 */
  app.get("/status", async (_request, reply) => {
    return reply.code(200).send({
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      ...receiver.stats(),
      queue: scheduler.queueLoad(),
      lanes: scheduler.snapshot(),
    });
  });

  return app;
}
