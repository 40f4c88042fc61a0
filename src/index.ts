/**
 * 服务入口 — 启动 Fastify + 调度器 + 遗留构建收尾 + 优雅关闭
 */

import { config } from "./config.js";
import { createAdapter } from "./adapters/adapter-factory.js";
import { AuditLogger } from "./audit/logger.js";
import { LocalTransport } from "./deploy/local-transport.js";
import { SshTransport } from "./deploy/ssh-transport.js";
import { errorMessage } from "./errors.js";
import { DedupWindow } from "./gateway/dedup.js";
import { WebhookReceiver } from "./gateway/receiver.js";
import { createServer } from "./gateway/server.js";
import { JobRegistry } from "./jobs/registry.js";
import { createLogger } from "./logger.js";
import type { NotificationChannel } from "./notification/channel.js";
import { CommitStatusChannel } from "./notification/commit-status-channel.js";
import { WebhookChannel } from "./notification/webhook-channel.js";
import { WeComChannel } from "./notification/wecom-channel.js";
import { PipelineEngine } from "./pipeline/engine.js";
import { Notifier } from "./pipeline/notifier.js";
import { TaskQueue } from "./pipeline/queue.js";
import { closeInterruptedBuilds } from "./pipeline/recovery.js";
import { ShellRunner } from "./pipeline/runner.js";
import { Scheduler } from "./pipeline/scheduler.js";
import { StateStore } from "./pipeline/state.js";
import { cleanExpiredWorkspaces } from "./pipeline/workspace.js";
import { ChainedSecretStore, EnvSecretStore, FileSecretStore } from "./secrets/secret-store.js";

const logger = createLogger("push-deploy-pipeline");

/** 按配置组装通知渠道 */
function createChannels(): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (config.github.token || config.gitlab.token) {
    channels.push(new CommitStatusChannel(createAdapter, config.publicUrl));
  }
  if (config.wecomWebhookUrl) {
    channels.push(new WeComChannel(config.wecomWebhookUrl));
  }
  if (config.notifyWebhookUrl) {
    channels.push(new WebhookChannel(config.notifyWebhookUrl));
  }
  return channels;
}

async function main() {
  logger.info("Starting pipeline service...");

  const registry = JobRegistry.fromFile(config.jobsConfigPath);
  logger.info({ jobs: registry.list().map((j) => j.id) }, "Job definitions loaded");

  for (const [provider, secret] of Object.entries({
    github: config.github.webhookSecret,
    gitlab: config.gitlab.webhookSecret,
    generic: config.generic.token,
  })) {
    if (!secret) logger.warn({ provider }, "Webhook secret not configured, requests from this provider will be rejected");
  }

  const stateStore = new StateStore(config.sqlitePath);
  const auditLogger = new AuditLogger(config.auditDir);
  const notifier = new Notifier(createChannels());
  const secrets = new ChainedSecretStore([new FileSecretStore(config.secretsDir), new EnvSecretStore()]);
  const runner = new ShellRunner();

  const engine = new PipelineEngine({
    stateStore,
    auditLogger,
    notifier,
    secrets,
    runner,
    transports: {
      ssh: new SshTransport({ secrets }),
      local: new LocalTransport({ runner, postCommandTimeoutMs: config.defaultStageTimeoutMs }),
    },
    getAdapter: createAdapter,
    workspaceDir: config.workspaceDir,
    defaultStageTimeoutMs: config.defaultStageTimeoutMs,
    keepWorkspaces: config.keepWorkspaces,
  });

  // 上一个进程遗留的未完成构建：不恢复，补齐阶段结果后写入终态并通知
  const interrupted = await closeInterruptedBuilds({ stateStore, auditLogger, notifier, registry });
  if (interrupted.length > 0) {
    logger.warn({ builds: interrupted.map((b) => b.id) }, "Builds interrupted by restart closed");
  }
  if (!config.keepWorkspaces) {
    const removed = cleanExpiredWorkspaces(config.workspaceDir, 0);
    if (removed > 0) logger.info({ removed }, "Stale workspaces removed");
  }

  const queue = new TaskQueue(config.maxConcurrentBuilds);
  const scheduler = new Scheduler({ registry, executor: engine, stateStore, auditLogger, notifier, queue });

  const receiver = new WebhookReceiver({
    secrets: {
      github: config.github.webhookSecret,
      gitlab: config.gitlab.webhookSecret,
      generic: config.generic.token,
    },
    dedup: new DedupWindow(config.dedupWindowMs),
    submit: (trigger) => {
      scheduler.submit(trigger);
    },
  });

  // 启动 HTTP 服务
  const server = await createServer({ receiver, stateStore, auditLogger, registry, scheduler, logLevel: config.logLevel });
  await server.listen({ port: config.port, host: "0.0.0.0" });
  logger.info(`Server listening on port ${config.port}`);

  // 重新加载作业定义，失败时保留旧配置
  process.on("SIGHUP", () => {
    try {
      registry.reload();
    } catch (err) {
      logger.error({ err: errorMessage(err) }, "Job reload failed, keeping previous definitions");
    }
  });

  // 优雅关闭：停止接收，等待运行中的构建结束
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await scheduler.drain();
    stateStore.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
