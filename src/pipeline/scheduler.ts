/**
 * 调度器 — 作业级串行化与 latest-wins 替换
 *
 * 每个作业一条 lane：admitted 为已交给执行队列的构建（同一时刻至多一个），
 * pending 为排在其后的构建。lane 由调度器实例独占。
 */

import { AuditLogger } from "../audit/logger.js";
import { createLogger } from "../logger.js";
import type { JobRegistry } from "../jobs/registry.js";
import type { Build, JobDefinition, TriggerEvent } from "../types/index.js";
import { isTerminal } from "./build-state.js";
import type { BuildExecutor } from "./engine.js";
import { Notifier } from "./notifier.js";
import { TaskQueue } from "./queue.js";
import { StateStore } from "./state.js";

const logger = createLogger("scheduler");

interface LaneEntry {
  build: Build;
  /** 入队时的作业定义快照，配置重载不影响已入队构建 */
  job: JobDefinition;
}

interface JobLane {
  admitted: LaneEntry | null;
  pending: LaneEntry[];
}

export interface SchedulerOptions {
  registry: JobRegistry;
  executor: BuildExecutor;
  stateStore: StateStore;
  auditLogger: AuditLogger;
  notifier: Notifier;
  queue: TaskQueue;
}

/** /status 用的 lane 快照 */
export interface LaneSnapshot {
  jobId: string;
  running: number | null;
  queued: number[];
}

export class Scheduler {
  private readonly lanes = new Map<string, JobLane>();
  private readonly notifications = new Set<Promise<void>>();
  private lastBuildId: number;

  constructor(private readonly options: SchedulerOptions) {
    this.lastBuildId = options.stateStore.maxBuildId();
  }

  /** 提交触发事件；重复投递与无匹配作业时不创建构建 */
  submit(trigger: TriggerEvent): Build | undefined {
    if (trigger.duplicate) {
      logger.info(
        { triggerId: trigger.id, repositoryId: trigger.repositoryId, ref: trigger.ref, commitSha: trigger.commitSha },
        "Duplicate trigger coalesced",
      );
      return undefined;
    }

    const job = this.options.registry.resolve(trigger);
    if (!job) {
      logger.info({ triggerId: trigger.id, repositoryId: trigger.repositoryId, ref: trigger.ref }, "No job matches trigger, dropped");
      return undefined;
    }

    const build: Build = {
      id: ++this.lastBuildId,
      jobId: job.id,
      trigger,
      state: "queued",
      stageResults: [],
      createdAt: new Date().toISOString(),
    };
    this.options.stateStore.save(build);
    this.options.auditLogger.log({
      timestamp: build.createdAt,
      buildId: build.id,
      event: "build_queued",
      metadata: { jobId: job.id, triggerId: trigger.id, policy: job.concurrencyPolicy },
    });

    const lane = this.lane(job.id);
    if (job.concurrencyPolicy === "latest-wins") {
      this.supersede(lane, build);
    }
    lane.pending.push({ build, job });
    logger.info({ buildId: build.id, jobId: job.id, commitSha: trigger.commitSha }, "Build queued");

    this.pump(job.id);
    return build;
  }

  /** 已提交但尚未开始的构建全部取消，正在运行的构建不受影响 */
  private supersede(lane: JobLane, newer: Build): void {
    const reason = `superseded by build #${newer.id}`;
    for (const entry of lane.pending.splice(0)) {
      this.cancel(entry.build, reason);
    }
    if (lane.admitted && lane.admitted.build.state === "queued") {
      this.cancel(lane.admitted.build, reason);
    }
  }

  private cancel(build: Build, reason: string): void {
    build.state = "cancelled";
    build.error = reason;
    build.finishedAt = new Date().toISOString();
    this.options.stateStore.save(build);
    this.options.auditLogger.log({
      timestamp: build.finishedAt,
      buildId: build.id,
      event: "build_cancelled",
      metadata: { reason },
    });
    logger.info({ buildId: build.id, jobId: build.jobId, reason }, "Build cancelled");

    const delivery = this.options.notifier
      .notify(build)
      .then(() => undefined)
      .catch((err: unknown) => {
        logger.error({ buildId: build.id, err }, "Cancellation notification failed");
      })
      .finally(() => {
        this.notifications.delete(delivery);
      });
    this.notifications.add(delivery);
  }

  /** 当前作业没有已放行的构建时，放行下一个 */
  private pump(jobId: string): void {
    const lane = this.lanes.get(jobId);
    if (!lane || lane.admitted) return;

    const next = lane.pending.shift();
    if (!next) {
      this.lanes.delete(jobId);
      return;
    }
    lane.admitted = next;
    this.options.queue.enqueue(() => this.run(jobId, next));
  }

  private async run(jobId: string, entry: LaneEntry): Promise<void> {
    try {
      // 等待执行槽期间被替换
      if (isTerminal(entry.build.state)) return;
      const result = await this.options.executor.execute(entry.build, entry.job);
      logger.info({ buildId: result.id, jobId, state: result.state }, "Build finished");
    } catch (err) {
      logger.error({ buildId: entry.build.id, jobId, err }, "Build execution failed unexpectedly");
    } finally {
      const lane = this.lanes.get(jobId);
      if (lane && lane.admitted === entry) {
        lane.admitted = null;
      }
      this.pump(jobId);
    }
  }

  private lane(jobId: string): JobLane {
    let lane = this.lanes.get(jobId);
    if (!lane) {
      lane = { admitted: null, pending: [] };
      this.lanes.set(jobId, lane);
    }
    return lane;
  }

  snapshot(): LaneSnapshot[] {
    return [...this.lanes.entries()].map(([jobId, lane]) => ({
      jobId,
      running: lane.admitted && lane.admitted.build.state === "running" ? lane.admitted.build.id : null,
      queued: [
        ...(lane.admitted && lane.admitted.build.state === "queued" ? [lane.admitted.build.id] : []),
        ...lane.pending.map((e) => e.build.id),
      ],
    }));
  }

  /** 全局执行队列的占用情况 */
  queueLoad(): { running: number; waiting: number } {
    return { running: this.options.queue.pending, waiting: this.options.queue.size };
  }

  /** 等待所有构建与取消通知完成 */
  async drain(): Promise<void> {
    await this.options.queue.drain();
    await Promise.allSettled([...this.notifications]);
  }
}
