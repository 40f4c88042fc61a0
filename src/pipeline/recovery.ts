/**
 * 重启收尾 — 上一个进程遗留的未完成构建不恢复执行，补齐阶段结果后写入终态并通知
 */

import { AuditLogger } from "../audit/logger.js";
import type { JobRegistry } from "../jobs/registry.js";
import { createLogger } from "../logger.js";
import type { Build, StageDefinition } from "../types/index.js";
import { deriveBuildState, firstBlockingResult, interruptRemaining } from "./build-state.js";
import { Notifier } from "./notifier.js";
import { StateStore } from "./state.js";

const logger = createLogger("recovery");

export const INTERRUPTED_MESSAGE = "interrupted by service restart";

export interface RecoveryOptions {
  stateStore: StateStore;
  auditLogger: AuditLogger;
  notifier: Notifier;
  registry: JobRegistry;
}

/** 作业定义已移除时，用一个占位阶段承载中断原因 */
function stagesFor(build: Build, registry: JobRegistry): StageDefinition[] {
  const job = registry.get(build.jobId);
  if (job) return job.stages;
  return [
    ...build.stageResults.map((r) => ({ name: r.stage, kind: r.kind })),
    { name: "interrupted", kind: "command" },
  ];
}

/** 收尾所有未到达终态的构建，返回处理后的记录 */
export async function closeInterruptedBuilds(options: RecoveryOptions): Promise<Build[]> {
  const { stateStore, auditLogger, notifier, registry } = options;
  const closed: Build[] = [];

  for (const build of stateStore.getIncomplete()) {
    build.stageResults = interruptRemaining(build.stageResults, stagesFor(build, registry), INTERRUPTED_MESSAGE);
    build.state = deriveBuildState(build.stageResults, build.stageResults.length);
    if (build.state === "errored") {
      build.error = firstBlockingResult(build.stageResults)?.exitDetail.message ?? INTERRUPTED_MESSAGE;
    }
    build.finishedAt = new Date().toISOString();
    stateStore.save(build);
    auditLogger.log({
      timestamp: build.finishedAt,
      buildId: build.id,
      event: "build_complete",
      metadata: { state: build.state, reason: INTERRUPTED_MESSAGE },
    });
    logger.warn({ buildId: build.id, jobId: build.jobId, state: build.state }, "Build interrupted by restart closed");

    await notifier.notify(build);
    closed.push(build);
  }
  return closed;
}
