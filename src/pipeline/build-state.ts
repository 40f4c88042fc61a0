/**
 * 构建状态推导 — 已开始执行的构建，其状态只由 stageResults 决定
 *
 *   queued → running → {succeeded, failed, errored, cancelled}
 *
 * queued / cancelled 由调度器在执行前设置，其余状态由本函数推导。
 */

import type { BuildState, StageDefinition, StageResult } from "../types/index.js";

/** post 阶段失败只记录，不影响构建结果 */
export function isBestEffortFailure(result: StageResult): boolean {
  return result.kind === "post" && result.status === "failed";
}

/** 第一个阻断执行的阶段结果 */
export function firstBlockingResult(results: StageResult[]): StageResult | undefined {
  return results.find((r) => r.status !== "passed" && !isBestEffortFailure(r));
}

export function deriveBuildState(results: StageResult[], stageCount: number): BuildState {
  const blocking = firstBlockingResult(results);
  if (blocking) {
    return blocking.status === "failed" && blocking.exitDetail.reason === "infrastructure" ? "errored" : "failed";
  }
  return results.length < stageCount ? "running" : "succeeded";
}

export function isTerminal(state: BuildState): boolean {
  return state !== "queued" && state !== "running";
}

export function skippedResult(stage: StageDefinition): StageResult {
  return {
    stage: stage.name,
    kind: stage.kind,
    status: "skipped",
    exitDetail: { reason: "not_run" },
    durationMs: 0,
  };
}

/**
 * 构建无法继续评估：下一个未执行的阶段记为 infrastructure 失败，其余 skipped。
 * 所有阶段都已有结果时原样返回。
 */
export function interruptRemaining(results: StageResult[], stages: StageDefinition[], message: string): StageResult[] {
  const [next, ...rest] = stages.slice(results.length);
  if (!next) return results;
  return [
    ...results,
    { stage: next.name, kind: next.kind, status: "failed", exitDetail: { reason: "infrastructure", message }, durationMs: 0 },
    ...rest.map(skippedResult),
  ];
}
