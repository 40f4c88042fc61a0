/**
 * 流水线引擎 — 单个构建的阶段状态机
 *
 * 按声明顺序执行阶段，第一个未通过的阶段之后全部记为 skipped。
 * post 阶段只能位于末尾，其失败不阻断后续 post 阶段。
 * 检出失败、凭据解析失败归为 errored，命令非零退出与超时归为 failed。
 */

import type { GitAdapter } from "../adapters/git-adapter.js";
import { AuditLogger, type StageLog } from "../audit/logger.js";
import { collectArtifacts } from "../deploy/artifacts.js";
import { failedTransfer, type TransportSet } from "../deploy/transport.js";
import { errorMessage, PreconditionError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { SecretStore } from "../secrets/secret-store.js";
import type {
  Build,
  DeployTarget,
  EventSource,
  JobDefinition,
  StageDefinition,
  StageResult,
  TransferResult,
} from "../types/index.js";
import { deriveBuildState, firstBlockingResult, interruptRemaining, skippedResult } from "./build-state.js";
import { Notifier } from "./notifier.js";
import type { ProcessRunner } from "./runner.js";
import { StateStore } from "./state.js";
import { cleanWorkspace, createWorkspace } from "./workspace.js";

const logger = createLogger("engine");

/** 调度器依赖的执行接口 */
export interface BuildExecutor {
  execute(build: Build, job: JobDefinition): Promise<Build>;
}

export interface EngineOptions {
  stateStore: StateStore;
  auditLogger: AuditLogger;
  notifier: Notifier;
  secrets: SecretStore;
  runner: ProcessRunner;
  transports: TransportSet;
  getAdapter: (source: EventSource) => GitAdapter;
  workspaceDir: string;
  defaultStageTimeoutMs: number;
  keepWorkspaces?: boolean;
}

/** 预检结果：检出所需的仓库令牌 */
interface Preflight {
  workspace: string;
  repositoryToken?: string;
}

/** 阶段执行结果（不含公共字段） */
type StageOutcome = Omit<StageResult, "stage" | "kind" | "logsRef" | "durationMs">;

class StageTimeoutError extends Error {
  constructor(stage: string, ms: number) {
    super(`Stage "${stage}" timed out after ${ms}ms`);
    this.name = "StageTimeoutError";
  }
}

/**
 * 到期时通过 signal 中止 work，并等待 work 自身结束后才以 StageTimeoutError 拒绝，
 * 阶段结束时不再有传输或子进程在使用工作目录。
 */
async function withDeadline<T>(work: (signal: AbortSignal) => Promise<T>, ms: number, stage: string): Promise<T> {
  const controller = new AbortController();
  const timeout = new StageTimeoutError(stage, ms);
  const timer = setTimeout(() => controller.abort(timeout), ms);
  try {
    const result = await work(controller.signal);
    if (controller.signal.aborted) throw timeout;
    return result;
  } catch (err) {
    throw controller.signal.aborted ? timeout : err;
  } finally {
    clearTimeout(timer);
  }
}

export class PipelineEngine implements BuildExecutor {
  constructor(private readonly options: EngineOptions) {}

  /** 执行构建直至终态，返回终态记录；不抛出 */
  async execute(build: Build, job: JobDefinition): Promise<Build> {
    const { stateStore, auditLogger } = this.options;

    build.state = "running";
    build.startedAt = new Date().toISOString();
    stateStore.save(build);
    auditLogger.log({
      timestamp: build.startedAt,
      buildId: build.id,
      event: "build_start",
      metadata: { jobId: job.id, commitSha: build.trigger.commitSha, ref: build.trigger.ref },
    });

    let workspace: string | undefined;
    try {
      const preflight = await this.preflight(build, job);
      workspace = preflight.workspace;
      await this.runStages(build, job, preflight);
    } catch (err) {
      if (err instanceof PreconditionError) {
        this.abortWithPrecondition(build, job, err.message);
      } else {
        logger.error({ buildId: build.id, err }, "Unexpected fault while executing build");
        this.abortWithPrecondition(build, job, `internal error: ${errorMessage(err)}`);
      }
    } finally {
      if (workspace && !this.options.keepWorkspaces) {
        cleanWorkspace(workspace);
      }
    }

    return this.finish(build, job);
  }

  /** 阶段开始前的前置条件：工作目录与所有凭据句柄 */
  private async preflight(build: Build, job: JobDefinition): Promise<Preflight> {
    const errors: string[] = [];
    let workspace = "";
    try {
      workspace = createWorkspace(this.options.workspaceDir, job.id, build.id);
    } catch (err) {
      throw new PreconditionError(`workspace unavailable: ${errorMessage(err)}`);
    }

    let repositoryToken: string | undefined;
    if (job.credentialHandle) {
      try {
        repositoryToken = (await this.options.secrets.get(job.credentialHandle)).trim();
      } catch (err) {
        errors.push(`repository credential: ${errorMessage(err)}`);
      }
    }

    if (job.stages.some((s) => s.kind === "deploy")) {
      for (const target of job.deployTargets) {
        if (!target.credentialHandle) continue;
        try {
          await this.options.secrets.get(target.credentialHandle);
        } catch (err) {
          errors.push(`deploy target ${target.name}: ${errorMessage(err)}`);
        }
      }
    }

    if (errors.length > 0) {
      cleanWorkspace(workspace);
      throw new PreconditionError(`secret resolution failed: ${errors.join("; ")}`);
    }
    return { workspace, repositoryToken };
  }

  private async runStages(build: Build, job: JobDefinition, preflight: Preflight): Promise<void> {
    let halted = false;
    // post 阶段失败后只允许继续执行 post 阶段
    let postFailed = false;

    for (const [index, stage] of job.stages.entries()) {
      if (halted || (postFailed && stage.kind !== "post")) {
        halted = true;
        this.appendResult(build, skippedResult(stage));
        this.options.auditLogger.log({
          timestamp: new Date().toISOString(),
          buildId: build.id,
          stage: stage.name,
          event: "stage_skipped",
        });
        continue;
      }

      const result = await this.runStage(build, job, stage, index, preflight);
      this.appendResult(build, result);
      if (result.status !== "passed") {
        if (stage.kind === "post") postFailed = true;
        else halted = true;
      }
    }
  }

  /** 执行单个阶段 */
  private async runStage(
    build: Build,
    job: JobDefinition,
    stage: StageDefinition,
    index: number,
    preflight: Preflight,
  ): Promise<StageResult> {
    const { auditLogger } = this.options;
    const startedAt = Date.now();
    const stageLog = auditLogger.openStageLog(build.id, index, stage.name);
    const timeoutMs = stage.timeoutMs ?? this.options.defaultStageTimeoutMs;

    auditLogger.log({
      timestamp: new Date(startedAt).toISOString(),
      buildId: build.id,
      stage: stage.name,
      event: "stage_start",
      metadata: { kind: stage.kind, timeoutMs },
    });

    let outcome: StageOutcome;
    switch (stage.kind) {
      case "checkout":
        outcome = await this.checkout(build, job, stage, preflight, stageLog, timeoutMs);
        break;
      case "command":
      case "post":
        outcome = await this.runCommand(build, stage, preflight.workspace, stageLog, timeoutMs);
        break;
      case "deploy":
        outcome = await this.deploy(build, job, stage, preflight.workspace, stageLog, timeoutMs);
        break;
      default:
        throw new Error(`Unknown stage kind: ${stage.kind satisfies never}`);
    }

    const durationMs = Date.now() - startedAt;
    auditLogger.log({
      timestamp: new Date().toISOString(),
      buildId: build.id,
      stage: stage.name,
      event: outcome.status === "passed" ? "stage_complete" : "stage_failed",
      duration: durationMs,
      metadata: { ...outcome.exitDetail },
    });

    return { stage: stage.name, kind: stage.kind, logsRef: stageLog.ref, durationMs, ...outcome };
  }

  /** 检出：任何失败（含超时）都表示无法评估代码，归为 infrastructure */
  private async checkout(
    build: Build,
    job: JobDefinition,
    stage: StageDefinition,
    preflight: Preflight,
    stageLog: StageLog,
    timeoutMs: number,
  ): Promise<StageOutcome> {
    const { trigger } = build;
    stageLog.write(`checkout ${trigger.commitSha} (${trigger.ref}) from ${job.repositoryUrl}\n`);
    try {
      const adapter = this.options.getAdapter(trigger.source);
      await withDeadline(
        (signal) =>
          adapter.checkout({
            repositoryUrl: job.repositoryUrl,
            ref: trigger.ref,
            commitSha: trigger.commitSha,
            workspace: preflight.workspace,
            token: preflight.repositoryToken,
            signal,
          }),
        timeoutMs,
        stage.name,
      );
      stageLog.write("checkout complete\n");
      return { status: "passed", exitDetail: { reason: "ok" } };
    } catch (err) {
      const message = errorMessage(err);
      stageLog.write(`${message}\n`);
      return { status: "failed", exitDetail: { reason: "infrastructure", message } };
    }
  }

  /** 外部命令：退出码 0 为 passed，其余为 failed */
  private async runCommand(
    build: Build,
    stage: StageDefinition,
    workspace: string,
    stageLog: StageLog,
    timeoutMs: number,
  ): Promise<StageOutcome> {
    const command = stage.command ?? "";
    stageLog.write(`$ ${command}\n`);
    const result = await this.options.runner.run({
      command,
      cwd: workspace,
      env: {
        CI: "true",
        BUILD_ID: String(build.id),
        JOB_ID: build.jobId,
        COMMIT_SHA: build.trigger.commitSha,
        REF: build.trigger.ref,
        WORKSPACE: workspace,
        ...stage.env,
      },
      timeoutMs,
      onOutput: (chunk) => stageLog.write(chunk),
    });

    if (result.timedOut) {
      return { status: "failed", exitDetail: { reason: "timeout", message: `timed out after ${timeoutMs}ms` } };
    }
    if (result.exitCode === 0) {
      return { status: "passed", exitDetail: { reason: "ok", exitCode: 0 } };
    }
    return {
      status: "failed",
      exitDetail: {
        reason: "exit",
        exitCode: result.exitCode ?? undefined,
        message: result.error ?? `exited with code ${result.exitCode}`,
      },
    };
  }

  /** 部署：汇总所有目标的结果后再决定阶段状态 */
  private async deploy(
    build: Build,
    job: JobDefinition,
    stage: StageDefinition,
    workspace: string,
    stageLog: StageLog,
    timeoutMs: number,
  ): Promise<StageOutcome> {
    // 已结束的目标，超时时仍随阶段结果保留
    const completed: TransferResult[] = [];
    try {
      const artifacts = await collectArtifacts(workspace, stage.artifacts ?? [], stage.artifactBase);
      stageLog.write(`matched ${artifacts.files.length} artifact(s) under ${stage.artifactBase ?? "."}\n`);
      if (artifacts.files.length === 0) {
        return { status: "failed", exitDetail: { reason: "deploy", message: "no artifacts matched" } };
      }

      const deployOne = async (target: DeployTarget, signal: AbortSignal): Promise<TransferResult> => {
        const transport = this.options.transports[target.transport];
        let result: TransferResult;
        try {
          result = await transport.deploy(artifacts, target, (chunk) => stageLog.write(chunk), signal);
        } catch (err) {
          result = failedTransfer(target, errorMessage(err));
        }
        completed.push(result);
        this.options.auditLogger.log({
          timestamp: new Date().toISOString(),
          buildId: build.id,
          stage: stage.name,
          event: "deploy_target",
          metadata: { ...result },
        });
        return result;
      };

      const run = async (signal: AbortSignal): Promise<TransferResult[]> => {
        if (job.deployMode === "parallel") {
          return Promise.all(job.deployTargets.map((target) => deployOne(target, signal)));
        }
        const results: TransferResult[] = [];
        for (const target of job.deployTargets) {
          if (signal.aborted) break;
          results.push(await deployOne(target, signal));
        }
        return results;
      };

      const targets = await withDeadline(run, timeoutMs, stage.name);
      const failed = targets.filter((t) => !t.transferred || t.postCommandOk === false);
      if (failed.length === 0) {
        return { status: "passed", exitDetail: { reason: "ok" }, targets };
      }
      return {
        status: "failed",
        exitDetail: {
          reason: "deploy",
          message: `${failed.length} of ${targets.length} target(s) failed: ${failed.map((t) => `${t.target}: ${t.error ?? "failed"}`).join("; ")}`,
        },
        targets,
      };
    } catch (err) {
      const message = errorMessage(err);
      stageLog.write(`${message}\n`);
      if (err instanceof StageTimeoutError) {
        return { status: "failed", exitDetail: { reason: "timeout", message }, targets: completed };
      }
      return { status: "failed", exitDetail: { reason: "deploy", message } };
    }
  }

  /** 按阶段顺序追加结果并持久化 */
  private appendResult(build: Build, result: StageResult): void {
    build.stageResults.push(result);
    this.options.stateStore.save(build);
  }

  /** 前置条件失败：下一个阶段记为 infrastructure 失败，其余 skipped */
  private abortWithPrecondition(build: Build, job: JobDefinition, message: string): void {
    logger.warn({ buildId: build.id, jobId: job.id, reason: message }, "Build could not be evaluated");
    build.error = message;
    build.stageResults = interruptRemaining(build.stageResults, job.stages, message);
  }

  /** 写入终态、审计并通知 */
  private async finish(build: Build, job: JobDefinition): Promise<Build> {
    const { stateStore, auditLogger, notifier } = this.options;

    build.state = deriveBuildState(build.stageResults, job.stages.length);
    const blocking = firstBlockingResult(build.stageResults);
    if (build.state === "errored" && !build.error && blocking) {
      build.error = blocking.exitDetail.message;
    }
    build.finishedAt = new Date().toISOString();
    stateStore.save(build);
    auditLogger.log({
      timestamp: build.finishedAt,
      buildId: build.id,
      event: "build_complete",
      duration: Date.parse(build.finishedAt) - Date.parse(build.startedAt ?? build.createdAt),
      metadata: { state: build.state },
    });

    const report = await notifier.notify(build);
    auditLogger.log({
      timestamp: new Date().toISOString(),
      buildId: build.id,
      event: "notify",
      metadata: { ...report },
    });
    return build;
  }
}
