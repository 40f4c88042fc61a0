/**
 * 作业注册表 — 按仓库与 ref 模式解析 TriggerEvent 对应的作业
 */

import { minimatch } from "minimatch";
import { createLogger } from "../logger.js";
import type { JobDefinition, TriggerEvent } from "../types/index.js";
import { loadJobDefinitions } from "./job-config.js";

const logger = createLogger("job-registry");

const BRANCH_PREFIX = "refs/heads/";

/** ref 模式匹配：同时尝试完整 ref 与短分支名 */
export function matchRef(pattern: string, ref: string): boolean {
  if (minimatch(ref, pattern)) return true;
  if (ref.startsWith(BRANCH_PREFIX)) {
    return minimatch(ref.slice(BRANCH_PREFIX.length), pattern);
  }
  return false;
}

/** 仓库匹配：作业的 repository 可以是仓库 ID 或克隆地址 */
function matchRepository(job: JobDefinition, trigger: TriggerEvent): boolean {
  const candidates = [trigger.repositoryId, trigger.repositoryUrl].filter(
    (v): v is string => typeof v === "string" && v.length > 0,
  );
  return candidates.some((c) => c === job.repository || c === job.repositoryUrl);
}

export class JobRegistry {
  private jobs: JobDefinition[];

  constructor(
    jobs: JobDefinition[] = [],
    private readonly configPath?: string,
  ) {
    this.jobs = [...jobs];
  }

  /** 从配置文件创建 */
  static fromFile(configPath: string): JobRegistry {
    return new JobRegistry(loadJobDefinitions(configPath), configPath);
  }

  /** 重新加载配置；失败时保留原有定义并抛出 */
  reload(): JobDefinition[] {
    if (!this.configPath) return this.list();
    this.jobs = loadJobDefinitions(this.configPath);
    logger.info({ jobs: this.jobs.map((j) => j.id) }, "Job definitions reloaded");
    return this.list();
  }

  /** 第一个匹配的作业胜出 */
  resolve(trigger: TriggerEvent): JobDefinition | undefined {
    return this.jobs.find((job) => matchRepository(job, trigger) && matchRef(job.refPattern, trigger.ref));
  }

  get(jobId: string): JobDefinition | undefined {
    return this.jobs.find((job) => job.id === jobId);
  }

  list(): JobDefinition[] {
    return [...this.jobs];
  }
}
