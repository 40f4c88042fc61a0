/**
 * jobs.json 作业配置 — zod 校验后转换为 JobDefinition
 *
 * 示例：
 * {
 *   "jobs": [{
 *     "id": "site",
 *     "repository": "acme/site",
 *     "repositoryUrl": "https://github.com/acme/site.git",
 *     "refPattern": "main",
 *     "stages": [
 *       { "name": "checkout", "kind": "checkout" },
 *       { "name": "test", "kind": "command", "command": "npm test" },
 *       { "name": "deploy", "kind": "deploy", "artifacts": ["dist/**"] }
 *     ],
 *     "deployTargets": [{ "name": "web-1", "host": "10.0.0.5", "remoteDirectory": "/var/www/html", "credentialHandle": "web-key" }]
 *   }]
 * }
 */

import fs from "node:fs";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { JobDefinition } from "../types/index.js";

const stageSchema = z
  .object({
    name: z.string().min(1),
    kind: z.enum(["checkout", "command", "deploy", "post"]),
    command: z.string().min(1).optional(),
    artifacts: z.array(z.string().min(1)).optional(),
    artifactBase: z.string().optional(),
    timeoutMs: z.number().int().positive().optional(),
    env: z.record(z.string()).optional(),
  })
  .superRefine((stage, ctx) => {
    if ((stage.kind === "command" || stage.kind === "post") && !stage.command) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `stage "${stage.name}" requires a command` });
    }
    if (stage.kind === "deploy" && (!stage.artifacts || stage.artifacts.length === 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `stage "${stage.name}" requires artifacts` });
    }
  });

const deployTargetSchema = z.object({
  name: z.string().min(1).optional(),
  transport: z.enum(["ssh", "local"]).default("ssh"),
  host: z.string().min(1),
  port: z.number().int().positive().optional(),
  username: z.string().min(1).optional(),
  remoteDirectory: z.string().min(1),
  credentialHandle: z.string().min(1).optional(),
  postCommand: z.string().min(1).optional(),
  stripPrefix: z.string().optional(),
});

const jobSchema = z
  .object({
    id: z.string().min(1),
    repository: z.string().min(1),
    repositoryUrl: z.string().min(1).optional(),
    refPattern: z.string().min(1).default("main"),
    credentialHandle: z.string().min(1).optional(),
    stages: z.array(stageSchema).min(1),
    deployTargets: z.array(deployTargetSchema).default([]),
    deployMode: z.enum(["sequential", "parallel"]).default("sequential"),
    concurrencyPolicy: z.enum(["serial", "latest-wins"]).default("serial"),
  })
  .superRefine((job, ctx) => {
    const names = new Set<string>();
    for (const stage of job.stages) {
      if (names.has(stage.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate stage name "${stage.name}"` });
      }
      names.add(stage.name);
    }
    // post 阶段尽力而为，只能位于末尾
    const firstPost = job.stages.findIndex((s) => s.kind === "post");
    if (firstPost >= 0) {
      for (const stage of job.stages.slice(firstPost + 1)) {
        if (stage.kind !== "post") {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `stage "${stage.name}" cannot follow post stage "${job.stages[firstPost]?.name}"`,
          });
        }
      }
    }
    if (job.stages.some((s) => s.kind === "deploy") && job.deployTargets.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "deploy stage declared without deployTargets" });
    }
    for (const target of job.deployTargets) {
      if (target.transport === "ssh" && !target.credentialHandle) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `ssh target "${target.name ?? target.host}" requires a credentialHandle`,
        });
      }
    }
  });

const jobsFileSchema = z.object({
  jobs: z.array(jobSchema),
});

export type JobsFile = z.input<typeof jobsFileSchema>;

/** 校验并归一化作业配置 */
export function parseJobDefinitions(input: unknown): JobDefinition[] {
  const result = jobsFileSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid job configuration: ${detail}`);
  }

  const ids = new Set<string>();
  return result.data.jobs.map((job) => {
    if (ids.has(job.id)) {
      throw new ConfigError(`Invalid job configuration: duplicate job id "${job.id}"`);
    }
    ids.add(job.id);
    return {
      ...job,
      repositoryUrl: job.repositoryUrl ?? job.repository,
      deployTargets: job.deployTargets.map((target, idx) => ({
        ...target,
        name: target.name ?? `${target.host}#${idx + 1}`,
      })),
    };
  });
}

/** 从文件加载作业配置 */
export function loadJobDefinitions(filePath: string): JobDefinition[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Job configuration not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Job configuration is not valid JSON: ${filePath} (${String(err)})`);
  }
  return parseJobDefinitions(raw);
}
