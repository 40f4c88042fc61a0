/**
 * 配置模块 — 从环境变量读取所有配置项
 */

import "dotenv/config";
import path from "node:path";

export interface GitLabConfig {
  url: string;
  token: string;
  webhookSecret: string;
}

export interface GitHubConfig {
  token: string;
  webhookSecret: string;
}

export interface GenericWebhookConfig {
  token: string;
}

export interface Config {
  port: number;
  nodeEnv: string;
  logLevel: string;
  sqlitePath: string;
  workspaceDir: string;
  auditDir: string;
  jobsConfigPath: string;
  secretsDir: string;
  gitlab: GitLabConfig;
  github: GitHubConfig;
  generic: GenericWebhookConfig;
  /** 重复投递去重窗口（毫秒） */
  dedupWindowMs: number;
  /** 全局并发构建数上限 */
  maxConcurrentBuilds: number;
  defaultStageTimeoutMs: number;
  keepWorkspaces: boolean;
  wecomWebhookUrl: string;
  notifyWebhookUrl: string;
  /** 对外访问地址，用于 commit status 的跳转链接 */
  publicUrl: string;
}

function env(key: string, fallback = ""): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const parsed = parseInt(env(key), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function envBool(key: string): boolean {
  return ["1", "true", "yes"].includes(env(key).toLowerCase());
}

export function loadConfig(): Config {
  return {
    port: envInt("PORT", 8080),
    nodeEnv: env("NODE_ENV", "development"),
    logLevel: env("LOG_LEVEL", "info"),
    sqlitePath: env("SQLITE_PATH", "./data/pipeline.db"),
    workspaceDir: path.resolve(env("WORKSPACE_DIR", "./data/workspaces")),
    auditDir: path.resolve(env("AUDIT_DIR", "./data/audit")),
    jobsConfigPath: path.resolve(env("JOBS_CONFIG", "./jobs.json")),
    secretsDir: path.resolve(env("SECRETS_DIR", "./secrets")),
    gitlab: {
      url: env("GITLAB_URL"),
      token: env("GITLAB_TOKEN"),
      webhookSecret: env("GITLAB_WEBHOOK_SECRET"),
    },
    github: {
      token: env("GITHUB_TOKEN"),
      webhookSecret: env("GITHUB_WEBHOOK_SECRET"),
    },
    generic: {
      token: env("GENERIC_WEBHOOK_TOKEN"),
    },
    dedupWindowMs: envInt("DEDUP_WINDOW_MS", 10 * 60_000),
    maxConcurrentBuilds: envInt("MAX_CONCURRENT_BUILDS", 4),
    defaultStageTimeoutMs: envInt("DEFAULT_STAGE_TIMEOUT_MS", 10 * 60_000),
    keepWorkspaces: envBool("KEEP_WORKSPACES"),
    wecomWebhookUrl: env("WECOM_WEBHOOK_URL"),
    notifyWebhookUrl: env("NOTIFY_WEBHOOK_URL"),
    publicUrl: env("PUBLIC_URL"),
  };
}

/** 全局配置单例 */
export const config = loadConfig();
