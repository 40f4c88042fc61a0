/**
 * 审计日志模块 — 以 JSON Lines 格式记录构建执行过程，并保存各阶段输出
 */

import fs from "node:fs";
import path from "node:path";

import type { AuditRecord } from "../types/index.js";

/** 单个阶段的输出日志 */
export interface StageLog {
  /** 日志文件路径，作为 StageResult.logsRef */
  readonly ref: string;
  write(chunk: string): void;
}

export class AuditLogger {
  private readonly auditDir: string;

  constructor(auditDir: string) {
    this.auditDir = path.resolve(auditDir);
    this.ensureDir(this.auditDir);
  }

  /** 追加一条审计记录到对应构建的日志文件 */
  log(record: AuditRecord): void {
    const line = JSON.stringify(record) + "\n";
    fs.appendFileSync(this.filePath(record.buildId), line, "utf-8");
  }

  /** 读取指定构建的全部审计记录 */
  getBuildLog(buildId: number): AuditRecord[] {
    const filePath = this.filePath(buildId);
    if (!fs.existsSync(filePath)) {
      return [];
    }
    const content = fs.readFileSync(filePath, "utf-8");
    return content
      .split("\n")
      .filter((line) => line.trim() !== "")
      .map((line) => JSON.parse(line) as AuditRecord);
  }

  /** 打开阶段输出日志：build-<id>/<序号>-<阶段名>.log */
  openStageLog(buildId: number, index: number, stage: string): StageLog {
    const dir = path.join(this.auditDir, `build-${buildId}`);
    this.ensureDir(dir);
    const ref = path.join(dir, `${index}-${stage.replace(/[^A-Za-z0-9._-]/g, "_")}.log`);
    fs.writeFileSync(ref, "", "utf-8");
    return {
      ref,
      write: (chunk: string) => fs.appendFileSync(ref, chunk, "utf-8"),
    };
  }

  /** 读取阶段输出，日志不在审计目录内时返回 null */
  readStageLog(ref: string): string | null {
    const resolved = path.resolve(ref);
    if (!resolved.startsWith(this.auditDir + path.sep) || !fs.existsSync(resolved)) {
      return null;
    }
    return fs.readFileSync(resolved, "utf-8");
  }

  /** 获取日志文件路径 */
  private filePath(buildId: number): string {
    return path.join(this.auditDir, `build-${buildId}.jsonl`);
  }

  /** 确保目录存在 */
  private ensureDir(dir: string): void {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}
