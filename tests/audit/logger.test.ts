import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { AuditLogger } from "../../src/audit/logger.js";
import type { AuditRecord } from "../../src/types/index.js";

describe("AuditLogger", () => {
  let tmpDir: string;
  let logger: AuditLogger;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "audit-test-"));
    logger = new AuditLogger(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function makeRecord(overrides: Partial<AuditRecord> = {}): AuditRecord {
    return {
      timestamp: new Date().toISOString(),
      buildId: 1,
      event: "build_start",
      ...overrides,
    };
  }

  it("应自动创建审计目录", () => {
    const nestedDir = path.join(tmpDir, "a", "b", "c");
    new AuditLogger(nestedDir);
    expect(fs.existsSync(nestedDir)).toBe(true);
  });

  it("应按顺序追加多条记录", () => {
    logger.log(makeRecord({ event: "build_start" }));
    logger.log(makeRecord({ event: "stage_start", stage: "test" }));
    logger.log(makeRecord({ event: "stage_complete", stage: "test", duration: 1200 }));

    const records = logger.getBuildLog(1);
    expect(records.map((r) => r.event)).toEqual(["build_start", "stage_start", "stage_complete"]);
    expect(records[2]?.duration).toBe(1200);
  });

  it("不同构建应写入不同文件", () => {
    logger.log(makeRecord({ buildId: 1 }));
    logger.log(makeRecord({ buildId: 2 }));

    expect(logger.getBuildLog(1)).toHaveLength(1);
    expect(logger.getBuildLog(2)).toHaveLength(1);
    expect(fs.existsSync(path.join(tmpDir, "build-2.jsonl"))).toBe(true);
  });

  it("不存在的构建应返回空数组", () => {
    expect(logger.getBuildLog(404)).toEqual([]);
  });

  it("应正确序列化 metadata 字段", () => {
    logger.log(makeRecord({ event: "deploy_target", metadata: { target: "web-1", transferred: true, files: 3 } }));
    expect(logger.getBuildLog(1)[0]?.metadata).toEqual({ target: "web-1", transferred: true, files: 3 });
  });

  it("阶段日志写入独立文件，文件名经过清洗", () => {
    const stageLog = logger.openStageLog(3, 1, "unit tests");
    stageLog.write("ok 1\n");
    stageLog.write("ok 2\n");

    expect(stageLog.ref).toBe(path.join(path.resolve(tmpDir), "build-3", "1-unit_tests.log"));
    expect(logger.readStageLog(stageLog.ref)).toBe("ok 1\nok 2\n");
  });

  it("审计目录之外的日志引用不可读取", () => {
    const outside = path.join(os.tmpdir(), "outside.log");
    expect(logger.readStageLog(outside)).toBeNull();
    expect(logger.readStageLog(path.join(tmpDir, "build-9", "0-missing.log"))).toBeNull();
  });
});
