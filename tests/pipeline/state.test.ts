import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StateStore } from "../../src/pipeline/state.js";
import type { Build, BuildState } from "../../src/types/index.js";
import { makeTrigger } from "../helpers/factories.js";

function makeBuild(id: number, state: BuildState, jobId = "site"): Build {
  return {
    id,
    jobId,
    trigger: makeTrigger(),
    state,
    stageResults: [],
    createdAt: new Date().toISOString(),
  };
}

describe("StateStore", () => {
  let store: StateStore;

  beforeEach(() => {
    store = new StateStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("保存后可按 id 读取", () => {
    const build = makeBuild(1, "queued");
    store.save(build);
    expect(store.get(1)).toEqual(build);
  });

  it("重复保存覆盖已有记录", () => {
    store.save(makeBuild(1, "queued"));
    store.save({ ...makeBuild(1, "running"), startedAt: "2024-01-01T00:00:00.000Z" });
    expect(store.get(1)?.state).toBe("running");
    expect(store.list()).toHaveLength(1);
  });

  it("不存在的构建返回 null", () => {
    expect(store.get(99)).toBeNull();
  });

  it("maxBuildId 在空库时为 0", () => {
    expect(store.maxBuildId()).toBe(0);
    store.save(makeBuild(5, "succeeded"));
    store.save(makeBuild(3, "failed"));
    expect(store.maxBuildId()).toBe(5);
  });

  it("getIncomplete 只返回 queued 与 running", () => {
    store.save(makeBuild(1, "succeeded"));
    store.save(makeBuild(2, "running"));
    store.save(makeBuild(3, "queued"));
    store.save(makeBuild(4, "cancelled"));
    expect(store.getIncomplete().map((b) => b.id)).toEqual([2, 3]);
  });

  it("list 按 id 倒序并支持过滤", () => {
    store.save(makeBuild(1, "succeeded", "site"));
    store.save(makeBuild(2, "failed", "api"));
    store.save(makeBuild(3, "failed", "site"));

    expect(store.list().map((b) => b.id)).toEqual([3, 2, 1]);
    expect(store.list({ state: "failed" }).map((b) => b.id)).toEqual([3, 2]);
    expect(store.list({ jobId: "site" }).map((b) => b.id)).toEqual([3, 1]);
    expect(store.list({ limit: 1 }).map((b) => b.id)).toEqual([3]);
  });
});
