import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collectArtifacts, remotePath, shellQuote } from "../../src/deploy/artifacts.js";

describe("collectArtifacts", () => {
  let workspace: string;

  function touch(rel: string): void {
    const file = path.join(workspace, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, rel);
  }

  beforeEach(() => {
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), "artifacts-test-"));
    touch("dist/index.html");
    touch("dist/assets/app.js");
    touch("dist/.htaccess");
    touch("src/main.ts");
    touch(".git/HEAD");
  });

  afterEach(() => {
    fs.rmSync(workspace, { recursive: true, force: true });
  });

  it("按 glob 匹配文件，保留相对路径并排序", async () => {
    const set = await collectArtifacts(workspace, ["dist/**"]);
    expect(set.baseDir).toBe(path.resolve(workspace));
    expect(set.files).toEqual(["dist/.htaccess", "dist/assets/app.js", "dist/index.html"]);
  });

  it("多个模式的结果去重", async () => {
    const set = await collectArtifacts(workspace, ["dist/*.html", "dist/index.html"]);
    expect(set.files).toEqual(["dist/index.html"]);
  });

  it("从不包含 .git 目录", async () => {
    const set = await collectArtifacts(workspace, ["**/*"]);
    expect(set.files).not.toContain(".git/HEAD");
    expect(set.files).toContain("src/main.ts");
  });

  it("artifactBase 改变相对路径的根", async () => {
    const set = await collectArtifacts(workspace, ["**/*.js"], "dist");
    expect(set.baseDir).toBe(path.join(path.resolve(workspace), "dist"));
    expect(set.files).toEqual(["assets/app.js"]);
  });

  it("artifactBase 不能越出工作目录", async () => {
    await expect(collectArtifacts(workspace, ["**"], "../")).rejects.toThrow('artifactBase "../" escapes the workspace');
  });

  it("没有匹配时返回空列表", async () => {
    const set = await collectArtifacts(workspace, ["build/**"]);
    expect(set.files).toEqual([]);
  });
});

describe("remotePath", () => {
  it("拼接远端目录", () => {
    expect(remotePath("dist/index.html", { remoteDirectory: "/var/www/html" })).toBe("/var/www/html/dist/index.html");
  });

  it("去除前缀", () => {
    expect(remotePath("dist/assets/app.js", { remoteDirectory: "/var/www/html", stripPrefix: "dist/" })).toBe(
      "/var/www/html/assets/app.js",
    );
  });
});

describe("shellQuote", () => {
  it("转义单引号", () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
  });
});
