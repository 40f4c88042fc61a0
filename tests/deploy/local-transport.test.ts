import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalTransport } from "../../src/deploy/local-transport.js";
import { FakeRunner, makeTarget } from "../helpers/factories.js";

describe("LocalTransport", () => {
  let tmpDir: string;
  let baseDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "local-transport-test-"));
    baseDir = path.join(tmpDir, "workspace");
    fs.mkdirSync(path.join(baseDir, "dist", "assets"), { recursive: true });
    fs.writeFileSync(path.join(baseDir, "dist", "index.html"), "<h1>ok</h1>");
    fs.writeFileSync(path.join(baseDir, "dist", "assets", "app.js"), "console.log(1)");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const files = ["dist/assets/app.js", "dist/index.html"];

  it("复制产物到目标目录，保留相对路径", async () => {
    const remoteDirectory = path.join(tmpDir, "www");
    const transport = new LocalTransport({ runner: new FakeRunner(), postCommandTimeoutMs: 1000 });
    const log: string[] = [];

    const result = await transport.deploy(
      { baseDir, files },
      makeTarget({ transport: "local", host: "localhost", remoteDirectory, stripPrefix: "dist/" }),
      (chunk) => log.push(chunk),
    );

    expect(result).toEqual({ target: "web-1", host: "localhost", transferred: true, files: 2 });
    expect(fs.readFileSync(path.join(remoteDirectory, "index.html"), "utf-8")).toBe("<h1>ok</h1>");
    expect(fs.existsSync(path.join(remoteDirectory, "assets", "app.js"))).toBe(true);
    expect(log).toEqual([`[web-1] copied 2 file(s) to ${remoteDirectory}\n`]);
  });

  it("执行 post 命令并记录结果", async () => {
    const remoteDirectory = path.join(tmpDir, "www");
    const runner = new FakeRunner({ "./reload.sh": { exitCode: 3 } });
    const transport = new LocalTransport({ runner, postCommandTimeoutMs: 1000 });

    const result = await transport.deploy(
      { baseDir, files },
      makeTarget({ transport: "local", host: "127.0.0.1", remoteDirectory, postCommand: "./reload.sh" }),
      () => {},
    );

    expect(result.transferred).toBe(true);
    expect(result.postCommandOk).toBe(false);
    expect(result.error).toBe("post command exited with 3");
    expect(runner.calls[0]?.cwd).toBe(remoteDirectory);
  });

  it("非本机主机直接失败", async () => {
    const transport = new LocalTransport({ runner: new FakeRunner(), postCommandTimeoutMs: 1000 });

    const result = await transport.deploy({ baseDir, files }, makeTarget({ transport: "local", host: "10.0.0.5" }), () => {});

    expect(result).toEqual({
      target: "web-1",
      host: "10.0.0.5",
      transferred: false,
      files: 0,
      error: 'local transport cannot reach host "10.0.0.5"',
    });
  });

  it("中止后不再复制文件", async () => {
    const remoteDirectory = path.join(tmpDir, "www");
    const controller = new AbortController();
    controller.abort(new Error('Stage "deploy" timed out after 50ms'));
    const transport = new LocalTransport({ runner: new FakeRunner(), postCommandTimeoutMs: 1000 });

    const result = await transport.deploy(
      { baseDir, files },
      makeTarget({ transport: "local", host: "localhost", remoteDirectory }),
      () => {},
      controller.signal,
    );

    expect(result).toEqual({
      target: "web-1",
      host: "localhost",
      transferred: false,
      files: 0,
      error: 'aborted: Stage "deploy" timed out after 50ms',
    });
    expect(fs.existsSync(remoteDirectory)).toBe(false);
  });

  it("post 命令收到同一个 signal", async () => {
    const controller = new AbortController();
    const runner = new FakeRunner();
    const transport = new LocalTransport({ runner, postCommandTimeoutMs: 1000 });

    await transport.deploy(
      { baseDir, files },
      makeTarget({ transport: "local", host: "localhost", remoteDirectory: path.join(tmpDir, "www"), postCommand: "./reload.sh" }),
      () => {},
      controller.signal,
    );

    expect(runner.calls[0]?.signal).toBe(controller.signal);
  });
});
