/**
 * 本机传输 — 复制到本地目录（与流水线同机部署），post 命令在本机执行
 */

import fs from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { ProcessRunner } from "../pipeline/runner.js";
import type { DeployTarget, TransferResult } from "../types/index.js";
import { remotePath, type ArtifactSet } from "./artifacts.js";
import { abortMessage, type DeploymentTransport } from "./transport.js";

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "::1"]);

export interface LocalTransportOptions {
  runner: ProcessRunner;
  postCommandTimeoutMs: number;
}

export class LocalTransport implements DeploymentTransport {
  readonly kind = "local" as const;

  constructor(private readonly options: LocalTransportOptions) {}

  async deploy(
    artifacts: ArtifactSet,
    target: DeployTarget,
    log: (chunk: string) => void,
    signal?: AbortSignal,
  ): Promise<TransferResult> {
    const result: TransferResult = { target: target.name, host: target.host, transferred: false, files: 0 };
    if (!LOCAL_HOSTS.has(target.host)) {
      result.error = `local transport cannot reach host "${target.host}"`;
      return result;
    }

    try {
      for (const rel of artifacts.files) {
        signal?.throwIfAborted();
        const dest = remotePath(rel, target);
        await fs.mkdir(path.dirname(dest), { recursive: true });
        await fs.copyFile(path.join(artifacts.baseDir, rel), dest);
      }
      result.transferred = true;
      result.files = artifacts.files.length;
      log(`[${target.name}] copied ${artifacts.files.length} file(s) to ${target.remoteDirectory}\n`);
    } catch (err) {
      result.error = signal?.aborted ? abortMessage(signal) : errorMessage(err);
      return result;
    }

    if (target.postCommand) {
      log(`[${target.name}] $ ${target.postCommand}\n`);
      const exec = await this.options.runner.run({
        command: target.postCommand,
        cwd: target.remoteDirectory,
        env: {},
        timeoutMs: this.options.postCommandTimeoutMs,
        onOutput: log,
        signal,
      });
      result.postCommandOk = exec.exitCode === 0 && !exec.timedOut;
      if (!result.postCommandOk) {
        result.error = exec.timedOut
          ? "post command timed out"
          : signal?.aborted
          ? `post command ${abortMessage(signal)}`
          : `post command exited with ${exec.exitCode ?? exec.error ?? "unknown status"}`;
      }
    }
    return result;
  }
}
