/**
 * SSH 传输 — 基于 node-ssh，SFTP 上传 + 可选远端命令
 */

import path from "node:path";
import { NodeSSH } from "node-ssh";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { SecretStore } from "../secrets/secret-store.js";
import type { DeployTarget, TransferResult } from "../types/index.js";
import { remotePath, shellQuote, type ArtifactSet } from "./artifacts.js";
import { abortMessage, failedTransfer, type DeploymentTransport } from "./transport.js";

const logger = createLogger("ssh-transport");

export interface SshTransportOptions {
  secrets: SecretStore;
  /** 连接超时（毫秒） */
  readyTimeoutMs?: number;
  /** 并行上传文件数 */
  concurrency?: number;
  defaultUsername?: string;
}

export class SshTransport implements DeploymentTransport {
  readonly kind = "ssh" as const;

  constructor(private readonly options: SshTransportOptions) {}

  async deploy(
    artifacts: ArtifactSet,
    target: DeployTarget,
    log: (chunk: string) => void,
    signal?: AbortSignal,
  ): Promise<TransferResult> {
    if (!target.credentialHandle) {
      return failedTransfer(target, "no credentialHandle configured");
    }

    let privateKey: string;
    try {
      privateKey = await this.options.secrets.get(target.credentialHandle);
    } catch (err) {
      return failedTransfer(target, `credential resolution failed: ${errorMessage(err)}`);
    }
    if (signal?.aborted) {
      return failedTransfer(target, abortMessage(signal));
    }

    // 中止时断开连接，进行中的 SFTP 与远端命令随之失败
    const ssh = new NodeSSH();
    const onAbort = () => ssh.dispose();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      return await this.transfer(ssh, privateKey, artifacts, target, log, signal);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      ssh.dispose();
    }
  }

  private async transfer(
    ssh: NodeSSH,
    privateKey: string,
    artifacts: ArtifactSet,
    target: DeployTarget,
    log: (chunk: string) => void,
    signal?: AbortSignal,
  ): Promise<TransferResult> {
    const result: TransferResult = { target: target.name, host: target.host, transferred: false, files: 0 };

    try {
      await ssh.connect({
        host: target.host,
        port: target.port ?? 22,
        username: target.username ?? this.options.defaultUsername ?? "deploy",
        privateKey,
        readyTimeout: this.options.readyTimeoutMs ?? 30_000,
      });
      log(`[${target.name}] connected to ${target.host}\n`);

      const files = artifacts.files.map((rel) => ({
        local: path.join(artifacts.baseDir, rel),
        remote: remotePath(rel, target),
      }));
      const dirs = [...new Set([target.remoteDirectory, ...files.map((f) => path.posix.dirname(f.remote))])];
      const mkdir = await ssh.execCommand(`mkdir -p ${dirs.map(shellQuote).join(" ")}`);
      if (mkdir.code !== 0) {
        throw new Error(`mkdir on ${target.host} exited with ${mkdir.code}: ${mkdir.stderr.trim()}`);
      }

      await ssh.putFiles(files, { concurrency: this.options.concurrency ?? 4 });
      signal?.throwIfAborted();
      result.transferred = true;
      result.files = files.length;
      log(`[${target.name}] uploaded ${files.length} file(s) to ${target.remoteDirectory}\n`);
    } catch (err) {
      result.error = signal?.aborted ? abortMessage(signal) : errorMessage(err);
      logger.warn({ target: target.name, host: target.host, err: result.error }, "SSH transfer failed");
      return result;
    }

    if (!target.postCommand) return result;
    if (signal?.aborted) {
      result.postCommandOk = false;
      result.error = `post command not run, ${abortMessage(signal)}`;
      return result;
    }
    try {
      log(`[${target.name}] $ ${target.postCommand}\n`);
      const exec = await ssh.execCommand(target.postCommand, {
        cwd: target.remoteDirectory,
        onStdout: (chunk) => log(chunk.toString("utf-8")),
        onStderr: (chunk) => log(chunk.toString("utf-8")),
      });
      result.postCommandOk = exec.code === 0;
      if (!result.postCommandOk) {
        result.error = `post command exited with ${exec.code ?? exec.signal ?? "unknown status"}`;
      }
    } catch (err) {
      result.postCommandOk = false;
      result.error = `post command failed: ${signal?.aborted ? abortMessage(signal) : errorMessage(err)}`;
    }
    return result;
  }
}
