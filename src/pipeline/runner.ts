/**
 * 外部命令执行 — install / test / build / post 阶段统一通过 sh -c 运行
 *
 * 执行器只关心退出码与输出流，不解释命令含义。
 */

import { spawn } from "node:child_process";

export interface RunCommandOptions {
  command: string;
  cwd: string;
  env: Record<string, string>;
  timeoutMs: number;
  onOutput: (chunk: string) => void;
  /** 中止时与超时一样结束整个进程组 */
  signal?: AbortSignal;
}

export interface RunCommandResult {
  /** 进程未能启动或被信号终止时为 null */
  exitCode: number | null;
  timedOut: boolean;
  error?: string;
}

export interface ProcessRunner {
  run(opts: RunCommandOptions): Promise<RunCommandResult>;
}

/** 超时后先 SIGTERM，宽限期后 SIGKILL */
const KILL_GRACE_MS = 5_000;

export class ShellRunner implements ProcessRunner {
  run(opts: RunCommandOptions): Promise<RunCommandResult> {
    return new Promise((resolve) => {
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const child = spawn("sh", ["-c", opts.command], {
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
        stdio: ["ignore", "pipe", "pipe"],
        // 独立进程组，超时时连同子进程一起结束
        detached: true,
      });

      const killGroup = (signal: NodeJS.Signals) => {
        if (child.pid === undefined) return;
        try {
          process.kill(-child.pid, signal);
        } catch {
          child.kill(signal);
        }
      };

      const terminate = (notice: string) => {
        if (killTimer) return;
        opts.onOutput(`\n[pipeline] ${notice}\n`);
        killGroup("SIGTERM");
        killTimer = setTimeout(() => killGroup("SIGKILL"), KILL_GRACE_MS);
      };

      const timer = setTimeout(() => {
        timedOut = true;
        terminate(`command timed out after ${opts.timeoutMs}ms`);
      }, opts.timeoutMs);

      const onAbort = () => terminate("command aborted");
      if (opts.signal?.aborted) onAbort();
      else opts.signal?.addEventListener("abort", onAbort, { once: true });

      const finish = (result: RunCommandResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (killTimer) clearTimeout(killTimer);
        opts.signal?.removeEventListener("abort", onAbort);
        resolve(result);
      };

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => opts.onOutput(chunk));
      child.stderr.on("data", (chunk: string) => opts.onOutput(chunk));

      child.on("error", (err) => {
        opts.onOutput(`[pipeline] failed to start command: ${err.message}\n`);
        finish({ exitCode: null, timedOut, error: err.message });
      });

      child.on("close", (code, signal) => {
        finish({
          exitCode: code,
          timedOut,
          error: signal ? `terminated by ${signal}` : undefined,
        });
      });
    });
  }
}
