/**
 * 全局执行队列 — p-queue 封装，限制同时运行的构建数
 */

import PQueue from "p-queue";
import { createLogger } from "../logger.js";

const logger = createLogger("task-queue");

export type Task = () => Promise<void>;

export class TaskQueue {
  private queue: PQueue;

  constructor(concurrency: number = 4) {
    this.queue = new PQueue({ concurrency });
  }

  /** 投递任务，不等待执行完成 */
  enqueue(task: Task): void {
    this.queue.add(task).catch((err: unknown) => {
      logger.error({ err }, "Queued task failed");
    });
  }

  /** 等待执行的任务数 */
  get size(): number {
    return this.queue.size;
  }

  /** 正在执行的任务数 */
  get pending(): number {
    return this.queue.pending;
  }

  /** 等待所有任务完成 */
  async drain(): Promise<void> {
    await this.queue.onIdle();
  }
}
