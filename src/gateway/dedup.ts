/**
 * 重复投递去重窗口 — 以 (repositoryId, ref, commitSha) 为键，记录首次接收时间
 *
 * 上游按至少一次语义投递，窗口内的重复投递被标记为 duplicate。
 * 条目按时间与数量双重上限淘汰。
 */

export class DedupWindow {
  /** Map 的插入顺序即首次接收时间顺序 */
  private readonly seen = new Map<string, number>();

  constructor(
    private readonly windowMs: number,
    private readonly maxEntries: number = 10_000,
    private readonly now: () => number = Date.now,
  ) {}

  static key(repositoryId: string, ref: string, commitSha: string): string {
    return `${repositoryId}\u0000${ref}\u0000${commitSha.toLowerCase()}`;
  }

  /** 记录一次接收，返回是否为窗口内的重复 */
  check(key: string): boolean {
    const now = this.now();
    this.prune(now);

    if (this.seen.has(key)) {
      return true;
    }

    this.seen.set(key, now);
    if (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
    return false;
  }

  get size(): number {
    return this.seen.size;
  }

  private prune(now: number): void {
    for (const [key, receivedAt] of this.seen) {
      if (now - receivedAt < this.windowMs) break;
      this.seen.delete(key);
    }
  }
}
