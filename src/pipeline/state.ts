/**
 * 构建状态持久化 — SQLite
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import type { Build, BuildState } from "../types/index.js";

export class StateStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS builds (
        id INTEGER PRIMARY KEY,
        job_id TEXT NOT NULL,
        state TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_builds_state ON builds(state)
    `);
    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_builds_job ON builds(job_id)
    `);
  }

  /** 保存构建状态 */
  save(build: Build): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO builds (id, job_id, state, data, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    stmt.run(
      build.id,
      build.jobId,
      build.state,
      JSON.stringify(build),
      build.createdAt,
      new Date().toISOString(),
    );
  }

  /** 获取构建 */
  get(buildId: number): Build | null {
    const row = this.db.prepare("SELECT data FROM builds WHERE id = ?").get(buildId) as
      | { data: string }
      | undefined;
    return row ? (JSON.parse(row.data) as Build) : null;
  }

  /** 已分配的最大 build_id，用于重启后继续递增 */
  maxBuildId(): number {
    const row = this.db.prepare("SELECT MAX(id) AS maxId FROM builds").get() as { maxId: number | null };
    return row.maxId ?? 0;
  }

  /** 获取未到达终态的构建（上一个进程遗留） */
  getIncomplete(): Build[] {
    const rows = this.db
      .prepare("SELECT data FROM builds WHERE state IN ('queued', 'running') ORDER BY id ASC")
      .all() as { data: string }[];
    return rows.map((r) => JSON.parse(r.data) as Build);
  }

  /** 列出构建（支持 state 和 job_id 过滤） */
  list(filters?: { state?: BuildState; jobId?: string; limit?: number }): Build[] {
    let sql = "SELECT data FROM builds WHERE 1=1";
    const params: (string | number)[] = [];
    if (filters?.state) {
      sql += " AND state = ?";
      params.push(filters.state);
    }
    if (filters?.jobId) {
      sql += " AND job_id = ?";
      params.push(filters.jobId);
    }
    sql += " ORDER BY id DESC LIMIT ?";
    params.push(filters?.limit ?? 100);
    const rows = this.db.prepare(sql).all(...params) as { data: string }[];
    return rows.map((r) => JSON.parse(r.data) as Build);
  }

  /** 关闭数据库连接 */
  close(): void {
    this.db.close();
  }
}
