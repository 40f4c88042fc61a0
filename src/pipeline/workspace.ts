/**
 * 工作目录管理
 *
 * 每个构建独占一个工作目录，不与其他构建（包括同一作业）共享检出状态
 * 目录结构：workspaces/{jobId}/build-{buildId}/
 */

import fs from "node:fs";
import path from "node:path";

/** 将 jobId 转换为安全的目录名 */
export function sanitizeJobId(jobId: string): string {
  return jobId.replace(/[\/\\:*?"<>|]/g, "-");
}

/** 获取构建工作目录路径 */
export function getWorkspacePath(root: string, jobId: string, buildId: number): string {
  return path.join(root, sanitizeJobId(jobId), `build-${buildId}`);
}

/** 创建空的构建工作目录，已存在的残留内容会被清除 */
export function createWorkspace(root: string, jobId: string, buildId: number): string {
  const dir = getWorkspacePath(root, jobId, buildId);
  fs.rmSync(dir, { recursive: true, force: true });
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

/** 清理工作目录 */
export function cleanWorkspace(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** 清理过期工作目录（保留最近 N 天），返回删除的目录数 */
export function cleanExpiredWorkspaces(root: string, retainDays: number = 7): number {
  if (!fs.existsSync(root)) return 0;

  const cutoff = Date.now() - retainDays * 24 * 60 * 60 * 1000;
  let removed = 0;

  for (const jobEntry of fs.readdirSync(root, { withFileTypes: true })) {
    if (!jobEntry.isDirectory()) continue;
    const jobDir = path.join(root, jobEntry.name);
    for (const entry of fs.readdirSync(jobDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const dirPath = path.join(jobDir, entry.name);
      if (fs.statSync(dirPath).mtimeMs < cutoff) {
        fs.rmSync(dirPath, { recursive: true, force: true });
        removed++;
      }
    }
  }
  return removed;
}
