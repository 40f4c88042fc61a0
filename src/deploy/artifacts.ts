/**
 * 产物选择 — 按 glob 匹配工作目录中的文件，保留相对路径
 */

import path from "node:path";
import { glob } from "glob";
import type { DeployTarget } from "../types/index.js";

export interface ArtifactSet {
  /** 匹配根目录（绝对路径） */
  baseDir: string;
  /** 相对 baseDir 的 POSIX 路径，已排序去重 */
  files: string[];
}

export async function collectArtifacts(
  workspace: string,
  patterns: string[],
  artifactBase?: string,
): Promise<ArtifactSet> {
  const root = path.resolve(workspace);
  const baseDir = path.resolve(root, artifactBase ?? ".");
  if (baseDir !== root && !baseDir.startsWith(root + path.sep)) {
    throw new Error(`artifactBase "${artifactBase}" escapes the workspace`);
  }

  const matched = await glob(patterns, {
    cwd: baseDir,
    nodir: true,
    dot: true,
    posix: true,
    ignore: [".git/**"],
  });
  const files = [...new Set(matched)].sort();
  return { baseDir, files };
}

/** 计算远端路径：remoteDirectory + 相对路径，可选去除前缀 */
export function remotePath(relative: string, target: Pick<DeployTarget, "remoteDirectory" | "stripPrefix">): string {
  let rel = relative;
  if (target.stripPrefix && rel.startsWith(target.stripPrefix)) {
    rel = rel.slice(target.stripPrefix.length).replace(/^\/+/, "");
  }
  return path.posix.join(target.remoteDirectory, rel);
}

/** 单引号转义，供远端 shell 使用 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
