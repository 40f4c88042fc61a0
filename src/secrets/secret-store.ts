/**
 * Secret Store — 按句柄读取 SSH 私钥与仓库凭据，只读
 */

import fs from "node:fs/promises";
import path from "node:path";
import { PreconditionError } from "../errors.js";

export interface SecretStore {
  get(handle: string): Promise<string>;
}

/** 句柄只允许字母数字、点、下划线与横线，防止目录穿越 */
const HANDLE_PATTERN = /^[A-Za-z0-9._-]+$/;

function assertHandle(handle: string): void {
  if (!HANDLE_PATTERN.test(handle) || handle === "." || handle === "..") {
    throw new PreconditionError(`Invalid secret handle "${handle}"`);
  }
}

/** 从目录读取：每个句柄一个文件 */
export class FileSecretStore implements SecretStore {
  constructor(private readonly dir: string) {}

  async get(handle: string): Promise<string> {
    assertHandle(handle);
    try {
      return await fs.readFile(path.join(this.dir, handle), "utf-8");
    } catch (err) {
      const code = err instanceof Error && "code" in err ? String(err.code) : undefined;
      throw new PreconditionError(
        code === "ENOENT" ? `Secret "${handle}" not found` : `Secret "${handle}" unreadable: ${code ?? String(err)}`,
      );
    }
  }
}

/** 从环境变量读取：SECRET_<HANDLE>，句柄中的非字母数字字符转为下划线 */
export class EnvSecretStore implements SecretStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  static variableName(handle: string): string {
    return `SECRET_${handle.replace(/[^A-Za-z0-9]/g, "_").toUpperCase()}`;
  }

  async get(handle: string): Promise<string> {
    assertHandle(handle);
    const value = this.env[EnvSecretStore.variableName(handle)];
    if (!value) {
      throw new PreconditionError(`Secret "${handle}" not found`);
    }
    return value;
  }
}

/** 依次查询多个 Store，返回第一个命中 */
export class ChainedSecretStore implements SecretStore {
  constructor(private readonly stores: SecretStore[]) {}

  async get(handle: string): Promise<string> {
    let lastError: unknown = new PreconditionError(`Secret "${handle}" not found`);
    for (const store of this.stores) {
      try {
        return await store.get(handle);
      } catch (err) {
        lastError = err;
      }
    }
    throw lastError;
  }
}
