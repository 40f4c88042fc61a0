/**
 * 适配器工厂 — 根据事件来源创建对应的 Git 适配器实例
 */

import type { EventSource } from "../types/index.js";
import { GenericGitAdapter } from "./generic-adapter.js";
import type { GitAdapter } from "./git-adapter.js";
import { GitHubAdapter } from "./github-adapter.js";
import { GitLabAdapter } from "./gitlab-adapter.js";

export function createAdapter(source: EventSource): GitAdapter {
  switch (source) {
    case "gitlab":
      return new GitLabAdapter();
    case "github":
      return new GitHubAdapter();
    case "generic":
      return new GenericGitAdapter();
    default:
      throw new Error(`Unsupported git source: ${source satisfies never}`);
  }
}
