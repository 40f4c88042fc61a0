/**
 * 作业定义相关类型
 */

/** 并发策略 */
export type ConcurrencyPolicy = "serial" | "latest-wins";

/** 阶段种类 */
export type StageKind = "checkout" | "command" | "deploy" | "post";

/** 阶段定义（声明顺序即执行顺序） */
export interface StageDefinition {
  name: string;
  kind: StageKind;
  /** command / post 阶段执行的 shell 命令 */
  command?: string;
  /** deploy 阶段的产物 glob 列表 */
  artifacts?: string[];
  /** 产物匹配的根目录（相对工作目录） */
  artifactBase?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

/** 传输方式 */
export type TransportKind = "ssh" | "local";

/** 部署目标 */
export interface DeployTarget {
  name: string;
  transport: TransportKind;
  host: string;
  port?: number;
  username?: string;
  remoteDirectory: string;
  /** Secret Store 中的凭据句柄（SSH 私钥） */
  credentialHandle?: string;
  postCommand?: string;
  /** 上传前从相对路径中去掉的前缀，例如 "dist/" */
  stripPrefix?: string;
}

/** 作业定义，加载后不再修改 */
export interface JobDefinition {
  id: string;
  /** 匹配 TriggerEvent.repositoryId 或 repositoryUrl */
  repository: string;
  repositoryUrl: string;
  refPattern: string;
  /** 仓库访问凭据句柄（HTTPS token） */
  credentialHandle?: string;
  stages: StageDefinition[];
  deployTargets: DeployTarget[];
  deployMode: "sequential" | "parallel";
  concurrencyPolicy: ConcurrencyPolicy;
}
