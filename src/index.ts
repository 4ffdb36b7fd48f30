export { upgradeSelectedBackend } from "./upgrade.js";
export { scanAndReportLeftoverConfigs, findLeftoverConfigs } from "./pacnew.js";
export { resolveBackend, detectBackend, AUTODETECT_ORDER } from "./backends/resolver.js";
export type { Backend, BackendId } from "./backends/types.js";
export type { UpgradeContext, RunMode } from "./context.js";
export { LocalExecutor, type Executor, type ExecResult, type RunResult } from "./execution/executor.js";
export { PathResolver, type ExecutableResolver } from "./system/which.js";
export { findPrivilegeHandle, type PrivilegeHandle } from "./system/privilege.js";
export { loadConfig, parseConfig, defaultConfig } from "./config/loader.js";
export type { UpgradeConfig, ArchConfig } from "./types/config.js";
export { UpgradeError, UpgradeErrorCode } from "./shared/errors.js";
