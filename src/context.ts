import type { UpgradeConfig } from "./types/config.js";
import type { Executor } from "./execution/executor.js";
import type { ExecutableResolver } from "./system/which.js";
import type { PrivilegeHandle } from "./system/privilege.js";

export type RunMode = "dry" | "wet";

/**
 * Everything a dispatch needs from its caller. Created once per run and
 * never mutated by backends.
 */
export interface UpgradeContext {
  readonly config: UpgradeConfig;
  readonly runMode: RunMode;
  readonly executor: Executor;
  readonly resolver: ExecutableResolver;
  /** Looked up lazily, only by backends that must escalate. */
  privilege(): Promise<PrivilegeHandle | null>;
  /** User-facing output sink (dry-run lines). */
  print(line: string): void;
}
