import type { BackendId } from "../backends/types.js";

export enum UpgradeErrorCode {
  BACKEND_UNAVAILABLE = "BACKEND_UNAVAILABLE",
  PRIVILEGE_UNAVAILABLE = "PRIVILEGE_UNAVAILABLE",
  SUBPROCESS_FAILED = "SUBPROCESS_FAILED",
  VERSION_QUERY_MALFORMED = "VERSION_QUERY_MALFORMED",
}

/** Sub-step of a backend's protocol that an invocation belongs to. */
export type UpgradeStep = "news" | "upgrade" | "cleanup" | "version-query" | "aur-sync" | "repo-sync";

export interface UpgradeErrorContext {
  backend?: BackendId;
  step?: UpgradeStep;
  exitCode?: number;
  command?: string;
  output?: string;
  [key: string]: unknown;
}

export class UpgradeError extends Error {
  readonly code: UpgradeErrorCode;
  readonly context?: UpgradeErrorContext;

  constructor(code: UpgradeErrorCode, message: string, context?: UpgradeErrorContext) {
    super(message);
    this.name = "UpgradeError";
    this.code = code;
    this.context = context;
  }
}

export function isUpgradeError(err: unknown): err is UpgradeError {
  return err instanceof UpgradeError;
}
