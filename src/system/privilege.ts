import { PRIVILEGE_METHODS, type PrivilegeMethod } from "../types/config.js";
import type { ExecutableResolver } from "./which.js";
import type { UpgradeContext } from "../context.js";
import { UpgradeError, UpgradeErrorCode, type UpgradeErrorContext } from "../shared/errors.js";
import { logger } from "../logger.js";

/** An escalation helper found on this machine. */
export interface PrivilegeHandle {
  readonly method: PrivilegeMethod;
  readonly path: string;
}

/**
 * Find an escalation helper. `auto` tries doas, sudo, pkexec, run0, please in
 * that order; any other method looks only for that helper.
 */
export async function findPrivilegeHandle(
  resolver: ExecutableResolver,
  method: PrivilegeMethod | "auto" = "auto",
): Promise<PrivilegeHandle | null> {
  const candidates: readonly PrivilegeMethod[] = method === "auto" ? PRIVILEGE_METHODS : [method];
  for (const candidate of candidates) {
    const path = await resolver.which(candidate);
    if (path) {
      logger.debug({ method: candidate, path }, "Privilege helper found");
      return { method: candidate, path };
    }
  }
  logger.debug({ method }, "No privilege helper found");
  return null;
}

/** Fetch the privilege handle or fail with PRIVILEGE_UNAVAILABLE. */
export async function requirePrivilege(
  ctx: UpgradeContext,
  message: string,
  context?: UpgradeErrorContext,
): Promise<PrivilegeHandle> {
  const handle = await ctx.privilege();
  if (!handle) throw new UpgradeError(UpgradeErrorCode.PRIVILEGE_UNAVAILABLE, message, context);
  return handle;
}

/** Prefix argv so the command runs through the helper. */
export function escalate(handle: PrivilegeHandle, argv: string[]): string[] {
  return [handle.path, ...argv];
}
