import type { UpgradeContext } from "../context.js";

/** Directory holding the system pacman; always searched first. */
export const SYSTEM_BIN_DIR = "/usr/bin";

/**
 * Environment override for anything that ends up calling pacman, so a pacman
 * earlier on the user's PATH cannot shadow the system one. Built per call;
 * process.env is never modified.
 */
export function executionEnv(inheritedPath: string | undefined = process.env.PATH): Record<string, string> {
  return { PATH: inheritedPath ? `${SYSTEM_BIN_DIR}:${inheritedPath}` : SYSTEM_BIN_DIR };
}

/** Split a free-form argument string from config. */
export function splitArguments(raw: string): string[] {
  return raw.split(/\s+/).filter(Boolean);
}

export function assumeYes(ctx: UpgradeContext): boolean {
  return ctx.config.assume_yes;
}
