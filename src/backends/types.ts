import type { BACKEND_IDS } from "../types/config.js";
import type { UpgradeContext } from "../context.js";

/** One tag per supported pacman front end. */
export type BackendId = (typeof BACKEND_IDS)[number];

/**
 * Uniform upgrade contract (one per backend).
 * Resolves once every sub-invocation exited with an accepted code; rejects with
 * an UpgradeError naming the backend and sub-step otherwise.
 */
export interface Backend {
  readonly id: BackendId;
  readonly executable: string;
  upgrade(ctx: UpgradeContext): Promise<void>;
}
