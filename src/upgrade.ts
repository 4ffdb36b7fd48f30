import type { UpgradeContext } from "./context.js";
import type { Backend } from "./backends/types.js";
import { resolveBackend } from "./backends/resolver.js";

/**
 * Upgrade the system with whichever backend the config selects. Resolution and
 * upgrade errors propagate unchanged. Resolves to the backend that ran.
 */
export async function upgradeSelectedBackend(ctx: UpgradeContext): Promise<Backend> {
  const backend = await resolveBackend(ctx.config.arch.package_manager, ctx.resolver);
  await backend.upgrade(ctx);
  return backend;
}
