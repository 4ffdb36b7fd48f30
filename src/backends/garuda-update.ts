import type { Backend } from "./types.js";
import type { UpgradeContext } from "../context.js";
import type { ExecutableResolver } from "../system/which.js";
import { runChecked } from "../execution/executor.js";
import { assumeYes, executionEnv, splitArguments } from "./shared.js";

/**
 * Garuda's wrapper script. It is configured entirely through environment
 * variables, including non-interactive mode, and has no cleanup step.
 */
export class GarudaUpdate implements Backend {
  readonly id = "garuda_update" as const;

  constructor(readonly executable: string) {}

  static async detect(resolver: ExecutableResolver): Promise<GarudaUpdate | null> {
    const executable = await resolver.which("garuda-update");
    return executable ? new GarudaUpdate(executable) : null;
  }

  async upgrade(ctx: UpgradeContext): Promise<void> {
    const env: Record<string, string> = { ...executionEnv(), UPDATE_AUR: "1", SKIP_MIRRORLIST: "1" };
    if (assumeYes(ctx)) env.PACMAN_NOCONFIRM = "1";
    const argv = [this.executable, ...splitArguments(ctx.config.arch.garuda_update_arguments)];
    await runChecked(ctx, { argv, env }, { backend: this.id, step: "upgrade" });
  }
}
