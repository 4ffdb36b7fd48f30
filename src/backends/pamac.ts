import type { Backend } from "./types.js";
import type { UpgradeContext } from "../context.js";
import type { ExecutableResolver } from "../system/which.js";
import { runChecked } from "../execution/executor.js";
import { assumeYes, executionEnv, splitArguments } from "./shared.js";

/** Manjaro's pamac: subcommands instead of pacman flags, hyphenated confirm flag. */
export class Pamac implements Backend {
  readonly id = "pamac" as const;

  constructor(readonly executable: string) {}

  static async detect(resolver: ExecutableResolver): Promise<Pamac | null> {
    const executable = await resolver.which("pamac");
    return executable ? new Pamac(executable) : null;
  }

  async upgrade(ctx: UpgradeContext): Promise<void> {
    const argv = [this.executable, "upgrade", ...splitArguments(ctx.config.arch.pamac_arguments)];
    if (assumeYes(ctx)) argv.push("--no-confirm");
    await runChecked(ctx, { argv, env: executionEnv() }, { backend: this.id, step: "upgrade" });

    if (ctx.config.cleanup) {
      const cleanup = [this.executable, "clean"];
      if (assumeYes(ctx)) cleanup.push("--no-confirm");
      await runChecked(ctx, { argv: cleanup, env: executionEnv() }, { backend: this.id, step: "cleanup" });
    }
  }
}
