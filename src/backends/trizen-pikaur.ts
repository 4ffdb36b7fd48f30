import type { Backend } from "./types.js";
import type { UpgradeContext } from "../context.js";
import type { ExecutableResolver } from "../system/which.js";
import { runChecked } from "../execution/executor.js";
import { assumeYes, executionEnv, splitArguments } from "./shared.js";

type HelperId = "trizen" | "pikaur";

/** trizen and pikaur speak plain pacman syntax and clean with `-Sc`. */
export class TrizenPikaur implements Backend {
  constructor(
    readonly id: HelperId,
    readonly executable: string,
  ) {}

  static async detect(id: HelperId, resolver: ExecutableResolver): Promise<TrizenPikaur | null> {
    const executable = await resolver.which(id);
    return executable ? new TrizenPikaur(id, executable) : null;
  }

  private extraArguments(ctx: UpgradeContext): string[] {
    const raw = this.id === "trizen" ? ctx.config.arch.trizen_arguments : ctx.config.arch.pikaur_arguments;
    return splitArguments(raw);
  }

  async upgrade(ctx: UpgradeContext): Promise<void> {
    const argv = [this.executable, "-Syu", ...this.extraArguments(ctx)];
    if (assumeYes(ctx)) argv.push("--noconfirm");
    await runChecked(ctx, { argv, env: executionEnv() }, { backend: this.id, step: "upgrade" });

    if (ctx.config.cleanup) {
      const cleanup = [this.executable, "-Sc"];
      if (assumeYes(ctx)) cleanup.push("--noconfirm");
      await runChecked(ctx, { argv: cleanup, env: executionEnv() }, { backend: this.id, step: "cleanup" });
    }
  }
}
