import type { Backend } from "./types.js";
import type { UpgradeContext } from "../context.js";
import type { ExecutableResolver } from "../system/which.js";
import { runChecked } from "../execution/executor.js";
import { assumeYes, executionEnv, splitArguments } from "./shared.js";

/** `-Pw` exits 1 when there is no unread news. */
export const NEWS_ACCEPTED_EXIT_CODES = [1, 0] as const;

/**
 * yay and paru share one dialect: both take `--pacman <path>` and pass
 * through pacman's own flags. Both read `arch.yay_arguments`.
 */
export class YayParu implements Backend {
  constructor(
    readonly id: "yay" | "paru",
    readonly executable: string,
    readonly pacman: string,
  ) {}

  static async detect(id: "yay" | "paru", resolver: ExecutableResolver, pacman: string): Promise<YayParu | null> {
    const executable = await resolver.which(id);
    return executable ? new YayParu(id, executable, pacman) : null;
  }

  async upgrade(ctx: UpgradeContext): Promise<void> {
    if (ctx.config.arch.show_news) {
      await runChecked(ctx, { argv: [this.executable, "-Pw"] }, {
        backend: this.id,
        step: "news",
        acceptedExitCodes: NEWS_ACCEPTED_EXIT_CODES,
      });
    }

    const argv = [this.executable, "--pacman", this.pacman, "-Syu", ...splitArguments(ctx.config.arch.yay_arguments)];
    if (assumeYes(ctx)) argv.push("--noconfirm");
    await runChecked(ctx, { argv, env: executionEnv() }, { backend: this.id, step: "upgrade" });

    if (ctx.config.cleanup) {
      const cleanup = [this.executable, "--pacman", this.pacman, "-Scc"];
      if (assumeYes(ctx)) cleanup.push("--noconfirm");
      await runChecked(ctx, { argv: cleanup, env: executionEnv() }, { backend: this.id, step: "cleanup" });
    }
  }
}
