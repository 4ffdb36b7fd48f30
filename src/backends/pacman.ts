import type { Backend } from "./types.js";
import type { UpgradeContext } from "../context.js";
import type { ExecutableResolver } from "../system/which.js";
import { runChecked } from "../execution/executor.js";
import { escalate, requirePrivilege } from "../system/privilege.js";
import { assumeYes, executionEnv } from "./shared.js";

/** powerpill is a drop-in pacman replacement and wins when installed. */
export async function findPacman(resolver: ExecutableResolver): Promise<string | null> {
  return (await resolver.which("powerpill")) ?? (await resolver.which("pacman"));
}

/** Plain pacman (or powerpill). Always runs through the privilege helper. */
export class Pacman implements Backend {
  readonly id = "pacman" as const;

  constructor(readonly executable: string) {}

  static async detect(resolver: ExecutableResolver): Promise<Pacman | null> {
    const executable = await findPacman(resolver);
    return executable ? new Pacman(executable) : null;
  }

  async upgrade(ctx: UpgradeContext): Promise<void> {
    const privilege = await requirePrivilege(ctx, "A privilege helper (sudo, doas, ...) is required to run pacman", {
      backend: this.id,
      step: "upgrade",
    });

    const argv = escalate(privilege, [this.executable, "-Syu"]);
    if (assumeYes(ctx)) argv.push("--noconfirm");
    await runChecked(ctx, { argv, env: executionEnv() }, { backend: this.id, step: "upgrade" });

    if (ctx.config.cleanup) {
      const cleanup = escalate(privilege, [this.executable, "-Scc"]);
      if (assumeYes(ctx)) cleanup.push("--noconfirm");
      await runChecked(ctx, { argv: cleanup, env: executionEnv() }, { backend: this.id, step: "cleanup" });
    }
  }
}
