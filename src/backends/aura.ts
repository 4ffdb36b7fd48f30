import type { Backend } from "./types.js";
import type { UpgradeContext } from "../context.js";
import type { ExecutableResolver } from "../system/which.js";
import type { Command } from "../types/command.js";
import { captureChecked, runChecked } from "../execution/executor.js";
import { escalate, requirePrivilege, type PrivilegeHandle } from "../system/privilege.js";
import { assumeYes, executionEnv, splitArguments } from "./shared.js";
import { auraRunsWithoutSudo, parseAuraVersion, AURA_NO_SUDO_VERSION } from "./version.js";
import { logger } from "../logger.js";

/**
 * aura changed its privilege model in 4.0.6: older releases must be started
 * through sudo, newer ones escalate internally and refuse to run as root.
 */
export class Aura implements Backend {
  readonly id = "aura" as const;

  constructor(readonly executable: string) {}

  static async detect(resolver: ExecutableResolver): Promise<Aura | null> {
    const executable = await resolver.which("aura");
    return executable ? new Aura(executable) : null;
  }

  async upgrade(ctx: UpgradeContext): Promise<void> {
    const output = await captureChecked(ctx, { argv: [this.executable, "--version"] }, {
      backend: this.id,
      step: "version-query",
    });
    const version = parseAuraVersion(output);
    const direct = auraRunsWithoutSudo(version);
    logger.debug({ version: version.version, threshold: AURA_NO_SUDO_VERSION.version, direct }, "aura version gate");

    const privilege = direct
      ? null
      : await requirePrivilege(ctx, `aura ${version.version} (< ${AURA_NO_SUDO_VERSION.version}) requires sudo to work with AUR packages`, {
          backend: this.id,
          step: "aur-sync",
        });

    await runChecked(ctx, this.command(ctx, privilege, ["-Au", ...splitArguments(ctx.config.arch.aura_aur_arguments)]), {
      backend: this.id,
      step: "aur-sync",
    });
    await runChecked(ctx, this.command(ctx, privilege, ["-Syu", ...splitArguments(ctx.config.arch.aura_pacman_arguments)]), {
      backend: this.id,
      step: "repo-sync",
    });
  }

  private command(ctx: UpgradeContext, privilege: PrivilegeHandle | null, args: string[]): Command {
    const own = [this.executable, ...args];
    const argv = privilege ? escalate(privilege, own) : own;
    if (assumeYes(ctx)) argv.push("--noconfirm");
    return { argv, env: executionEnv() };
  }
}
