#!/usr/bin/env node

import { Command, Option } from "commander";
import { loadConfig } from "./config/loader.js";
import { BACKEND_IDS, type UpgradeConfig } from "./types/config.js";
import type { UpgradeContext } from "./context.js";
import { LocalExecutor } from "./execution/executor.js";
import { PathResolver } from "./system/which.js";
import { findPrivilegeHandle } from "./system/privilege.js";
import { upgradeSelectedBackend } from "./upgrade.js";
import { scanAndReportLeftoverConfigs } from "./pacnew.js";
import { isUpgradeError } from "./shared/errors.js";
import { logger } from "./logger.js";

export interface CliOptions {
  config?: string;
  dryRun?: boolean;
  yes?: boolean;
  cleanup?: boolean;
  showNews?: boolean;
  backend?: UpgradeConfig["arch"]["package_manager"];
  scan: boolean;
}

/** Command-line flags win over the config file; unset flags leave it alone. */
export function applyCliOverrides(config: UpgradeConfig, options: CliOptions): UpgradeConfig {
  return {
    ...config,
    assume_yes: options.yes ?? config.assume_yes,
    cleanup: options.cleanup ?? config.cleanup,
    dry_run: options.dryRun ?? config.dry_run,
    arch: {
      ...config.arch,
      show_news: options.showNews ?? config.arch.show_news,
      package_manager: options.backend ?? config.arch.package_manager,
    },
  };
}

export function createContext(config: UpgradeConfig): UpgradeContext {
  const resolver = new PathResolver();
  return {
    config,
    runMode: config.dry_run ? "dry" : "wet",
    executor: new LocalExecutor(),
    resolver,
    privilege: () => findPrivilegeHandle(resolver, config.privilege.method),
    print: (line) => console.log(line),
  };
}

async function main(options: CliOptions): Promise<void> {
  const { config, configPath, fromFile } = loadConfig(options.config);
  logger.debug({ configPath, fromFile }, "Configuration loaded");

  const ctx = createContext(applyCliOverrides(config, options));
  const backend = await upgradeSelectedBackend(ctx);
  logger.info({ backend: backend.id }, "System upgrade finished");

  if (options.scan) await scanAndReportLeftoverConfigs();
}

const program = new Command();

program
  .name("archup")
  .description("Upgrade Arch Linux through the first installed pacman front end")
  .version("0.1.0")
  .option("-c, --config <path>", "config file (default: ~/.config/archup/config.yaml)")
  .option("-n, --dry-run", "print the commands instead of running them")
  .option("-y, --yes", "pass the package manager's non-interactive flag")
  .option("--cleanup", "clean the package cache after upgrading")
  .option("--show-news", "show Arch news before upgrading (yay/paru)")
  .addOption(new Option("-b, --backend <id>", "force one package manager").choices(["autodetect", ...BACKEND_IDS]))
  .option("--no-scan", "skip the .pacnew/.pacsave report")
  .action(async (options: CliOptions) => {
    try {
      await main(options);
    } catch (err) {
      if (isUpgradeError(err)) {
        console.error(`${err.message} (${err.code})`);
        logger.debug({ code: err.code, context: err.context }, "Upgrade failed");
      } else {
        console.error(err instanceof Error ? err.message : "An unexpected error occurred");
      }
      process.exit(1);
    }
  });

if (require.main === module) {
  program.parseAsync().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
