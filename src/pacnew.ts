// Post-upgrade sweep for configuration files pacman could not merge.
// Advisory only: it never throws, and unreadable directories are skipped.
import { glob } from "glob";
import { logger } from "./logger.js";

export const DEFAULT_CONFIG_ROOT = "/etc";
export const LEFTOVER_HEADER = "Pacman backup configuration files found:";

export async function findLeftoverConfigs(root: string = DEFAULT_CONFIG_ROOT): Promise<string[]> {
  try {
    const matches = await glob("**/*.{pacnew,pacsave}", { cwd: root, absolute: true, dot: true, nodir: true });
    return matches.sort();
  } catch (err) {
    logger.debug({ root, error: err }, "Leftover config scan aborted");
    return [];
  }
}

/** Print the header and every leftover path, or nothing at all when there are none. */
export async function scanAndReportLeftoverConfigs(
  root: string = DEFAULT_CONFIG_ROOT,
  print: (line: string) => void = console.log,
): Promise<void> {
  const leftovers = await findLeftoverConfigs(root);
  if (leftovers.length === 0) return;

  print(LEFTOVER_HEADER);
  for (const path of leftovers) print(path);
}
