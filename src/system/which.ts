import { access, stat } from "node:fs/promises";
import { constants } from "node:fs";
import { delimiter, isAbsolute, join } from "node:path";

/** Locates executables by name. */
export interface ExecutableResolver {
  which(name: string): Promise<string | null>;
}

async function isExecutableFile(path: string): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Resolves names against a PATH string, the same way a POSIX shell would. */
export class PathResolver implements ExecutableResolver {
  constructor(private readonly searchPath: string = process.env.PATH ?? "") {}

  async which(name: string): Promise<string | null> {
    if (name.includes("/")) {
      return isAbsolute(name) && (await isExecutableFile(name)) ? name : null;
    }
    for (const dir of this.searchPath.split(delimiter)) {
      if (!dir) continue;
      const candidate = join(dir, name);
      if (await isExecutableFile(candidate)) return candidate;
    }
    return null;
  }
}
