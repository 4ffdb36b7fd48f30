// Backend selection. The priority order is policy, not configuration: users can
// force one backend but cannot reorder the list.
//
// Adding a backend requires (1) a Backend class, (2) its id in BACKEND_IDS and
// (3) a case in detectBackend().
import type { Backend, BackendId } from "./types.js";
import type { PackageManagerSelection } from "../types/config.js";
import { BACKEND_IDS } from "../types/config.js";
import type { ExecutableResolver } from "../system/which.js";
import { GarudaUpdate } from "./garuda-update.js";
import { YayParu } from "./yay-paru.js";
import { TrizenPikaur } from "./trizen-pikaur.js";
import { Pamac } from "./pamac.js";
import { Pacman, findPacman } from "./pacman.js";
import { Aura } from "./aura.js";
import { UpgradeError, UpgradeErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/**
 * Autodetection order:
 *   1. garuda_update
 *   2. paru
 *   3. yay
 *   4. trizen
 *   5. pikaur
 *   6. pamac
 *   7. pacman (powerpill preferred)
 *   8. aura
 */
export const AUTODETECT_ORDER: readonly BackendId[] = BACKEND_IDS;

/** Detect a single backend, or null if it is not installed. */
export async function detectBackend(id: BackendId, resolver: ExecutableResolver): Promise<Backend | null> {
  switch (id) {
    case "garuda_update":
      return GarudaUpdate.detect(resolver);
    case "paru":
    case "yay":
      return YayParu.detect(id, resolver, (await findPacman(resolver)) ?? "pacman");
    case "trizen":
    case "pikaur":
      return TrizenPikaur.detect(id, resolver);
    case "pamac":
      return Pamac.detect(resolver);
    case "pacman":
      return Pacman.detect(resolver);
    case "aura":
      return Aura.detect(resolver);
  }
}

/**
 * Pick the backend to run. `autodetect` walks AUTODETECT_ORDER and stops at the
 * first hit; a forced id is the only one tried. No hit is BACKEND_UNAVAILABLE.
 */
export async function resolveBackend(selection: PackageManagerSelection, resolver: ExecutableResolver): Promise<Backend> {
  const candidates = selection === "autodetect" ? AUTODETECT_ORDER : [selection];

  for (const id of candidates) {
    const backend = await detectBackend(id, resolver);
    if (backend) {
      logger.info({ backend: backend.id, executable: backend.executable, selection }, "Package manager selected");
      return backend;
    }
    logger.debug({ backend: id }, "Package manager not found");
  }

  const message =
    selection === "autodetect"
      ? `No supported package manager found (tried ${AUTODETECT_ORDER.join(", ")}). Install one or set arch.package_manager.`
      : `The configured package manager "${selection}" is not installed.`;
  throw new UpgradeError(UpgradeErrorCode.BACKEND_UNAVAILABLE, message, { selection });
}
