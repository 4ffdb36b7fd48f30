// Pure helpers for aura's version gate. Nothing here spawns a process.
import { SemVer, parse as parseSemver, gte } from "semver";
import { UpgradeError, UpgradeErrorCode } from "../shared/errors.js";

const AURA_VERSION_PREFIX = "aura ";

/** First aura release that upgrades without sudo (v4.0.6). */
export const AURA_NO_SUDO_VERSION = new SemVer("4.0.6");

/** Reduce `aura --version` output ("aura 4.0.8\n") to its version token. */
export function extractVersionToken(output: string): string {
  let token = output;
  while (token.startsWith(AURA_VERSION_PREFIX)) token = token.slice(AURA_VERSION_PREFIX.length);
  return token.trimEnd();
}

/**
 * Parse `aura --version` output. Anything that is not a full semver triple
 * after the prefix is VERSION_QUERY_MALFORMED; there is no fallback version.
 */
export function parseAuraVersion(output: string): SemVer {
  const token = extractVersionToken(output);
  // semver.parse tolerates a leading "v" or "="; aura never prints either.
  const version = /^\d/.test(token) ? parseSemver(token) : null;
  if (!version) {
    throw new UpgradeError(
      UpgradeErrorCode.VERSION_QUERY_MALFORMED,
      `Unexpected output from \`aura --version\`: invalid version "${token}". The output format may have changed.`,
      { backend: "aura", step: "version-query", output },
    );
  }
  return version;
}

/** True when this aura version manages its own privileges (inclusive threshold). */
export function auraRunsWithoutSudo(version: SemVer): boolean {
  return gte(version, AURA_NO_SUDO_VERSION);
}
