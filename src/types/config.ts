import { z } from "zod";

/** Priority order used by autodetection. First detected backend wins. */
export const BACKEND_IDS = ["garuda_update", "paru", "yay", "trizen", "pikaur", "pamac", "pacman", "aura"] as const;

export const PRIVILEGE_METHODS = ["doas", "sudo", "pkexec", "run0", "please"] as const;

export const ArchConfigSchema = z.object({
  package_manager: z.enum(["autodetect", ...BACKEND_IDS]).default("autodetect"),
  show_news: z.boolean().default(false),
  // Shared by yay and paru.
  yay_arguments: z.string().default(""),
  trizen_arguments: z.string().default(""),
  pikaur_arguments: z.string().default(""),
  pamac_arguments: z.string().default(""),
  garuda_update_arguments: z.string().default(""),
  aura_aur_arguments: z.string().default(""),
  aura_pacman_arguments: z.string().default(""),
});

export const UpgradeConfigSchema = z.object({
  assume_yes: z.boolean().default(false),
  cleanup: z.boolean().default(false),
  dry_run: z.boolean().default(false),
  privilege: z
    .object({ method: z.enum(["auto", ...PRIVILEGE_METHODS]).default("auto") })
    .default({}),
  arch: ArchConfigSchema.default({}),
});

export type ArchConfig = z.infer<typeof ArchConfigSchema>;
export type UpgradeConfig = z.infer<typeof UpgradeConfigSchema>;
export type PackageManagerSelection = ArchConfig["package_manager"];
export type PrivilegeMethod = (typeof PRIVILEGE_METHODS)[number];
