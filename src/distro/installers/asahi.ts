import type { Command } from "../../types/command.js";
import type { PackageInstaller } from "./interface.js";

// Arch Linux ARM package names; rpm and rpmbuild both come from rpm-tools.
const ASAHI_PACKAGES: Readonly<Record<string, readonly string[]>> = {
  "7z": ["p7zip"],
  wrestool: ["icoutils"],
  icotool: ["icoutils"],
  convert: ["imagemagick"],
  npx: ["nodejs", "npm"],
  rpm: ["rpm-tools"],
  rpmbuild: ["rpm-tools"],
};

/** Asahi Linux (Arch-based): pacman. */
export class AsahiInstaller implements PackageInstaller {
  readonly family = "asahi" as const;

  packagesFor(tool: string): readonly string[] {
    return ASAHI_PACKAGES[tool] ?? [];
  }

  install(packages: string[]): Command {
    return { argv: ["pacman", "-S", "--needed", "--noconfirm", ...packages] };
  }
}
