import type { Command } from "../../types/command.js";
import type { PackageInstaller } from "./interface.js";

const FEDORA_PACKAGES: Readonly<Record<string, readonly string[]>> = {
  "7z": ["p7zip-plugins"],
  wrestool: ["icoutils"],
  icotool: ["icoutils"],
  convert: ["ImageMagick"],
  npx: ["nodejs", "npm"],
  rpm: ["rpm"],
  rpmbuild: ["rpm-build"],
};

/** Fedora and its remixes: dnf. */
export class FedoraInstaller implements PackageInstaller {
  readonly family = "fedora" as const;

  packagesFor(tool: string): readonly string[] {
    return FEDORA_PACKAGES[tool] ?? [];
  }

  install(packages: string[]): Command {
    return { argv: ["dnf", "install", "-y", ...packages] };
  }
}
