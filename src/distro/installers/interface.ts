import type { Command } from "../../types/command.js";
import type { DistroFamily } from "../../types/host.js";

/**
 * Distribution-specific package installation (the host-mutating capability).
 * Implementations only translate intent into commands; the resolver runs them
 * through the ToolRunner, which is where tests substitute a fake.
 */
export interface PackageInstaller {
  readonly family: DistroFamily;
  /** Native packages providing `tool`, or an empty list when none is known. */
  packagesFor(tool: string): readonly string[];
  install(packages: string[]): Command;
}
