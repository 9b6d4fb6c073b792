// Dependency resolution. This is the one stage that changes the host outside
// the work dir: it installs distribution packages and global npm tools, and
// nothing rolls those installs back if a later stage fails.
import type { ToolRunner } from "../execution/runner.js";
import { formatCommand } from "../execution/runner.js";
import type { PackageInstaller } from "../distro/installers/interface.js";
import { AUXILIARY_TOOLS, npmGlobalInstall, type AuxiliaryTool } from "../distro/installers/npm.js";
import type { Reporter } from "../shared/reporter.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Commands the pipeline shells out to, probed in this order. */
export const REQUIRED_TOOLS = ["7z", "wrestool", "icotool", "convert", "npx", "rpm", "rpmbuild"] as const;

export interface DependencyReport {
  readonly missingTools: string[];
  readonly installedPackages: string[];
  readonly installedAuxiliary: AuxiliaryTool[];
}

/** Packages needed for the missing tools, deduplicated in first-seen order. */
export function packagesForMissing(installer: PackageInstaller, missingTools: readonly string[]): string[] {
  const packages = new Set<string>();
  for (const tool of missingTools) {
    for (const pkg of installer.packagesFor(tool)) packages.add(pkg);
  }
  return [...packages];
}

export async function resolveDependencies(
  runner: ToolRunner,
  installer: PackageInstaller,
  reporter: Reporter,
): Promise<DependencyReport> {
  reporter.step("Checking dependencies...");
  const missingTools: string[] = [];
  for (const tool of REQUIRED_TOOLS) {
    if (await runner.exists(tool)) {
      reporter.ok(`${tool} found`);
    } else {
      reporter.warn(`${tool} not found`);
      missingTools.push(tool);
    }
  }

  const packages = packagesForMissing(installer, missingTools);
  if (packages.length > 0) {
    const command = installer.install(packages);
    reporter.step(`Installing system dependencies: ${packages.join(" ")}`);
    logger.info({ family: installer.family, packages }, "Installing system packages");
    const result = await runner.run(command, { interactive: true });
    if (result.exitCode !== 0) {
      throw new BuildError(
        BuildErrorCode.DEPENDENCY_INSTALL_FAILED,
        `Failed to install system dependencies (${formatCommand(command)} exited with ${result.exitCode})`,
        { packages, exitCode: result.exitCode, stderr: result.stderr },
      );
    }
    reporter.ok("System dependencies installed successfully");
  }

  const installedAuxiliary: AuxiliaryTool[] = [];
  for (const tool of AUXILIARY_TOOLS) {
    if (await ensureAuxiliaryTool(runner, reporter, tool)) installedAuxiliary.push(tool);
  }

  return { missingTools, installedPackages: packages, installedAuxiliary };
}

/** Install a global npm tool if absent. Returns true when an install happened. */
async function ensureAuxiliaryTool(runner: ToolRunner, reporter: Reporter, tool: AuxiliaryTool): Promise<boolean> {
  if (await runner.exists(tool)) {
    reporter.ok(`${tool} found`);
    return false;
  }

  const command = npmGlobalInstall(tool);
  reporter.step(`Installing ${tool} via npm...`);
  const result = await runner.run(command, { interactive: true });
  if (result.exitCode !== 0 || !(await runner.exists(tool))) {
    throw new BuildError(
      BuildErrorCode.DEPENDENCY_INSTALL_FAILED,
      `Failed to install ${tool}. Please install it manually: sudo ${formatCommand(command)}`,
      { tool, exitCode: result.exitCode },
    );
  }
  reporter.ok(`${tool} installed successfully`);
  return true;
}
