import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import path from "node:path";
import type { BuildContext } from "../types/context.js";
import type { ToolRunner } from "../execution/runner.js";
import type { Reporter } from "../shared/reporter.js";
import type { IconSize } from "./icons.js";
import { iconTargetPath } from "./icons.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { describePackage, rpmFileName, type PackageDescriptor } from "../templates/descriptor.js";
import { renderLauncher } from "../templates/launcher.js";
import { renderDesktopEntry } from "../templates/desktop-entry.js";
import { renderRpmSpec } from "../templates/rpm-spec.js";
import { renderPkgbuild } from "../templates/pkgbuild.js";
import { logger } from "../logger.js";

export type PackageArtifact =
  | { kind: "rpm"; path: string; specPath: string }
  | { kind: "pkgbuild"; path: string; buildCommand: string };

export function launcherPath(installRoot: string, name: string): string {
  return path.join(installRoot, "usr", "bin", name);
}

export function desktopEntryPath(installRoot: string, name: string): string {
  return path.join(installRoot, "usr", "share", "applications", `${name}.desktop`);
}

async function writeWithMode(file: string, content: string, mode: number): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, { encoding: "utf-8", mode });
  // writeFile's mode is filtered by the umask; packaging needs the exact bits
  await fs.chmod(file, mode);
}

/**
 * Every staged file the package lists must exist with its packaged mode
 * before any recipe is rendered.
 */
export async function verifyInstallTree(pkg: PackageDescriptor, icons: readonly IconSize[]): Promise<void> {
  const expected: Array<[string, number]> = [
    [launcherPath(pkg.installRoot, pkg.name), 0o755],
    [desktopEntryPath(pkg.installRoot, pkg.name), 0o644],
    ...icons.map((size): [string, number] => [iconTargetPath(pkg.installRoot, size), 0o644]),
  ];

  for (const [file, mode] of expected) {
    let actual: number;
    try {
      actual = (await fs.stat(file)).mode & 0o777;
    } catch {
      throw new BuildError(BuildErrorCode.PACKAGE_BUILD_FAILED, `Install tree is missing ${file}`, { file });
    }
    if (actual !== mode) {
      throw new BuildError(
        BuildErrorCode.PACKAGE_BUILD_FAILED,
        `${file} has mode ${actual.toString(8)}, expected ${mode.toString(8)}`,
        { file, mode: actual, expected: mode },
      );
    }
  }
}

async function buildRpm(ctx: BuildContext, pkg: PackageDescriptor, icons: readonly IconSize[], runner: ToolRunner, reporter: Reporter, now: Date): Promise<PackageArtifact> {
  const specPath = path.join(ctx.workDir, `${pkg.name}.spec`);
  await fs.writeFile(specPath, renderRpmSpec(pkg, icons, now), "utf-8");
  for (const dir of ["BUILD", "RPMS", "SOURCES", "SPECS", "SRPMS"]) {
    await fs.mkdir(path.join(ctx.workDir, dir), { recursive: true });
  }

  const rpmName = rpmFileName(pkg);
  const rpmPath = path.join(ctx.outputDir, rpmName);
  reporter.step(`Building RPM package for ${pkg.arch}...`);
  const result = await runner.run(
    {
      argv: [
        "rpmbuild", "-bb",
        "--define", `_topdir ${ctx.workDir}`,
        "--define", `_rpmdir ${ctx.outputDir}`,
        "--define", `_build_name_fmt ${rpmName}`,
        specPath,
      ],
      cwd: ctx.cwd,
    },
    { interactive: true },
  );
  if (result.exitCode !== 0) {
    throw new BuildError(BuildErrorCode.PACKAGE_BUILD_FAILED, "Failed to build RPM package", {
      specPath,
      exitCode: result.exitCode,
    });
  }
  if (!existsSync(rpmPath)) {
    throw new BuildError(BuildErrorCode.PACKAGE_BUILD_FAILED, `rpmbuild succeeded but ${rpmPath} was not produced`, { rpmPath });
  }
  return { kind: "rpm", path: rpmPath, specPath };
}

async function writePkgbuild(ctx: BuildContext, pkg: PackageDescriptor, icons: readonly IconSize[], reporter: Reporter): Promise<PackageArtifact> {
  reporter.step("Preparing package for Asahi Linux...");
  const pkgDir = path.join(ctx.workDir, "asahi-pkg");
  await fs.mkdir(pkgDir, { recursive: true });
  const recipe = path.join(pkgDir, "PKGBUILD");
  await fs.writeFile(recipe, renderPkgbuild(pkg, icons), "utf-8");
  reporter.ok("PKGBUILD created for Asahi Linux");
  // makepkg is left to the operator
  const buildCommand = `cd ${pkgDir} && makepkg -si`;
  reporter.step(`To build the package, run: ${buildCommand}`);
  return { kind: "pkgbuild", path: recipe, buildCommand };
}

/**
 * Write the launcher and desktop entry into the install tree, validate it,
 * then produce the distribution package: an RPM on Fedora, a PKGBUILD on Asahi.
 */
export async function assemblePackage(
  ctx: BuildContext,
  icons: readonly IconSize[],
  runner: ToolRunner,
  reporter: Reporter,
  now: Date = new Date(),
): Promise<PackageArtifact> {
  const pkg = describePackage(ctx);
  await writeWithMode(desktopEntryPath(ctx.installRoot, pkg.name), renderDesktopEntry(pkg), 0o644);
  await writeWithMode(launcherPath(ctx.installRoot, pkg.name), renderLauncher(pkg), 0o755);
  await verifyInstallTree(pkg, icons);

  const artifact = ctx.distro === "fedora"
    ? await buildRpm(ctx, pkg, icons, runner, reporter, now)
    : await writePkgbuild(ctx, pkg, icons, reporter);
  logger.info({ artifact }, "Package assembled");
  return artifact;
}
