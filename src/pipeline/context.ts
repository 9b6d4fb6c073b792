import fs from "node:fs/promises";
import path from "node:path";
import type { BuildContext } from "../types/context.js";
import type { BuilderConfig } from "../types/config.js";
import type { HostContext, LibDir, Architecture } from "../types/host.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const PACKAGE_NAME = "claude-desktop";
export const INSTALLER_FILENAME = "Claude-Setup-x64.exe";

// The installer filename carries no version, so every build is stamped with
// this string unless the config names one.
const FIXED_VERSION = "0.8.0";

export function resolveVersion(configured: string | null): string {
  return configured ?? FIXED_VERSION;
}

export function libDirFor(arch: Architecture): LibDir {
  return arch === "x86_64" ? "lib64" : "lib";
}

/**
 * The work dir is wiped at the start of every run, so it may not be the
 * invocation directory or any directory above it (the filesystem root included).
 */
export function resolveWorkDir(cwd: string, configured: string): string {
  const workDir = path.resolve(cwd, configured);
  const fromWorkDir = path.relative(workDir, cwd);
  const outside = fromWorkDir === ".." || fromWorkDir.startsWith(`..${path.sep}`) || path.isAbsolute(fromWorkDir);
  if (!outside) {
    throw new BuildError(
      BuildErrorCode.CONFIG_INVALID,
      `work_dir "${configured}" resolves to ${workDir}, which contains the invocation directory ${cwd}`,
      { workDir, cwd },
    );
  }
  return workDir;
}

export function createBuildContext(host: HostContext, config: BuilderConfig, cwd: string): BuildContext {
  const workDir = resolveWorkDir(cwd, config.work_dir);
  return {
    arch: host.arch,
    distro: host.distro,
    version: resolveVersion(config.version),
    cwd,
    workDir,
    installRoot: path.join(workDir, "package-root"),
    outputDir: config.output_dir ? path.resolve(cwd, config.output_dir) : cwd,
    maintainer: config.maintainer,
  };
}

/** Staged app directory: `<root>/usr/lib/claude-desktop`, whatever the final lib dir. */
export function stagedAppDir(ctx: BuildContext): string {
  return path.join(ctx.installRoot, "usr", "lib", PACKAGE_NAME);
}

/** Wipe any previous build and lay out the empty staging tree. */
export async function prepareWorkDir(ctx: BuildContext): Promise<void> {
  await fs.rm(ctx.workDir, { recursive: true, force: true });
  const usr = path.join(ctx.installRoot, "usr");
  for (const dir of [stagedAppDir(ctx), path.join(usr, "share", "applications"), path.join(usr, "share", "icons"), path.join(usr, "bin")]) {
    await fs.mkdir(dir, { recursive: true });
  }
  logger.info({ workDir: ctx.workDir }, "Work directory prepared");
}
