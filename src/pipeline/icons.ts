import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import path from "node:path";
import type { BuildContext } from "../types/context.js";
import type { ToolRunner } from "../execution/runner.js";
import type { Reporter } from "../shared/reporter.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { VENDOR_LIB_DIR } from "./extract.js";
import { PACKAGE_NAME } from "./context.js";
import { logger } from "../logger.js";

export const ICON_SIZES = [16, 24, 32, 48, 64, 256] as const;
export type IconSize = (typeof ICON_SIZES)[number];

/** Files icotool produces from the vendor .ico, keyed by the size they hold. */
export const ICON_MANIFEST: Readonly<Record<IconSize, string>> = {
  16: "claude_13_16x16x32.png",
  24: "claude_11_24x24x32.png",
  32: "claude_10_32x32x32.png",
  48: "claude_8_48x48x32.png",
  64: "claude_7_64x64x32.png",
  256: "claude_6_256x256x32.png",
};

// RT_GROUP_ICON in the PE resource table
const ICON_RESOURCE_TYPE = "14";
const ICO_FILENAME = "claude.ico";

export interface IconReport {
  readonly installed: IconSize[];
  readonly missing: IconSize[];
}

export function iconTargetPath(installRoot: string, size: IconSize): string {
  return path.join(installRoot, "usr", "share", "icons", "hicolor", `${size}x${size}`, "apps", `${PACKAGE_NAME}.png`);
}

async function runIconTool(runner: ToolRunner, argv: string[], cwd: string, message: string): Promise<void> {
  const result = await runner.run({ argv, cwd });
  if (result.exitCode !== 0) {
    throw new BuildError(BuildErrorCode.ICON_EXTRACTION_FAILED, message, {
      argv,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
}

/**
 * Pull the icon group out of the vendor executable, split it into PNGs and
 * install each mapped size into the hicolor theme. A missing size is logged
 * and skipped; the package then ships without it.
 */
export async function installIcons(ctx: BuildContext, runner: ToolRunner, reporter: Reporter): Promise<IconReport> {
  const exe = path.join(VENDOR_LIB_DIR, "claude.exe");
  await runIconTool(runner, ["wrestool", "-x", "-t", ICON_RESOURCE_TYPE, exe, "-o", ICO_FILENAME], ctx.workDir, "Failed to extract icons from exe");
  await runIconTool(runner, ["icotool", "-x", ICO_FILENAME], ctx.workDir, "Failed to convert icons");
  reporter.ok("Icons processed");

  const installed: IconSize[] = [];
  const missing: IconSize[] = [];
  for (const size of ICON_SIZES) {
    const target = iconTargetPath(ctx.installRoot, size);
    await fs.mkdir(path.dirname(target), { recursive: true });

    const source = path.join(ctx.workDir, ICON_MANIFEST[size]);
    if (!existsSync(source)) {
      reporter.warn(`Missing ${size}x${size} icon`);
      missing.push(size);
      continue;
    }
    reporter.step(`Installing ${size}x${size} icon...`);
    await fs.copyFile(source, target);
    await fs.chmod(target, 0o644);
    installed.push(size);
  }

  if (missing.length > 0) logger.warn({ missing }, "Icon set incomplete");
  return { installed, missing };
}
