import { existsSync } from "node:fs";
import path from "node:path";
import type { BuildContext } from "../types/context.js";
import type { ToolRunner } from "../execution/runner.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export type ExtractionStage = "installer" | "package";

/** Vendor directory holding the executable and resources once both archives are open. */
export const VENDOR_LIB_DIR = path.join("lib", "net45");

export function nupkgName(version: string): string {
  return `AnthropicClaude-${version}-full.nupkg`;
}

async function sevenZipExtract(runner: ToolRunner, archive: string, cwd: string, stage: ExtractionStage): Promise<void> {
  const result = await runner.run({ argv: ["7z", "x", "-y", archive], cwd });
  if (result.exitCode !== 0) {
    const what = stage === "installer" ? "installer" : "nupkg";
    throw new BuildError(BuildErrorCode.EXTRACTION_FAILED, `Failed to extract ${what}`, {
      stage,
      archive,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
}

/**
 * Open the self-extracting installer, then the versioned nupkg inside it.
 * Both land directly in the work dir, which afterwards mirrors the vendor's
 * package layout (lib/net45/...).
 */
export async function extractInstaller(ctx: BuildContext, runner: ToolRunner, installer: string): Promise<string> {
  await sevenZipExtract(runner, installer, ctx.workDir, "installer");

  const nupkg = path.join(ctx.workDir, nupkgName(ctx.version));
  if (!existsSync(nupkg)) {
    throw new BuildError(
      BuildErrorCode.EXTRACTION_FAILED,
      `Failed to extract nupkg: ${path.basename(nupkg)} not found in installer`,
      { stage: "package", archive: nupkg },
    );
  }
  await sevenZipExtract(runner, nupkg, ctx.workDir, "package");

  const vendorDir = path.join(ctx.workDir, VENDOR_LIB_DIR);
  logger.info({ vendorDir }, "Installer contents extracted");
  return vendorDir;
}
