import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import path from "node:path";
import type { BuildContext } from "../types/context.js";
import type { ToolRunner } from "../execution/runner.js";
import type { Reporter } from "../shared/reporter.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { VENDOR_LIB_DIR } from "./extract.js";
import { stagedAppDir } from "./context.js";
import { renderStubModule, STUB_MODULE_PATH } from "./stub.js";
import { logger } from "../logger.js";

const ASAR = "app.asar";
const ASAR_UNPACKED = "app.asar.unpacked";
const ASAR_CONTENTS = "app.asar.contents";

export interface PatchReport {
  /** Both copies of the stub module, in the repacked archive tree and the install tree. */
  readonly stubPaths: [string, string];
  readonly trayIcons: string[];
  readonly localeFiles: string[];
}

async function asar(runner: ToolRunner, args: string[], cwd: string): Promise<void> {
  const argv = ["npx", "asar", ...args];
  const result = await runner.run({ argv, cwd });
  if (result.exitCode !== 0) {
    throw new BuildError(BuildErrorCode.REPACK_FAILED, `asar ${args[0]} failed with exit code ${result.exitCode}`, {
      argv,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
}

async function writeStub(root: string, source: string): Promise<string> {
  const target = path.join(root, ...STUB_MODULE_PATH);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, source, "utf-8");
  return target;
}

/** Copy files in `fromDir` whose names pass `filter` into `toDir`. Returns the copied names. */
async function copyMatching(fromDir: string, toDir: string, filter: (name: string) => boolean): Promise<string[]> {
  await fs.mkdir(toDir, { recursive: true });
  const entries = await fs.readdir(fromDir, { withFileTypes: true });
  const copied: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile() || !filter(entry.name)) continue;
    await fs.copyFile(path.join(fromDir, entry.name), path.join(toDir, entry.name));
    copied.push(entry.name);
  }
  return copied.sort();
}

/**
 * Unpack the vendor app.asar, swap the native addon for the stub, add tray
 * and locale resources, repack, and stage the result under the install tree.
 */
export async function patchResourceArchive(ctx: BuildContext, runner: ToolRunner, reporter: Reporter): Promise<PatchReport> {
  const resourcesDir = path.join(ctx.workDir, VENDOR_LIB_DIR, "resources");
  const appDir = path.join(ctx.workDir, "electron-app");
  const contentsDir = path.join(appDir, ASAR_CONTENTS);

  if (!existsSync(path.join(resourcesDir, ASAR))) {
    throw new BuildError(BuildErrorCode.REPACK_FAILED, `${ASAR} not found in ${resourcesDir}`, { resourcesDir });
  }

  await fs.mkdir(appDir, { recursive: true });
  await fs.copyFile(path.join(resourcesDir, ASAR), path.join(appDir, ASAR));
  if (existsSync(path.join(resourcesDir, ASAR_UNPACKED))) {
    await fs.cp(path.join(resourcesDir, ASAR_UNPACKED), path.join(appDir, ASAR_UNPACKED), { recursive: true });
  }

  await asar(runner, ["extract", ASAR, ASAR_CONTENTS], appDir);

  reporter.step("Creating stub native module...");
  const stub = renderStubModule();
  const archiveStub = await writeStub(contentsDir, stub);

  const trayIcons = await copyMatching(resourcesDir, path.join(contentsDir, "resources"), (name) => name.startsWith("Tray"));
  if (trayIcons.length === 0) {
    throw new BuildError(BuildErrorCode.REPACK_FAILED, `No Tray* resources found in ${resourcesDir}`, { resourcesDir });
  }
  const localeFiles = await copyMatching(resourcesDir, path.join(contentsDir, "resources", "i18n"), (name) => name.endsWith(".json"));
  if (localeFiles.length === 0) reporter.warn(`No locale files found in ${resourcesDir}`);

  await asar(runner, ["pack", ASAR_CONTENTS, ASAR], appDir);

  // Stage the app. The stub goes in after the unpacked tree so no vendor file can replace it.
  const targetDir = stagedAppDir(ctx);
  await fs.mkdir(targetDir, { recursive: true });
  await fs.copyFile(path.join(appDir, ASAR), path.join(targetDir, ASAR));
  if (existsSync(path.join(appDir, ASAR_UNPACKED))) {
    await fs.cp(path.join(appDir, ASAR_UNPACKED), path.join(targetDir, ASAR_UNPACKED), { recursive: true });
  }
  const installedStub = await writeStub(path.join(targetDir, ASAR_UNPACKED), stub);

  logger.info({ trayIcons, localeFiles }, "Resource archive repacked");
  return { stubPaths: [archiveStub, installedStub], trayIcons, localeFiles };
}
