// Packaging pipeline. Stages run strictly in order and the first BuildError
// ends the run; the only tolerated failure is a missing icon size.
import type { HostProbe } from "../types/host.js";
import type { BuilderConfig } from "../types/config.js";
import type { BuildContext } from "../types/context.js";
import type { ToolRunner } from "../execution/runner.js";
import type { Reporter } from "../shared/reporter.js";
import type { DependencyReport } from "./dependencies.js";
import type { IconReport } from "./icons.js";
import type { PatchReport } from "./patch.js";
import type { PackageArtifact } from "./assemble.js";
import type { FetchLike } from "./fetch.js";
import { detectHost } from "../host/detector.js";
import { createPackageInstaller } from "../distro/installers/factory.js";
import { resolveDependencies } from "./dependencies.js";
import { createBuildContext, prepareWorkDir } from "./context.js";
import { acquireBuildLock } from "./lock.js";
import { fetchInstaller, selectDownloadUrl } from "./fetch.js";
import { extractInstaller } from "./extract.js";
import { installIcons } from "./icons.js";
import { patchResourceArchive } from "./patch.js";
import { assemblePackage } from "./assemble.js";
import { logger } from "../logger.js";

export interface PipelineDeps {
  config: BuilderConfig;
  probe: HostProbe;
  runner: ToolRunner;
  reporter: Reporter;
  /** Invocation directory: holds the work dir, the lock, and the RPM by default. */
  cwd: string;
  fetch?: FetchLike;
  now?: () => Date;
}

export interface PipelineResult {
  context: BuildContext;
  dependencies: DependencyReport;
  icons: IconReport;
  patch: PatchReport;
  artifact: PackageArtifact;
}

async function stage<T>(name: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  logger.info({ stage: name }, "Stage started");
  const result = await fn();
  logger.info({ stage: name, durationMs: Math.round(performance.now() - start) }, "Stage finished");
  return result;
}

export async function runPipeline(deps: PipelineDeps): Promise<PipelineResult> {
  const { config, probe, runner, reporter, cwd } = deps;

  // ── Environment ───────────────────────────────────────────────
  const host = detectHost(probe);
  reporter.ok(`Detected architecture: ${host.arch}`);
  reporter.ok(host.distro === "fedora" ? "Fedora-based system detected" : "Asahi Linux detected");
  reporter.step("System Information:");
  reporter.step(`Distribution: ${host.prettyName}`);
  if (host.fedoraRelease) reporter.step(`Fedora version: ${host.fedoraRelease}`);
  reporter.step(`Architecture: ${host.arch}`);

  const ctx = createBuildContext(host, config, cwd);
  const releaseLock = await acquireBuildLock(cwd);
  try {
    // ── Dependencies (mutates host package state) ───────────────
    const packageInstaller = createPackageInstaller(host.distro);
    const dependencies = await stage("dependencies", () => resolveDependencies(runner, packageInstaller, reporter));

    await prepareWorkDir(ctx);

    // ── Acquisition ─────────────────────────────────────────────
    const url = selectDownloadUrl(ctx.arch, config);
    reporter.step(`Downloading Claude Desktop installer for ${ctx.arch}...`);
    const installerFile = await stage("fetch", () => fetchInstaller(ctx, url, deps.fetch));
    reporter.ok("Download complete");

    reporter.step("Extracting resources...");
    await stage("extract", () => extractInstaller(ctx, runner, installerFile));
    reporter.ok("Resources extracted");

    // ── Resources ───────────────────────────────────────────────
    reporter.step("Processing icons...");
    const icons = await stage("icons", () => installIcons(ctx, runner, reporter));
    const patch = await stage("patch", () => patchResourceArchive(ctx, runner, reporter));

    // ── Package ─────────────────────────────────────────────────
    const now = deps.now?.() ?? new Date();
    const artifact = await stage("assemble", () => assemblePackage(ctx, icons.installed, runner, reporter, now));

    reporter.ok(`Build process completed successfully for ${ctx.arch} architecture!`);
    if (artifact.kind === "rpm") {
      reporter.step(`You can install the package using: sudo dnf install ${artifact.path}`);
    } else {
      reporter.step(`Navigate to ${ctx.workDir}/asahi-pkg and run 'makepkg -si' to build and install the package`);
    }
    return { context: ctx, dependencies, icons, patch, artifact };
  } finally {
    await releaseLock();
  }
}
