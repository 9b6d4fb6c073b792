import type { Architecture, DistroFamily } from "./host.js";

/**
 * Per-run state. The work dir owns every intermediate artifact and is
 * recreated from scratch at the start of each run.
 */
export interface BuildContext {
  readonly arch: Architecture;
  readonly distro: DistroFamily;
  readonly version: string;
  readonly cwd: string;
  readonly workDir: string;
  /** Staged filesystem tree, laid out as it will land under `/`. */
  readonly installRoot: string;
  readonly outputDir: string;
  readonly maintainer: string;
}
