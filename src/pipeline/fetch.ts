import fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import path from "node:path";
import type { Architecture } from "../types/host.js";
import type { BuilderConfig } from "../types/config.js";
import type { BuildContext } from "../types/context.js";
import { INSTALLER_FILENAME } from "./context.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export type FetchLike = (url: string) => Promise<Response>;

export function selectDownloadUrl(arch: Architecture, config: BuilderConfig): string {
  return config.download[arch];
}

export function installerPath(ctx: BuildContext): string {
  return path.join(ctx.workDir, INSTALLER_FILENAME);
}

/**
 * Stream the installer into the work dir. One attempt, no timeout:
 * a failed or hung transfer fails or hangs the run.
 */
export async function fetchInstaller(ctx: BuildContext, url: string, fetchImpl: FetchLike = fetch): Promise<string> {
  const dest = installerPath(ctx);
  const start = performance.now();

  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (err) {
    throw new BuildError(BuildErrorCode.DOWNLOAD_FAILED, `Failed to download installer from ${url}`, {
      url,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  if (!response.ok) {
    throw new BuildError(
      BuildErrorCode.DOWNLOAD_FAILED,
      `Failed to download installer: HTTP ${response.status} from ${url}`,
      { url, status: response.status },
    );
  }

  if (!response.body) {
    throw new BuildError(BuildErrorCode.DOWNLOAD_FAILED, `Empty response from ${url}`, { url, status: response.status });
  }
  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(dest));
  } catch (err) {
    throw new BuildError(BuildErrorCode.DOWNLOAD_FAILED, `Download from ${url} was interrupted`, {
      url,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const { size } = await fs.stat(dest);
  logger.info({ url, dest, bytes: size, durationMs: Math.round(performance.now() - start) }, "Installer downloaded");
  return dest;
}
