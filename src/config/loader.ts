// Config loader: reads an optional YAML file and merges it over defaults.
// The file is validated with zod before merging; a bad file stops the run.
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { BuilderConfig } from "../types/config.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const CONFIG_ENV_VAR = "CLAUDE_DESKTOP_FEDORA_CONFIG";

const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "claude-desktop-fedora", "config.yaml");

// Update when a new installer is published. There is no separate aarch64 build yet.
const INSTALLER_URL =
  "https://storage.googleapis.com/osprey-downloads-c02f6a0d-347c-492b-a752-3e0651722e97/nest-win-x64/Claude-Setup-x64.exe";

export const DEFAULT_CONFIG: BuilderConfig = {
  download: { x86_64: INSTALLER_URL, aarch64: INSTALLER_URL },
  version: null,
  maintainer: "Claude Desktop Linux Maintainers",
  work_dir: "build",
  output_dir: null,
};

const configFileSchema = z
  .object({
    download: z
      .object({
        x86_64: z.string().url(),
        aarch64: z.string().url(),
      })
      .partial()
      .strict(),
    version: z.string().regex(/^\d+(\.\d+)*$/, "version must be dotted digits").nullable(),
    maintainer: z.string().min(1),
    work_dir: z.string().min(1),
    output_dir: z.string().min(1).nullable(),
  })
  .partial()
  .strict();

export interface ConfigResult {
  config: BuilderConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env[CONFIG_ENV_VAR] ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.debug({ configPath }, "No config file, using defaults");
    return { config: cloneDefaults(), configPath, fromFile: false };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new BuildError(BuildErrorCode.CONFIG_INVALID, `Could not parse config file ${configPath}`, {
      configPath,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new BuildError(BuildErrorCode.CONFIG_INVALID, `Invalid config file ${configPath}: ${issues.join("; ")}`, {
      configPath,
      issues,
    });
  }

  const file = parsed.data;
  const config: BuilderConfig = {
    download: {
      x86_64: file.download?.x86_64 ?? DEFAULT_CONFIG.download.x86_64,
      aarch64: file.download?.aarch64 ?? DEFAULT_CONFIG.download.aarch64,
    },
    // null is a meaningful value for these two, so only a missing key falls back
    version: file.version === undefined ? DEFAULT_CONFIG.version : file.version,
    maintainer: file.maintainer ?? DEFAULT_CONFIG.maintainer,
    work_dir: file.work_dir ?? DEFAULT_CONFIG.work_dir,
    output_dir: file.output_dir === undefined ? DEFAULT_CONFIG.output_dir : file.output_dir,
  };
  logger.info({ configPath }, "Configuration loaded");
  return { config, configPath, fromFile: true };
}

function cloneDefaults(): BuilderConfig {
  return { ...DEFAULT_CONFIG, download: { ...DEFAULT_CONFIG.download } };
}

