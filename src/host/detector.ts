import { readFileSync } from "node:fs";
import { machine } from "node:os";
import type { Architecture, DistroFamily, HostContext, HostProbe } from "../types/host.js";
import { BuildError, BuildErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const FEDORA_RELEASE_PATH = "/etc/fedora-release";
export const OS_RELEASE_PATH = "/etc/os-release";

/** Live host backed by node:os and /etc. */
export const nodeHostProbe: HostProbe = {
  machine: () => machine(),
  readFile: (path) => {
    try {
      return readFileSync(path, "utf-8");
    } catch {
      return null;
    }
  },
  uid: () => process.getuid?.() ?? -1,
};

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Map `uname -m` output onto a supported architecture tag. */
export function detectArchitecture(rawMachine: string): Architecture {
  switch (rawMachine) {
    case "x86_64":
      return "x86_64";
    case "aarch64":
    case "arm64":
      return "aarch64";
    default:
      throw new BuildError(
        BuildErrorCode.UNSUPPORTED_ARCHITECTURE,
        `Unsupported architecture: ${rawMachine}. Only x86_64 and aarch64 are supported.`,
        { machine: rawMachine },
      );
  }
}

/**
 * Fedora wins over Asahi: an Asahi Fedora Remix ships /etc/fedora-release
 * and builds an RPM like any other Fedora host.
 */
export function detectDistro(probe: HostProbe): DistroFamily {
  if (probe.readFile(FEDORA_RELEASE_PATH) !== null) return "fedora";
  const osRelease = probe.readFile(OS_RELEASE_PATH);
  if (osRelease?.includes("Asahi Linux")) return "asahi";
  throw new BuildError(
    BuildErrorCode.UNSUPPORTED_DISTRIBUTION,
    "A Fedora-based Linux distribution or Asahi Linux is required.",
  );
}

export function verifyRoot(probe: HostProbe): void {
  if (probe.uid() !== 0) {
    throw new BuildError(
      BuildErrorCode.INSUFFICIENT_PRIVILEGE,
      "Please run with sudo to install dependencies.",
      { uid: probe.uid() },
    );
  }
}

/**
 * Resolve the host identity. Checks run architecture first, then
 * distribution, then privilege; the first failure aborts the run.
 */
export function detectHost(probe: HostProbe = nodeHostProbe): HostContext {
  const arch = detectArchitecture(probe.machine());
  const distro = detectDistro(probe);
  verifyRoot(probe);

  const osRelease = parseOsRelease(probe.readFile(OS_RELEASE_PATH) ?? "");
  const host: HostContext = {
    arch,
    distro,
    prettyName: osRelease.PRETTY_NAME ?? osRelease.NAME ?? "Unknown",
    fedoraRelease: probe.readFile(FEDORA_RELEASE_PATH)?.trim() ?? null,
  };
  logger.info({ host }, "Host detection complete");
  return host;
}
