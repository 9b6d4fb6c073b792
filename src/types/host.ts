/** CPU architecture tag used in package metadata. */
export type Architecture = "x86_64" | "aarch64";

/** Packaging convention of the host distribution. */
export type DistroFamily = "fedora" | "asahi";

/** Library directory convention for the installed app. */
export type LibDir = "lib64" | "lib";

/**
 * Host identity resolved by the prober.
 * Consumed by every later stage; never mutated after detection.
 */
export interface HostContext {
  readonly arch: Architecture;
  readonly distro: DistroFamily;
  readonly prettyName: string;
  readonly fedoraRelease: string | null;
}

/** Read-only view of the host, swapped for a fixed identity in tests. */
export interface HostProbe {
  machine(): string;
  readFile(path: string): string | null;
  uid(): number;
}
