import type { BuildContext } from "../types/context.js";
import type { Architecture, LibDir } from "../types/host.js";
import { PACKAGE_NAME, libDirFor } from "../pipeline/context.js";

/** Package metadata shared by every generated file. Derived only from the build context. */
export interface PackageDescriptor {
  readonly name: string;
  readonly version: string;
  readonly release: string;
  readonly arch: Architecture;
  readonly libDir: LibDir;
  readonly maintainer: string;
  readonly summary: string;
  readonly url: string;
  /** Staged tree the package copies from. */
  readonly installRoot: string;
}

export function describePackage(ctx: BuildContext): PackageDescriptor {
  return {
    name: PACKAGE_NAME,
    version: ctx.version,
    release: "1",
    arch: ctx.arch,
    libDir: libDirFor(ctx.arch),
    maintainer: ctx.maintainer,
    summary: "Claude Desktop for Linux",
    url: "https://www.anthropic.com",
    installRoot: ctx.installRoot,
  };
}

/** File name rpmbuild is told to produce, e.g. `claude-desktop-0.8.0-1.x86_64.rpm`. */
export function rpmFileName(pkg: PackageDescriptor): string {
  return `${pkg.name}-${pkg.version}-${pkg.release}.${pkg.arch}.rpm`;
}
