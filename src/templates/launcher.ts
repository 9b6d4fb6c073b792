import type { PackageDescriptor } from "./descriptor.js";

/** Shell wrapper that hands the repacked archive, plus all arguments, to electron. */
export function renderLauncher(pkg: PackageDescriptor): string {
  return `#!/bin/bash
electron /usr/${pkg.libDir}/${pkg.name}/app.asar "$@"
`;
}
