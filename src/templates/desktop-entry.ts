import type { PackageDescriptor } from "./descriptor.js";

/**
 * Freedesktop entry. The Exec and MimeType lines register the `claude:` URL
 * handler, so their exact text is relied on by the desktop environment.
 */
export function renderDesktopEntry(pkg: PackageDescriptor): string {
  return [
    "[Desktop Entry]",
    "Name=Claude",
    `Exec=${pkg.name} %u`,
    `Icon=${pkg.name}`,
    "Type=Application",
    "Terminal=false",
    "Categories=Office;Utility;",
    "MimeType=x-scheme-handler/claude;",
    "StartupWMClass=claude",
    "",
  ].join("\n");
}
