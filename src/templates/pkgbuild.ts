import path from "node:path";
import type { PackageDescriptor } from "./descriptor.js";
import type { IconSize } from "../pipeline/icons.js";

/**
 * Arch-style recipe for Asahi. `package()` installs the already-staged tree;
 * makepkg is left to the operator. Only the icon sizes that were staged are
 * installed.
 */
export function renderPkgbuild(pkg: PackageDescriptor, icons: readonly IconSize[]): string {
  const usr = path.join(pkg.installRoot, "usr");
  return `# Maintainer: ${pkg.maintainer}
pkgname=${pkg.name}
pkgver=${pkg.version}
pkgrel=${pkg.release}
pkgdesc="${pkg.summary}"
arch=('aarch64')
url="${pkg.url}"
license=('custom:proprietary')
depends=('nodejs' 'npm' 'electron' 'p7zip')
options=(!strip)

package() {
    cd "$srcdir"

    # Create directories
    install -dm755 "$pkgdir/usr/${pkg.libDir}/$pkgname"
    install -dm755 "$pkgdir/usr/bin"
    install -dm755 "$pkgdir/usr/share/applications"

    # Copy files from the build directory
    cp -r "${usr}/lib/$pkgname"/* "$pkgdir/usr/${pkg.libDir}/$pkgname/"
    install -Dm755 "${usr}/bin/${pkg.name}" "$pkgdir/usr/bin/${pkg.name}"
    install -Dm644 "${usr}/share/applications/${pkg.name}.desktop" "$pkgdir/usr/share/applications/${pkg.name}.desktop"

${icons.length > 0 ? iconLoop(usr, pkg.name, icons) : ""}}
`;
}

function iconLoop(usr: string, name: string, icons: readonly IconSize[]): string {
  return `    # Copy icons
    for size in ${icons.join(" ")}; do
        install -dm755 "$pkgdir/usr/share/icons/hicolor/\${size}x\${size}/apps"
        install -Dm644 "${usr}/share/icons/hicolor/\${size}x\${size}/apps/${name}.png" "$pkgdir/usr/share/icons/hicolor/\${size}x\${size}/apps/${name}.png"
    done
`;
}
