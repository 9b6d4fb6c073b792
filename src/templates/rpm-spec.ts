import path from "node:path";
import type { PackageDescriptor } from "./descriptor.js";
import type { IconSize } from "../pipeline/icons.js";

const DAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/** `%changelog` date, e.g. `Mon Oct 19 2026`. */
export function formatChangelogDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0");
  return `${DAYS[date.getDay()]} ${MONTHS[date.getMonth()]} ${day} ${date.getFullYear()}`;
}

/**
 * RPM spec that copies the pre-built tree into the buildroot. The lib dir is
 * chosen per target arch with %ifarch blocks, matching the launcher's path.
 * The icon glob is left out when no icon was staged, since rpmbuild rejects
 * a %files pattern that matches nothing.
 */
export function renderRpmSpec(pkg: PackageDescriptor, icons: readonly IconSize[], now: Date): string {
  const usr = path.join(pkg.installRoot, "usr");
  const staged = path.join(usr, "lib", pkg.name);
  return `Name:           ${pkg.name}
Version:        ${pkg.version}
Release:        ${pkg.release}%{?dist}
Summary:        ${pkg.summary}
License:        Proprietary
URL:            ${pkg.url}
BuildArch:      ${pkg.arch}
Requires:       nodejs >= 12.0.0, npm, p7zip

%description
Claude is an AI assistant from Anthropic.
This package provides the desktop interface for Claude.

%install
%ifarch x86_64
mkdir -p %{buildroot}/usr/lib64/${pkg.name}
%else
mkdir -p %{buildroot}/usr/lib/${pkg.name}
%endif
mkdir -p %{buildroot}/usr/bin
mkdir -p %{buildroot}/usr/share/applications
mkdir -p %{buildroot}/usr/share/icons

%ifarch x86_64
cp -r ${staged}/* %{buildroot}/usr/lib64/${pkg.name}/
%else
cp -r ${staged}/* %{buildroot}/usr/lib/${pkg.name}/
%endif
cp -r ${usr}/bin/* %{buildroot}/usr/bin/
cp -r ${usr}/share/applications/* %{buildroot}/usr/share/applications/
cp -r ${usr}/share/icons/* %{buildroot}/usr/share/icons/

%files
%{_bindir}/${pkg.name}
%ifarch x86_64
%{_libdir}/%{name}
%else
/usr/lib/%{name}
%endif
%{_datadir}/applications/${pkg.name}.desktop
${icons.length > 0 ? `%{_datadir}/icons/hicolor/*/apps/${pkg.name}.png\n` : ""}
%post
# Update icon caches
gtk-update-icon-cache -f -t %{_datadir}/icons/hicolor || :
# Force icon theme cache rebuild
touch -h %{_datadir}/icons/hicolor >/dev/null 2>&1 || :
update-desktop-database %{_datadir}/applications || :

%changelog
* ${formatChangelogDate(now)} ${pkg.maintainer} ${pkg.version}-${pkg.release}
- Initial package
`;
}
