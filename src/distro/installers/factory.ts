import type { DistroFamily } from "../../types/host.js";
import type { PackageInstaller } from "./interface.js";
import { FedoraInstaller } from "./fedora.js";
import { AsahiInstaller } from "./asahi.js";

/** Create the PackageInstaller for the detected distribution family. */
export function createPackageInstaller(family: DistroFamily): PackageInstaller {
  switch (family) {
    case "fedora": return new FedoraInstaller();
    case "asahi": return new AsahiInstaller();
  }
}
