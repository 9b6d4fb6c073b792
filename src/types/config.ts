import type { Architecture } from "./host.js";

/** Full tool configuration, after defaults are applied. */
export interface BuilderConfig {
  download: Record<Architecture, string>;
  version: string | null;
  maintainer: string;
  work_dir: string;
  output_dir: string | null;
}
