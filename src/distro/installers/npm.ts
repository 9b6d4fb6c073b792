import type { Command } from "../../types/command.js";

/** Tools installed from the npm registry rather than the distribution. */
export const AUXILIARY_TOOLS = ["electron", "asar"] as const;
export type AuxiliaryTool = (typeof AUXILIARY_TOOLS)[number];

export function npmGlobalInstall(tool: AuxiliaryTool): Command {
  return { argv: ["npm", "install", "-g", tool] };
}
