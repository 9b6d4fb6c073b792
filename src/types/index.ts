export type { Architecture, DistroFamily, LibDir, HostContext, HostProbe } from "./host.js";
export type { Command } from "./command.js";
export type { BuildContext } from "./context.js";
export type { BuilderConfig } from "./config.js";
