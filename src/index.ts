export { runPipeline } from "./pipeline/index.js";
export type { PipelineDeps, PipelineResult } from "./pipeline/index.js";
export { loadConfig, DEFAULT_CONFIG } from "./config/loader.js";
export { detectHost, nodeHostProbe } from "./host/detector.js";
export { LocalToolRunner } from "./execution/runner.js";
export type { ToolRunner, RunResult, RunOptions } from "./execution/runner.js";
export { ConsoleReporter } from "./shared/reporter.js";
export type { Reporter } from "./shared/reporter.js";
export { BuildError, BuildErrorCode } from "./shared/errors.js";
export { renderStubModule } from "./pipeline/stub.js";
export type { Architecture, DistroFamily, LibDir, HostContext, HostProbe, Command, BuildContext, BuilderConfig } from "./types/index.js";
