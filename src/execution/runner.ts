// Tool execution layer. Every external program the pipeline touches
// (7z, icoutils, asar, package managers, rpmbuild) goes through a ToolRunner.
// LocalToolRunner is the only production implementation; tests substitute a
// fake that simulates each tool's filesystem effects in-process.
import execa from "execa";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

/** Outcome of one tool invocation. A non-zero exit is data, not an exception. */
export interface RunResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface RunOptions {
  /** Attach the tool to the terminal (package managers, rpmbuild). Output is not captured. */
  interactive?: boolean;
}

export interface ToolRunner {
  run(command: Command, options?: RunOptions): Promise<RunResult>;
  /** True when `name` resolves on PATH. */
  exists(name: string): Promise<boolean>;
}

export class LocalToolRunner implements ToolRunner {
  async run(command: Command, options?: RunOptions): Promise<RunResult> {
    const start = performance.now();
    const [file, ...args] = command.argv;
    if (!file) throw new Error("Command has an empty argv");

    logger.debug({ argv: command.argv, cwd: command.cwd }, "Running tool");
    const result = await execa(file, args, {
      cwd: command.cwd,
      reject: false,
      stdio: options?.interactive ? "inherit" : "pipe",
    });
    const durationMs = Math.round(performance.now() - start);
    // Spawn failures (ENOENT) leave exitCode unset; report them like a shell would.
    const exitCode = result.exitCode ?? 127;
    logger.debug({ argv: command.argv, exitCode, durationMs }, "Tool finished");

    return { stdout: result.stdout ?? "", stderr: result.stderr ?? "", exitCode, durationMs };
  }

  async exists(name: string): Promise<boolean> {
    const result = await execa("bash", ["-c", 'command -v "$1"', "bash", name], { reject: false });
    return result.exitCode === 0;
  }
}

/** Render a command for status lines and error messages. */
export function formatCommand(command: Command): string {
  return command.argv.map((arg) => (/[\s"'$]/.test(arg) ? JSON.stringify(arg) : arg)).join(" ");
}
