import fs from 'fs/promises';
import path from 'path';
import type { ToolRunner, RunResult, RunOptions } from '../../src/execution/runner.js';
import type { Command } from '../../src/types/command.js';
import type { HostProbe } from '../../src/types/host.js';
import type { BuildContext } from '../../src/types/context.js';
import type { Reporter } from '../../src/shared/reporter.js';
import { ICON_MANIFEST, ICON_SIZES, type IconSize } from '../../src/pipeline/icons.js';
import { REQUIRED_TOOLS } from '../../src/pipeline/dependencies.js';

export const FEDORA_FILES: Record<string, string> = {
  '/etc/fedora-release': 'Fedora release 40 (Forty)\n',
  '/etc/os-release': 'NAME="Fedora Linux"\nVERSION_ID=40\nPRETTY_NAME="Fedora Linux 40 (Workstation Edition)"\n',
};

export const ASAHI_FILES: Record<string, string> = {
  '/etc/os-release': 'NAME="Asahi Linux"\nID=arch\nPRETTY_NAME="Asahi Linux"\n',
};

export function fakeHost(opts: { machine?: string; files?: Record<string, string>; uid?: number } = {}): HostProbe {
  const files = opts.files ?? FEDORA_FILES;
  return {
    machine: () => opts.machine ?? 'x86_64',
    readFile: (p) => files[p] ?? null,
    uid: () => opts.uid ?? 0,
  };
}

export function makeContext(dir: string, overrides: Partial<BuildContext> = {}): BuildContext {
  const workDir = path.join(dir, 'build');
  return {
    arch: 'x86_64',
    distro: 'fedora',
    version: '0.8.0',
    cwd: dir,
    workDir,
    installRoot: path.join(workDir, 'package-root'),
    outputDir: dir,
    maintainer: 'Test Maintainer',
    ...overrides,
  };
}

export class MemoryReporter implements Reporter {
  readonly lines: Array<{ level: 'step' | 'ok' | 'warn' | 'fail'; message: string }> = [];

  step(message: string): void { this.lines.push({ level: 'step', message }); }
  ok(message: string): void { this.lines.push({ level: 'ok', message }); }
  warn(message: string): void { this.lines.push({ level: 'warn', message }); }
  fail(message: string): void { this.lines.push({ level: 'fail', message }); }

  messages(level: 'step' | 'ok' | 'warn' | 'fail'): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.message);
  }
}

export interface FakeToolOptions {
  /** Commands on PATH before the run. Defaults to every required and auxiliary tool. */
  present?: Iterable<string>;
  /** Icon sizes icotool produces. Defaults to all six. */
  icons?: readonly IconSize[];
  /** Leave the nested nupkg out of the installer. */
  omitNupkg?: boolean;
  /** Version stamped into the nested nupkg name. Defaults to 0.8.0. */
  nupkgVersion?: string;
  /** Return this exit code for any invocation the predicate matches. */
  fail?: { match: (argv: readonly string[]) => boolean; exitCode: number };
}

export const ALL_TOOLS = [...REQUIRED_TOOLS, 'electron', 'asar'];

export const TRAY_FILES = ['Tray-Win32.ico', 'TrayIconTemplate.png'];
export const LOCALE_FILES = ['de-DE.json', 'en-US.json'];

const ok = (stdout = ''): RunResult => ({ stdout, stderr: '', exitCode: 0, durationMs: 0 });

async function touch(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content);
}

/** Value of a `--define "<name> <value>"` pair, as passed to rpmbuild. */
function defineValue(argv: readonly string[], name: string): string | undefined {
  for (let i = 0; i < argv.length - 1; i++) {
    const value = argv[i + 1];
    if (argv[i] === '--define' && value?.startsWith(`${name} `)) return value.slice(name.length + 1);
  }
  return undefined;
}

/**
 * In-process stand-in for every external tool. Each invocation is recorded
 * and produces the files the real tool would leave behind.
 */
export class FakeToolRunner implements ToolRunner {
  readonly calls: Array<{ command: Command; options?: RunOptions }> = [];
  readonly present: Set<string>;
  private readonly opts: FakeToolOptions;

  constructor(opts: FakeToolOptions = {}) {
    this.opts = opts;
    this.present = new Set(opts.present ?? ALL_TOOLS);
  }

  argvs(): string[][] {
    return this.calls.map((c) => c.command.argv);
  }

  async exists(name: string): Promise<boolean> {
    return this.present.has(name);
  }

  async run(command: Command, options?: RunOptions): Promise<RunResult> {
    this.calls.push({ command, options });
    const argv = command.argv;
    if (this.opts.fail?.match(argv)) {
      return { stdout: '', stderr: 'simulated failure', exitCode: this.opts.fail.exitCode, durationMs: 0 };
    }
    const cwd = command.cwd ?? process.cwd();

    switch (argv[0]) {
      case 'dnf':
      case 'pacman':
        for (const tool of REQUIRED_TOOLS) this.present.add(tool);
        return ok();
      case 'npm': {
        const tool = argv[argv.length - 1];
        if (tool) this.present.add(tool);
        return ok();
      }
      case '7z':
        await this.sevenZip(argv[3] ?? '', cwd);
        return ok();
      case 'wrestool':
        await touch(path.join(cwd, 'claude.ico'), 'ico');
        return ok();
      case 'icotool':
        for (const size of this.opts.icons ?? ICON_SIZES) {
          await touch(path.join(cwd, ICON_MANIFEST[size]), `png-${size}`);
        }
        return ok();
      case 'npx':
        if (argv[2] === 'extract') {
          await touch(path.join(cwd, argv[4] ?? '', 'package.json'), '{"name":"claude"}');
        } else if (argv[2] === 'pack') {
          await touch(path.join(cwd, argv[4] ?? ''), 'repacked-asar');
        }
        return ok();
      case 'rpmbuild': {
        const rpmDir = defineValue(argv, '_rpmdir');
        const name = defineValue(argv, '_build_name_fmt');
        if (rpmDir && name) await touch(path.join(rpmDir, name), 'rpm');
        return ok();
      }
      default:
        return ok();
    }
  }

  private async sevenZip(archive: string, cwd: string): Promise<void> {
    if (archive.endsWith('.exe')) {
      if (!this.opts.omitNupkg) await touch(path.join(cwd, `AnthropicClaude-${this.opts.nupkgVersion ?? '0.8.0'}-full.nupkg`), 'nupkg');
      return;
    }
    const resources = path.join(cwd, 'lib', 'net45', 'resources');
    await touch(path.join(cwd, 'lib', 'net45', 'claude.exe'), 'exe');
    await touch(path.join(resources, 'app.asar'), 'vendor-asar');
    await touch(path.join(resources, 'app.asar.unpacked', 'node_modules', 'claude-native', 'claude-native-binding.node'), 'binary');
    for (const name of [...TRAY_FILES, ...LOCALE_FILES]) await touch(path.join(resources, name), name);
  }
}

export function fakeFetch(status: number, body = 'installer-bytes'): jest.Mock<Promise<Response>, [string]> {
  return jest.fn(async (_url: string) => new Response(body, { status }));
}

/** The error a synchronous call throws, or undefined when it returns. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
