import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import readline from "node:readline";
import type { Readable } from "node:stream";
import type { Logger } from "pino";
import { argvError, asError, spawnError } from "../errors.js";
import { envLookup, isWindows, pathForCommand } from "../path-utils.js";
import type {
  EnvironmentSpec,
  ProcessExit,
  RawLine,
  RawLineStream,
  ToolCandidate,
} from "./assistant-types.js";
import { findInPath } from "./tool-resolver.js";

const KILL_GRACE_MS = 2000;

export interface ProcessRunRequest {
  candidate: ToolCandidate;
  argv: string[];
  env: EnvironmentSpec;
  cwd?: string;
}

export interface RunningProcess {
  /** stdout and stderr lines, in arrival order. Ends when the child is gone or cancelled. */
  readonly lines: AsyncIterable<RawLine>;
  /** Resolves when the child exits; rejects with a spawn error if it never started. */
  readonly exit: Promise<ProcessExit>;
  readonly pid: number | undefined;
  cancel(): void;
}

/**
 * Swappable process backend. The OS-backed implementation lives here; tests
 * use the fake from test-utils.
 */
export interface ProcessRunner {
  run(request: ProcessRunRequest): RunningProcess;
}

export interface LaunchPlan {
  /** Full argument vector, interpreter first. */
  argv: string[];
  command: string;
  args: string[];
  windowsVerbatimArguments: boolean;
}

// cmd.exe metacharacters that must be caret-escaped inside a /s /c line.
const CMD_META_CHARS = /([()\][%!^"`<>&|;, *?])/g;

/**
 * Quote one argument for the MSVC runtime, then escape it for cmd.exe.
 */
export function quoteForCmd(arg: string): string {
  let quoted = arg.replace(/(\\*)"/g, '$1$1\\"');
  quoted = quoted.replace(/(\\*)$/, "$1$1");
  quoted = `"${quoted}"`;
  return quoted.replace(CMD_META_CHARS, "^$1");
}

export function buildCmdCommandLine(argv: string[]): string {
  const [command, ...rest] = argv;
  if (command === undefined) {
    return "";
  }
  const head = command.replace(CMD_META_CHARS, "^$1");
  return [head, ...rest.map(quoteForCmd)].join(" ");
}

/**
 * Apply the candidate's invocation strategy to `argv`.
 */
export function planLaunch(
  candidate: ToolCandidate,
  argv: string[],
  env: EnvironmentSpec,
  platform: NodeJS.Platform = process.platform
): LaunchPlan {
  if (argv.length === 0) {
    throw argvError("empty_argv");
  }

  switch (candidate.invocationStrategy) {
    case "windows-cmd": {
      const comspec = envLookup(env, "COMSPEC", platform) ?? "cmd.exe";
      const target = [pathForCommand(candidate.executablePath, platform), ...argv];
      return {
        argv: [comspec, "/d", "/s", "/c", ...target],
        command: comspec,
        // /s strips the outer quotes, so the line keeps its own quoting.
        args: ["/d", "/s", "/c", `"${buildCmdCommandLine(target)}"`],
        windowsVerbatimArguments: true,
      };
    }
    case "windows-powershell": {
      const powershell = findInPath("powershell", env, platform) ?? "powershell";
      // Bypass applies to this process only; no policy setting is changed.
      const args = [
        "-NoProfile",
        "-ExecutionPolicy",
        "Bypass",
        "-File",
        pathForCommand(candidate.executablePath, platform),
        ...argv,
      ];
      return { argv: [powershell, ...args], command: powershell, args, windowsVerbatimArguments: false };
    }
    case "direct": {
      const command = pathForCommand(candidate.executablePath, platform);
      const args = candidate.entrypointPath
        ? [pathForCommand(candidate.entrypointPath, platform), ...argv]
        : [...argv];
      return { argv: [command, ...args], command, args, windowsVerbatimArguments: false };
    }
  }
}

/**
 * Single-consumer async queue. Pushes after end() are dropped.
 */
export class LineQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private ended = false;

  push(item: T): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return;
    }
    this.items.push({ value: item });
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isEnded(): boolean {
    return this.ended;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const next = this.items.shift();
        if (next) {
          return Promise.resolve({ value: next.value, done: false });
        }
        if (this.ended) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => this.waiters.push(resolve));
      },
    };
  }
}

export interface ChildProcessRunnerOptions {
  logger: Logger;
  platform?: NodeJS.Platform;
  killGraceMs?: number;
}

export class ChildProcessRunner implements ProcessRunner {
  private readonly logger: Logger;
  private readonly platform: NodeJS.Platform;
  private readonly killGraceMs: number;

  constructor(options: ChildProcessRunnerOptions) {
    this.logger = options.logger.child({ module: "process-runner" });
    this.platform = options.platform ?? process.platform;
    this.killGraceMs = options.killGraceMs ?? KILL_GRACE_MS;
  }

  run(request: ProcessRunRequest): RunningProcess {
    const plan = planLaunch(request.candidate, request.argv, request.env, this.platform);
    this.logger.debug(
      { argv: plan.argv, cwd: request.cwd, strategy: request.candidate.invocationStrategy },
      "Spawning assistant process"
    );

    let child: ChildProcess;
    try {
      child = spawn(plan.command, plan.args, {
        cwd: request.cwd,
        env: request.env,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
        windowsVerbatimArguments: plan.windowsVerbatimArguments,
      });
    } catch (err) {
      throw spawnError(plan.command, err);
    }

    return new ChildRunningProcess(child, plan.command, this.logger, this.platform, this.killGraceMs);
  }
}

class ChildRunningProcess implements RunningProcess {
  readonly exit: Promise<ProcessExit>;
  private readonly queue = new LineQueue<RawLine>();
  private seq = 0;
  private openStreams = 0;
  private cancelled = false;
  private exited = false;

  constructor(
    private readonly child: ChildProcess,
    command: string,
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform,
    private readonly killGraceMs: number
  ) {
    this.attach(child.stdout, "stdout");
    this.attach(child.stderr, "stderr");
    if (this.openStreams === 0) {
      this.queue.end();
    }

    this.exit = new Promise<ProcessExit>((resolve, reject) => {
      child.on("error", (err) => {
        this.exited = true;
        this.queue.end();
        reject(spawnError(command, err));
      });
      child.once("close", (code, signal) => {
        this.exited = true;
        this.queue.end();
        resolve({ code, signal });
      });
    });
  }

  get lines(): AsyncIterable<RawLine> {
    return this.queue;
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  cancel(): void {
    if (this.cancelled || this.exited) {
      this.queue.end();
      return;
    }
    this.cancelled = true;
    this.logger.info({ pid: this.child.pid }, "Cancelling assistant process");
    this.queue.end();

    if (isWindows(this.platform) && this.child.pid !== undefined) {
      // Wrapper strategies put cmd.exe or powershell in front; take the tree down.
      const killer = spawn("taskkill", ["/pid", String(this.child.pid), "/T", "/F"], {
        stdio: "ignore",
        windowsHide: true,
      });
      killer.once("error", (err) => {
        this.logger.warn({ err: asError(err).message }, "taskkill failed, falling back to kill()");
        this.child.kill();
      });
      return;
    }

    this.child.kill("SIGTERM");
    const timer = setTimeout(() => {
      if (!this.exited) {
        this.child.kill("SIGKILL");
      }
    }, this.killGraceMs);
    timer.unref();
  }

  private attach(stream: Readable | null, origin: RawLineStream): void {
    if (!stream) return;
    this.openStreams += 1;
    stream.setEncoding("utf8");
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
    rl.on("line", (line) => {
      this.queue.push({ stream: origin, text: line.replace(/\r$/, ""), seq: this.seq++ });
    });
    rl.once("close", () => {
      this.openStreams -= 1;
      if (this.openStreams === 0 && this.exited) {
        this.queue.end();
      }
    });
  }
}
