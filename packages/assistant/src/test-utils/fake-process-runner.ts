import { LineQueue, planLaunch } from "../assistant/process-runner.js";
import type {
  LaunchPlan,
  ProcessRunRequest,
  ProcessRunner,
  RunningProcess,
} from "../assistant/process-runner.js";
import type { ProcessExit, RawLine, RawLineStream } from "../assistant/assistant-types.js";
import { spawnError } from "../errors.js";

export type FakeLine = string | { stream: RawLineStream; text: string };

export type FakeProcessScript = {
  lines?: FakeLine[];
  exitCode?: number | null;
  /** Reject `exit` as if the OS refused to create the process. */
  spawnFailure?: string;
  /** Keep the stream open until cancel() is called. */
  hang?: boolean;
};

export type FakeScriptSource = (request: ProcessRunRequest, callIndex: number) => FakeProcessScript;

class FakeRunningProcess implements RunningProcess {
  readonly exit: Promise<ProcessExit>;
  readonly pid = undefined;
  cancelled = false;
  private readonly queue = new LineQueue<RawLine>();
  private resolveExit: (exit: ProcessExit) => void = () => {};

  constructor(script: FakeProcessScript, command: string) {
    if (script.spawnFailure !== undefined) {
      this.queue.end();
      this.exit = Promise.reject(spawnError(command, new Error(script.spawnFailure)));
      return;
    }

    let seq = 0;
    for (const line of script.lines ?? []) {
      const entry = typeof line === "string" ? { stream: "stdout" as const, text: line } : line;
      this.queue.push({ ...entry, seq: seq++ });
    }

    this.exit = new Promise<ProcessExit>((resolve) => {
      this.resolveExit = resolve;
    });

    if (!script.hang) {
      this.queue.end();
      this.resolveExit({ code: script.exitCode ?? 0, signal: null });
    }
  }

  get lines(): AsyncIterable<RawLine> {
    return this.queue;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.queue.end();
    this.resolveExit({ code: null, signal: "SIGTERM" });
  }
}

/**
 * Deterministic runner for tests: replays scripted lines and exit codes and
 * records every request it receives.
 */
export class FakeProcessRunner implements ProcessRunner {
  readonly requests: ProcessRunRequest[] = [];
  readonly plans: LaunchPlan[] = [];
  readonly processes: FakeRunningProcess[] = [];
  private readonly scripts: FakeProcessScript[] = [];
  private readonly source: FakeScriptSource | null = null;

  constructor(
    scripts: FakeProcessScript[] | FakeScriptSource = [],
    private readonly platform: NodeJS.Platform = process.platform
  ) {
    if (typeof scripts === "function") {
      this.source = scripts;
    } else {
      this.scripts.push(...scripts);
    }
  }

  enqueue(...scripts: FakeProcessScript[]): this {
    this.scripts.push(...scripts);
    return this;
  }

  run(request: ProcessRunRequest): RunningProcess {
    const plan = planLaunch(request.candidate, request.argv, request.env, this.platform);
    const callIndex = this.requests.length;
    this.requests.push(request);
    this.plans.push(plan);
    const script = this.source
      ? this.source(request, callIndex)
      : this.scripts.shift() ?? { exitCode: 0 };
    const proc = new FakeRunningProcess(script, plan.command);
    this.processes.push(proc);
    return proc;
  }
}
