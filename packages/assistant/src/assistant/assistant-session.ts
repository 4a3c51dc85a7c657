import { mkdir } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import {
  argvError,
  asError,
  authError,
  errorLogFields,
  isAssistantBridgeError,
  resolutionError,
} from "../errors.js";
import type { IncidentLog } from "../incident-log.js";
import { splitSearchPath } from "../path-utils.js";
import type { AssistantSettings } from "../persisted-config.js";
import type { WorkspacePaths } from "../workspace-root.js";
import type {
  CommandSpec,
  Diagnostic,
  DisplayEvent,
  ProcessExit,
  RawLine,
  ToolCandidate,
} from "./assistant-types.js";
import { buildCommand } from "./command-builder.js";
import { classify, formatDiagnostic } from "./diagnostics.js";
import {
  buildEnvironment,
  describeEnvironment,
  readAmbientEnvironment,
} from "./environment-builder.js";
import type { EnvironmentSummary } from "./environment-builder.js";
import type { ProcessRunner, RunningProcess } from "./process-runner.js";
import { ProtocolStreamParser } from "./protocol-stream-parser.js";
import {
  readInstalledEntrypoint,
  resolveNpmCli,
  resolveRuntime,
  resolveTool,
  ToolResolverCache,
} from "./tool-resolver.js";

export interface AssistantSessionOptions {
  paths: WorkspacePaths;
  settings: AssistantSettings;
  runner: ProcessRunner;
  logger: Logger;
  incidents?: IncidentLog;
  ambient?: () => Record<string, string | undefined>;
  platform?: NodeJS.Platform;
  /** Replaces filesystem resolution of the assistant. */
  resolveTool?: () => ToolCandidate;
  /** Replaces filesystem resolution of the runtime+npm pair used by install. */
  resolveInstaller?: () => ToolCandidate;
}

export interface CommandOutcome {
  ok: boolean;
  exitCode: number | null;
  output: string[];
  cancelled: boolean;
}

export interface InstallOutcome extends CommandOutcome {
  /** True when a portable install was already present and nothing ran. */
  skipped: boolean;
}

export interface ExecOptions {
  onEvent?: (event: DisplayEvent) => void;
  signal?: AbortSignal;
  extraArgs?: string[];
}

export interface ExecResult {
  ok: boolean;
  exitCode: number | null;
  transcript: DisplayEvent[];
  diagnostic?: Diagnostic;
  cancelled: boolean;
}

export interface SessionReport {
  root: string;
  candidate: ToolCandidate | null;
  resolutionError?: string;
  runtime: string | null;
  npmCli: string | null;
  settings: AssistantSettings;
  environment: EnvironmentSummary;
  /** First PATH entries the child would see. For display; never logged. */
  pathHead: string[];
  sandboxSupported: boolean;
  approvalSupported: boolean;
}

type RunOutcome = { exit: ProcessExit; cancelled: boolean };

const CANCELLED_OUTCOME: CommandOutcome = { ok: false, exitCode: null, output: [], cancelled: true };

/**
 * One workspace, one in-flight invocation. Every public operation other than
 * cancel() and reload() holds the session until it finishes.
 */
export class AssistantSession {
  private readonly paths: WorkspacePaths;
  private readonly settings: AssistantSettings;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;
  private readonly incidents: IncidentLog | null;
  private readonly ambientSource: () => Record<string, string | undefined>;
  private readonly platform: NodeJS.Platform;
  private readonly toolCache: ToolResolverCache;
  private readonly installerSource: () => ToolCandidate;

  private busy = false;
  private current: RunningProcess | null = null;
  private cancelRequested = false;
  private installAttempted = false;
  private sandboxSupported = true;
  private approvalSupported = true;

  constructor(options: AssistantSessionOptions) {
    this.paths = options.paths;
    this.settings = options.settings;
    this.runner = options.runner;
    this.logger = options.logger.child({ module: "assistant-session" });
    this.incidents = options.incidents ?? null;
    this.ambientSource = options.ambient ?? (() => process.env);
    this.platform = options.platform ?? process.platform;
    this.toolCache = new ToolResolverCache(
      options.resolveTool ??
        (() =>
          resolveTool(this.paths, {
            env: this.ambient(),
            packageName: this.settings.npmPackage,
            platform: this.platform,
          }))
    );
    this.installerSource = options.resolveInstaller ?? (() => this.resolveInstaller());
  }

  get isBusy(): boolean {
    return this.busy;
  }

  async login(onLine?: (line: RawLine) => void): Promise<CommandOutcome> {
    return this.exclusive(async () => {
      const candidate = await this.ensureAvailable();
      if (!candidate) return CANCELLED_OUTCOME;
      const spec = buildCommand({ operation: "login", deviceAuth: this.settings.deviceAuth });
      const outcome = await this.runCollecting(candidate, spec, onLine);
      if (!outcome.ok && !outcome.cancelled) {
        await this.recordIncident("warning", "login", `Login exited with ${outcome.exitCode ?? "a signal"}`);
      }
      return outcome;
    });
  }

  async status(onLine?: (line: RawLine) => void): Promise<CommandOutcome> {
    return this.exclusive(async () => {
      const candidate = await this.ensureAvailable();
      if (!candidate) return CANCELLED_OUTCOME;
      return this.runCollecting(candidate, buildCommand({ operation: "status" }), onLine);
    });
  }

  async install(
    options: { force?: boolean; onLine?: (line: RawLine) => void; signal?: AbortSignal } = {}
  ): Promise<InstallOutcome> {
    const { signal } = options;
    return this.exclusive(() =>
      this.cancelOnAbort(signal, () => this.installInner(options.force ?? false, options.onLine, signal))
    );
  }

  async exec(prompt: string, options: ExecOptions = {}): Promise<ExecResult> {
    if (this.busy) {
      throw argvError("invocation_in_progress");
    }
    // Validate before anything spawns; flags reflect what this CLI accepted so far.
    const spec = buildCommand({
      operation: "exec",
      prompt,
      sandbox: this.sandboxSupported ? this.settings.sandbox : null,
      approval: this.approvalSupported ? this.settings.approval : null,
      extraArgs: options.extraArgs,
    });

    const { signal } = options;
    const cancelled: ExecResult = { ok: false, exitCode: null, transcript: [], cancelled: true };
    return this.exclusive(() =>
      this.cancelOnAbort(signal, async () => {
        if (signal?.aborted) {
          return cancelled;
        }
        const candidate = await this.ensureAvailable(signal);
        if (!candidate) {
          return cancelled;
        }

        const status = await this.runCollecting(candidate, buildCommand({ operation: "status" }), undefined, signal);
        if (status.cancelled) {
          return { ...cancelled, exitCode: status.exitCode };
        }
        if (!status.ok) {
          const error = authError(status.exitCode);
          await this.recordIncident("warning", "exec", error.message, error.guidance);
          throw error;
        }

        return this.runExec(candidate, prompt, spec, options);
      })
    );
  }

  /** Stop the running child, if any. The pending operation resolves as cancelled. */
  cancel(): void {
    if (!this.current) {
      return;
    }
    this.cancelRequested = true;
    this.current.cancel();
  }

  /** Forget the resolved assistant and the flag support learned from it. */
  reload(): void {
    this.toolCache.invalidate();
    this.installAttempted = false;
    this.sandboxSupported = true;
    this.approvalSupported = true;
    this.logger.debug("Assistant resolution reset");
  }

  report(): SessionReport {
    const ambient = this.ambient();
    let candidate: ToolCandidate | null = null;
    let failure: string | undefined;
    try {
      candidate = this.toolCache.get();
    } catch (err) {
      if (!isAssistantBridgeError(err)) throw err;
      failure = `${err.message}. ${err.guidance}`;
    }
    const runtime = resolveRuntime(this.paths, ambient, this.platform);
    const env = buildEnvironment({
      paths: this.paths,
      ambient,
      overrides: this.settings,
      candidate,
      platform: this.platform,
    });
    return {
      root: this.paths.root,
      candidate,
      ...(failure !== undefined ? { resolutionError: failure } : {}),
      runtime: runtime?.path ?? null,
      npmCli: runtime ? resolveNpmCli(runtime.path) : null,
      settings: this.settings,
      environment: describeEnvironment(env, ambient, this.platform),
      pathHead: splitSearchPath(env.PATH, this.platform).slice(0, 3),
      sandboxSupported: this.sandboxSupported,
      approvalSupported: this.approvalSupported,
    };
  }

  private async runExec(
    candidate: ToolCandidate,
    prompt: string,
    spec: CommandSpec,
    options: ExecOptions
  ): Promise<ExecResult> {
    const parser = new ProtocolStreamParser();
    const transcript: DisplayEvent[] = [];
    const deliver = (events: DisplayEvent[]): void => {
      for (const event of events) {
        transcript.push(event);
        options.onEvent?.(event);
      }
    };

    deliver(parser.prompt(prompt));
    const outcome = await this.run(candidate, spec, (line) => deliver(parser.feed(line)), options.signal);
    deliver(parser.flush());

    const snapshot = parser.snapshot();
    if (snapshot.sandboxRejected && this.sandboxSupported) {
      this.sandboxSupported = false;
      this.logger.warn("Assistant rejected --sandbox; omitting it from now on");
    }
    if (snapshot.approvalRejected && this.approvalSupported) {
      this.approvalSupported = false;
      this.logger.warn("Assistant rejected --ask-for-approval; omitting it from now on");
    }
    this.logger.debug(
      {
        records: snapshot.records,
        skipped: snapshot.skipped,
        suppressed: snapshot.suppressed,
        threadId: snapshot.threadId,
      },
      "Exec stream finished"
    );

    const exitCode = outcome.exit.code;
    if (outcome.cancelled) {
      return { ok: false, exitCode, transcript, cancelled: true };
    }

    const diagnostic = classify(exitCode, snapshot.lastErrorMessage, snapshot.lastTransportStatus ?? undefined);
    if (diagnostic) {
      await this.recordIncident("error", "exec", diagnostic.summary, snapshot.lastErrorMessage ?? diagnostic.guidance);
      this.logger.warn({ kind: diagnostic.kind, exitCode }, formatDiagnostic(diagnostic));
      return { ok: false, exitCode, transcript, diagnostic, cancelled: false };
    }
    return { ok: true, exitCode, transcript, cancelled: false };
  }

  private async installInner(
    force: boolean,
    onLine?: (line: RawLine) => void,
    signal?: AbortSignal
  ): Promise<InstallOutcome> {
    if (!force && readInstalledEntrypoint(this.paths.installPrefix, this.settings.npmPackage)) {
      this.logger.info({ prefix: this.paths.installPrefix }, "Assistant already installed");
      return { ok: true, exitCode: 0, output: [], cancelled: false, skipped: true };
    }

    let installer: ToolCandidate;
    try {
      installer = this.installerSource();
    } catch (err) {
      await this.recordIncident("error", "install", asError(err).message);
      throw err;
    }

    await mkdir(this.paths.installPrefix, { recursive: true });
    const spec = buildCommand({
      operation: "install",
      prefix: this.paths.installPrefix,
      packageName: this.settings.npmPackage,
    });
    this.logger.info({ packageName: this.settings.npmPackage, prefix: this.paths.installPrefix }, "Installing assistant");

    const outcome = await this.runCollecting(installer, spec, onLine, signal);
    if (outcome.ok) {
      this.toolCache.invalidate();
    } else if (!outcome.cancelled) {
      await this.recordIncident(
        "error",
        "install",
        `npm install exited with ${outcome.exitCode ?? "a signal"}`,
        outcome.output.slice(-5).join("\n")
      );
    }
    return { ...outcome, skipped: false };
  }

  private resolveInstaller(): ToolCandidate {
    const runtime = resolveRuntime(this.paths, this.ambient(), this.platform);
    if (!runtime) {
      throw resolutionError(
        "runtime_not_found",
        "No Node.js runtime is available to run npm",
        `Place a Node.js runtime in ${this.paths.nodeToolsDir} or add node to PATH.`,
        { nodeToolsDir: this.paths.nodeToolsDir }
      );
    }
    const npmCli = resolveNpmCli(runtime.path);
    if (!npmCli) {
      throw resolutionError(
        "npm_not_found",
        `npm was not found next to ${runtime.path}`,
        "Use a Node.js distribution that bundles npm.",
        { runtime: runtime.path }
      );
    }
    return {
      origin: runtime.portable ? "portable" : "path",
      executablePath: runtime.path,
      entrypointPath: npmCli,
      invocationStrategy: "direct",
      ...(runtime.portable
        ? { binDirs: [path.join(this.paths.nodeToolsDir, "bin"), this.paths.nodeToolsDir] }
        : {}),
    };
  }

  /** Resolves null when an automatic install was cancelled. */
  private async ensureAvailable(signal?: AbortSignal): Promise<ToolCandidate | null> {
    try {
      return this.toolCache.get();
    } catch (err) {
      if (!isAssistantBridgeError(err) || err.code !== "tool_not_found") {
        await this.recordIncident("error", "resolve", asError(err).message);
        throw err;
      }
      if (!this.settings.autoInstall || this.installAttempted) {
        await this.recordIncident("error", "resolve", err.message, err.guidance);
        throw err;
      }
    }

    this.installAttempted = true;
    this.logger.info("Assistant not found; installing it into the workspace");
    const outcome = await this.installInner(false, undefined, signal);
    if (outcome.cancelled) {
      return null;
    }
    if (!outcome.ok) {
      throw resolutionError(
        "tool_not_found",
        `Automatic install of ${this.settings.npmPackage} failed (exit ${outcome.exitCode ?? "unknown"})`,
        "Check the network connection, then run the install command."
      );
    }
    return this.toolCache.get();
  }

  private async runCollecting(
    candidate: ToolCandidate,
    spec: CommandSpec,
    onLine?: (line: RawLine) => void,
    signal?: AbortSignal
  ): Promise<CommandOutcome> {
    const output: string[] = [];
    const outcome = await this.run(
      candidate,
      spec,
      (line) => {
        output.push(line.text);
        onLine?.(line);
      },
      signal
    );
    return {
      ok: !outcome.cancelled && outcome.exit.code === 0,
      exitCode: outcome.exit.code,
      output,
      cancelled: outcome.cancelled,
    };
  }

  private async run(
    candidate: ToolCandidate,
    spec: CommandSpec,
    onLine: (line: RawLine) => void,
    signal?: AbortSignal
  ): Promise<RunOutcome> {
    if (signal?.aborted) {
      return { exit: { code: null, signal: null }, cancelled: true };
    }
    const ambient = this.ambient();
    const env = buildEnvironment({
      paths: this.paths,
      ambient,
      overrides: this.settings,
      candidate,
      platform: this.platform,
    });
    this.logger.debug(
      { operation: spec.operation, environment: describeEnvironment(env, ambient, this.platform) },
      "Prepared child environment"
    );

    let proc: RunningProcess;
    try {
      proc = this.runner.run({ candidate, argv: spec.argv, env, cwd: this.paths.root });
    } catch (err) {
      await this.recordIncident("error", spec.operation, asError(err).message);
      throw err;
    }
    // Observe exit right away so a spawn failure never goes unhandled.
    const settled = proc.exit.then(
      (exit) => ({ exit }),
      (error: unknown) => ({ error })
    );

    this.current = proc;
    this.cancelRequested = false;
    try {
      for await (const line of proc.lines) {
        onLine(line);
      }
      const result = await settled;
      if ("error" in result) {
        this.logger.error({ err: errorLogFields(result.error) }, "Assistant process failed to start");
        await this.recordIncident("error", spec.operation, asError(result.error).message);
        throw result.error;
      }
      this.logger.debug({ operation: spec.operation, exit: result.exit }, "Assistant process exited");
      return { exit: result.exit, cancelled: this.cancelRequested };
    } finally {
      this.current = null;
    }
  }

  /** Every child spawned inside `task` is cancelled when `signal` aborts. */
  private async cancelOnAbort<T>(signal: AbortSignal | undefined, task: () => Promise<T>): Promise<T> {
    const onAbort = (): void => this.cancel();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      return await task();
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw argvError("invocation_in_progress");
    }
    this.busy = true;
    try {
      return await task();
    } finally {
      this.busy = false;
    }
  }

  private ambient(): Record<string, string | undefined> {
    return readAmbientEnvironment(this.ambientSource);
  }

  private async recordIncident(
    severity: "info" | "warning" | "error",
    context: string,
    message: string,
    details?: string
  ): Promise<void> {
    if (!this.incidents) return;
    await this.incidents.append(details === undefined ? { severity, context, message } : { severity, context, message, details });
  }
}
