import { closeSync, existsSync, openSync, readFileSync, readSync, statSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { resolutionError } from "../errors.js";
import { envLookup, hasPathSeparator, isWindows, splitSearchPath } from "../path-utils.js";
import type { WorkspacePaths } from "../workspace-root.js";
import type { InvocationStrategy, ToolCandidate } from "./assistant-types.js";

export const ASSISTANT_COMMAND = "codex";
const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD;.PS1";

export interface ResolveToolOptions {
  /** Environment whose PATH/PATHEXT drive the host lookup. */
  env: Record<string, string | undefined>;
  packageName: string;
  platform?: NodeJS.Platform;
  command?: string;
}

export interface ResolvedRuntime {
  path: string;
  portable: boolean;
}

function isFile(candidate: string): boolean {
  try {
    return statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * Locate `command` on the search path of `env`. A command that already
 * contains a path separator is only checked as-is.
 */
export function findInPath(
  command: string,
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform
): string | null {
  const trimmed = command.trim();
  if (!trimmed) {
    return null;
  }
  if (path.isAbsolute(trimmed) || hasPathSeparator(trimmed, platform)) {
    return isFile(trimmed) ? trimmed : null;
  }

  let extensions = [""];
  if (isWindows(platform) && path.extname(trimmed) === "") {
    const pathext = envLookup(env, "PATHEXT", platform) ?? DEFAULT_PATHEXT;
    const parsed = pathext.split(";").filter((ext) => ext.length > 0);
    extensions = parsed.length > 0 ? parsed : [""];
  }

  for (const dir of splitSearchPath(envLookup(env, "PATH", platform), platform)) {
    for (const ext of extensions) {
      const candidate = path.join(dir, `${trimmed}${ext}`);
      if (isFile(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

/**
 * Portable runtime under tools/node first, then whatever `node` PATH offers.
 */
export function resolveRuntime(
  paths: WorkspacePaths,
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform
): ResolvedRuntime | null {
  const portableCandidates = isWindows(platform)
    ? [path.join(paths.nodeToolsDir, "node.exe")]
    : [path.join(paths.nodeToolsDir, "bin", "node"), path.join(paths.nodeToolsDir, "node")];
  for (const candidate of portableCandidates) {
    if (isFile(candidate)) {
      return { path: candidate, portable: true };
    }
  }
  const fromPath = findInPath("node", env, platform);
  return fromPath ? { path: fromPath, portable: false } : null;
}

/**
 * npm ships its CLI beside the runtime on Windows and under ../lib elsewhere.
 */
export function resolveNpmCli(runtimePath: string): string | null {
  const runtimeDir = path.dirname(runtimePath);
  const candidates = [
    path.join(runtimeDir, "node_modules", "npm", "bin", "npm-cli.js"),
    path.join(runtimeDir, "..", "lib", "node_modules", "npm", "bin", "npm-cli.js"),
  ];
  for (const candidate of candidates) {
    if (isFile(candidate)) {
      return path.resolve(candidate);
    }
  }
  return null;
}

const PackageBinSchema = z.object({
  bin: z.union([z.string(), z.record(z.string())]).optional(),
});

export function packageJsonPath(installPrefix: string, packageName: string): string {
  return path.join(installPrefix, "node_modules", ...packageName.split("/"), "package.json");
}

/**
 * Read the installed package's `bin` entry. Returns null unless the script
 * it names exists on disk.
 */
export function readInstalledEntrypoint(
  installPrefix: string,
  packageName: string,
  command: string = ASSISTANT_COMMAND
): string | null {
  const pkgJson = packageJsonPath(installPrefix, packageName);
  if (!existsSync(pkgJson)) {
    return null;
  }
  let parsed: z.infer<typeof PackageBinSchema>;
  try {
    parsed = PackageBinSchema.parse(JSON.parse(readFileSync(pkgJson, "utf8")));
  } catch {
    return null;
  }
  const bin = parsed.bin;
  let relative: string | undefined;
  if (typeof bin === "string") {
    relative = bin;
  } else if (bin) {
    relative = bin[command] ?? Object.values(bin)[0];
  }
  if (!relative) {
    return null;
  }
  const entry = path.join(path.dirname(pkgJson), relative);
  return isFile(entry) ? entry : null;
}

function readShebang(file: string): string | null {
  let fd: number | null = null;
  try {
    fd = openSync(file, "r");
    const buffer = Buffer.alloc(128);
    const read = readSync(fd, buffer, 0, buffer.length, 0);
    const head = buffer.subarray(0, read).toString("utf8");
    if (!head.startsWith("#!")) {
      return null;
    }
    return head.slice(2).split(/\r?\n/, 1)[0]?.trim() ?? null;
  } catch {
    return null;
  } finally {
    if (fd !== null) {
      closeSync(fd);
    }
  }
}

export function strategyForPath(
  resolved: string,
  platform: NodeJS.Platform = process.platform
): InvocationStrategy {
  if (!isWindows(platform)) {
    return "direct";
  }
  const ext = path.extname(resolved).toLowerCase();
  if (ext === ".cmd" || ext === ".bat") {
    return "windows-cmd";
  }
  if (ext === ".ps1") {
    return "windows-powershell";
  }
  return "direct";
}

function portableBinDirs(paths: WorkspacePaths, runtime: ResolvedRuntime): string[] {
  const dirs = [path.join(paths.installPrefix, "node_modules", ".bin")];
  if (runtime.portable) {
    dirs.push(path.join(paths.nodeToolsDir, "bin"), paths.nodeToolsDir);
  }
  return dirs;
}

/**
 * Decide what to launch: the portable runtime+entrypoint pair when both are
 * installed under the workspace, otherwise the assistant found on PATH.
 */
export function resolveTool(paths: WorkspacePaths, options: ResolveToolOptions): ToolCandidate {
  const platform = options.platform ?? process.platform;
  const command = options.command ?? ASSISTANT_COMMAND;

  const entrypoint = readInstalledEntrypoint(paths.installPrefix, options.packageName, command);
  const runtime = resolveRuntime(paths, options.env, platform);
  if (entrypoint && runtime) {
    return {
      origin: "portable",
      executablePath: runtime.path,
      entrypointPath: entrypoint,
      invocationStrategy: "direct",
      binDirs: portableBinDirs(paths, runtime),
    };
  }

  const resolved = findInPath(command, options.env, platform);
  if (!resolved) {
    throw resolutionError(
      "tool_not_found",
      `The ${command} assistant is not installed in ${paths.installPrefix} and was not found on PATH`,
      runtime
        ? "Run the install command to place the assistant inside the workspace."
        : `Place a Node.js runtime in ${paths.nodeToolsDir} (or add node to PATH), then run the install command.`,
      { installPrefix: paths.installPrefix, nodeToolsDir: paths.nodeToolsDir }
    );
  }

  const strategy = strategyForPath(resolved, platform);
  if (strategy !== "direct" && !runtime) {
    // npm shims on Windows call node themselves.
    throw resolutionError(
      "runtime_not_found",
      `${resolved} is a script wrapper but no Node.js runtime is reachable`,
      `Place node.exe in ${paths.nodeToolsDir} or add node to PATH.`,
      { resolved }
    );
  }

  if (isWindows(platform) && strategy === "direct" && path.extname(resolved) === "") {
    const shebang = readShebang(resolved);
    if (shebang && /\bnode\b/.test(shebang) && runtime) {
      return {
        origin: "path",
        executablePath: runtime.path,
        entrypointPath: resolved,
        invocationStrategy: "direct",
      };
    }
  }

  return {
    origin: "path",
    executablePath: resolved,
    invocationStrategy: strategy,
  };
}

/**
 * Session-scoped cache: resolution runs once and is only repeated after an
 * explicit invalidate (install or reload).
 */
export class ToolResolverCache {
  private candidate: ToolCandidate | null = null;

  constructor(private readonly resolver: () => ToolCandidate) {}

  get(): ToolCandidate {
    if (!this.candidate) {
      this.candidate = this.resolver();
    }
    return this.candidate;
  }

  peek(): ToolCandidate | null {
    return this.candidate;
  }

  invalidate(): void {
    this.candidate = null;
  }
}
