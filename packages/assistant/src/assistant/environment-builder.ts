import { environmentError } from "../errors.js";
import { isWindows, pathDelimiter, splitSearchPath } from "../path-utils.js";
import type { WorkspacePaths } from "../workspace-root.js";
import type { EnvironmentSpec, ToolCandidate } from "./assistant-types.js";

export interface EnvironmentOverrides {
  allowApiKey: boolean;
  allowCustomBase: boolean;
}

export const API_KEY_VARIABLES = ["OPENAI_API_KEY", "CODEX_API_KEY"] as const;
export const CUSTOM_BASE_VARIABLES = ["OPENAI_BASE_URL", "OPENAI_API_BASE", "OPENAI_API_HOST"] as const;

export interface BuildEnvironmentInput {
  paths: WorkspacePaths;
  ambient: Record<string, string | undefined>;
  overrides: EnvironmentOverrides;
  candidate?: ToolCandidate | null;
  platform?: NodeJS.Platform;
}

export const WORKSPACE_VARIABLE_NAMES = [
  "CODEX_HOME",
  "TEMP",
  "TMP",
  "TMPDIR",
  "NPM_CONFIG_CACHE",
  "NPM_CONFIG_UPDATE_NOTIFIER",
  "PIP_CACHE_DIR",
  "PYTHONPYCACHEPREFIX",
  "PYTHONNOUSERSITE",
];

/**
 * Variables every child gets, all rooted under the workspace.
 */
export function workspaceVariables(paths: WorkspacePaths): EnvironmentSpec {
  return {
    CODEX_HOME: paths.codexHome,
    TEMP: paths.tmpDir,
    TMP: paths.tmpDir,
    TMPDIR: paths.tmpDir,
    NPM_CONFIG_CACHE: paths.npmCacheDir,
    NPM_CONFIG_UPDATE_NOTIFIER: "false",
    PIP_CACHE_DIR: paths.pipCacheDir,
    PYTHONPYCACHEPREFIX: paths.pycacheDir,
    PYTHONNOUSERSITE: "1",
  };
}

const UTF8_HINTS: EnvironmentSpec = {
  PYTHONUTF8: "1",
  PYTHONIOENCODING: "utf-8",
};

function copyAmbient(
  ambient: Record<string, string | undefined>,
  platform: NodeJS.Platform
): EnvironmentSpec {
  const env: EnvironmentSpec = {};
  for (const [key, value] of Object.entries(ambient)) {
    if (value === undefined) continue;
    // Windows hands out `Path`; children and our own lookups expect PATH.
    if (isWindows(platform) && key !== "PATH" && key.toUpperCase() === "PATH") {
      if (env.PATH === undefined) env.PATH = value;
      continue;
    }
    env[key] = value;
  }
  return env;
}

export function prependPath(
  env: EnvironmentSpec,
  dir: string,
  platform: NodeJS.Platform
): void {
  const entries = splitSearchPath(env.PATH, platform);
  if (entries.includes(dir)) {
    return;
  }
  env.PATH = [dir, ...entries].join(pathDelimiter(platform));
}

function variableName(platform: NodeJS.Platform): (key: string) => string {
  return isWindows(platform) ? (key) => key.toUpperCase() : (key) => key;
}

/**
 * Build the child environment. Pure: reads `ambient`, never mutates it.
 */
export function buildEnvironment(input: BuildEnvironmentInput): EnvironmentSpec {
  const platform = input.platform ?? process.platform;
  const env = copyAmbient(input.ambient, platform);
  const nameOf = variableName(platform);

  const denied = new Set<string>([
    ...(input.overrides.allowApiKey ? [] : API_KEY_VARIABLES),
    ...(input.overrides.allowCustomBase ? [] : CUSTOM_BASE_VARIABLES),
  ]);
  // Windows names are case-insensitive: a differently cased copy of an
  // overlaid name would sit beside the workspace value.
  const overlaid = new Set<string>(WORKSPACE_VARIABLE_NAMES);
  for (const key of Object.keys(env)) {
    const name = nameOf(key);
    if (denied.has(name) || (overlaid.has(name) && key !== name)) {
      delete env[key];
    }
  }

  Object.assign(env, workspaceVariables(input.paths));

  for (const [key, value] of Object.entries(UTF8_HINTS)) {
    if (!Object.keys(env).some((existing) => nameOf(existing) === key)) env[key] = value;
  }

  const candidate = input.candidate;
  if (candidate?.origin === "portable" && candidate.binDirs) {
    // Reverse so the first listed directory ends up first on PATH.
    for (const dir of [...candidate.binDirs].reverse()) {
      prependPath(env, dir, platform);
    }
  }

  return env;
}

/**
 * Read the ambient environment. Wrapped so a failure surfaces as an
 * environment error instead of a bare exception.
 */
export function readAmbientEnvironment(
  source: () => Record<string, string | undefined> = () => process.env
): Record<string, string | undefined> {
  try {
    return { ...source() };
  } catch (err) {
    throw environmentError(err);
  }
}

export interface EnvironmentSummary {
  variableCount: number;
  removed: string[];
  workspaceScoped: string[];
  pathEntries: number;
}

/**
 * Loggable view of a built environment: names and counts, never values.
 */
export function describeEnvironment(
  env: EnvironmentSpec,
  ambient: Record<string, string | undefined>,
  platform: NodeJS.Platform = process.platform
): EnvironmentSummary {
  const nameOf = variableName(platform);
  const guarded = new Set<string>([...API_KEY_VARIABLES, ...CUSTOM_BASE_VARIABLES]);
  const removed = Object.keys(ambient).filter(
    (key) => ambient[key] !== undefined && guarded.has(nameOf(key)) && env[key] === undefined
  );
  return {
    variableCount: Object.keys(env).length,
    removed,
    workspaceScoped: WORKSPACE_VARIABLE_NAMES.filter((key) => env[key] !== undefined),
    pathEntries: splitSearchPath(env.PATH, platform).length,
  };
}
