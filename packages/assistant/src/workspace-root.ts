import path from "node:path";
import { mkdirSync } from "node:fs";

export interface WorkspacePaths {
  root: string;
  cacheDir: string;
  npmCacheDir: string;
  pipCacheDir: string;
  pycacheDir: string;
  tmpDir: string;
  codexHome: string;
  stateDir: string;
  configPath: string;
  incidentLogPath: string;
  installPrefix: string;
  nodeToolsDir: string;
}

export function resolveWorkspaceRoot(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  const raw = env.USBIDE_ROOT?.trim();
  return path.resolve(cwd, raw && raw.length > 0 ? raw : ".");
}

export function workspacePaths(root: string): WorkspacePaths {
  const resolved = path.resolve(root);
  const cacheDir = path.join(resolved, "cache");
  const stateDir = path.join(resolved, ".usbide");
  return {
    root: resolved,
    cacheDir,
    npmCacheDir: path.join(cacheDir, "npm"),
    pipCacheDir: path.join(cacheDir, "pip"),
    pycacheDir: path.join(cacheDir, "pycache"),
    tmpDir: path.join(resolved, "tmp"),
    codexHome: path.join(resolved, "codex_home"),
    stateDir,
    configPath: path.join(stateDir, "config.json"),
    incidentLogPath: path.join(stateDir, "incidents.md"),
    installPrefix: path.join(stateDir, "codex"),
    nodeToolsDir: path.join(resolved, "tools", "node"),
  };
}

/**
 * Create the workspace-scoped directories the child process is pointed at.
 * Called once at startup; the bridge itself never writes outside these.
 */
export function ensureWorkspaceDirs(paths: WorkspacePaths): void {
  for (const dir of [
    paths.npmCacheDir,
    paths.pipCacheDir,
    paths.pycacheDir,
    paths.tmpDir,
    paths.codexHome,
    paths.stateDir,
  ]) {
    mkdirSync(dir, { recursive: true });
  }
}
