import type { Logger } from 'pino'
import {
  AssistantSession,
  ChildProcessRunner,
  FileIncidentLog,
  createChildLogger,
  createRootLogger,
  ensureWorkspaceDirs,
  loadPersistedConfig,
  resolveAssistantSettings,
  resolveWorkspaceRoot,
  workspacePaths,
  type ProcessRunner,
  type WorkspacePaths,
} from '@usbide/assistant'

export interface CliContext {
  paths: WorkspacePaths
  logger: Logger
  session: AssistantSession
}

export interface ContextOptions {
  /** Value of --root; falls back to USBIDE_ROOT, then the working directory. */
  root?: string
  env?: NodeJS.ProcessEnv
  cwd?: string
  runner?: ProcessRunner
}

export type ContextFactory = (options: ContextOptions) => CliContext

export function createContext(options: ContextOptions = {}): CliContext {
  const env = options.env ?? process.env
  const root = options.root
    ? resolveWorkspaceRoot({ ...env, USBIDE_ROOT: options.root }, options.cwd)
    : resolveWorkspaceRoot(env, options.cwd)
  const paths = workspacePaths(root)
  ensureWorkspaceDirs(paths)

  const persisted = loadPersistedConfig(paths.configPath)
  const logger = createRootLogger(persisted, env)
  const settings = resolveAssistantSettings(persisted, env)
  createChildLogger(logger, 'cli').debug(
    { root: paths.root, sandbox: settings.sandbox, approval: settings.approval },
    'Workspace ready'
  )

  const session = new AssistantSession({
    paths,
    settings,
    logger,
    runner: options.runner ?? new ChildProcessRunner({ logger }),
    incidents: new FileIncidentLog(paths.incidentLogPath, logger),
    ambient: () => env,
  })
  return { paths, logger, session }
}
