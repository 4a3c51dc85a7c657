import { Command } from 'commander'
import { createRequire } from 'node:module'
import { runDoctorCommand } from './commands/doctor.js'
import { runExecCommand } from './commands/exec.js'
import { runInstallCommand } from './commands/install.js'
import { runLoginCommand } from './commands/login.js'
import { runStatusCommand } from './commands/status.js'
import { createContext, type CliContext, type ContextFactory } from './context.js'
import { processIO, withOutput, type CliIO } from './output/index.js'

const require = createRequire(import.meta.url)

type CliPackageJson = {
  version?: unknown
}

function resolveCliVersion(): string {
  const packageJson: CliPackageJson = require('../package.json')
  if (typeof packageJson.version === 'string' && packageJson.version.trim().length > 0) {
    return packageJson.version.trim()
  }
  throw new Error('Unable to resolve CLI version from package.json.')
}

const VERSION = resolveCliVersion()

export interface CliDeps {
  io?: CliIO
  createContext?: ContextFactory
}

export function createCli(deps: CliDeps = {}): Command {
  const io = deps.io ?? processIO
  const contextFactory = deps.createContext ?? createContext

  // One context per process run, built lazily so --help and --version never touch the workspace.
  let context: CliContext | null = null
  const contextFor = (command: Command): CliContext => {
    if (!context) {
      const root: unknown = command.optsWithGlobals().root
      context = contextFactory(typeof root === 'string' ? { root } : {})
    }
    return context
  }

  const program = new Command()

  program
    .name('usbide-assistant')
    .description('Run the Codex assistant from a portable workspace')
    .version(VERSION, '-v, --version', 'output the version number')
    // Global output options
    .option('--json', 'output in JSON format')
    .option('--no-color', 'disable colored output')
    .option('--root <path>', 'workspace root (default: $USBIDE_ROOT or the current directory)')

  program
    .command('login')
    .description('Sign in to the assistant (uses device auth when enabled)')
    .action(withOutput(io, (env, command) => runLoginCommand(env, contextFor(command))))

  program
    .command('status')
    .description('Check whether the assistant is signed in')
    .action(withOutput(io, (env, command) => runStatusCommand(env, contextFor(command))))

  program
    .command('exec')
    .description('Send a prompt and stream the transcript')
    .argument('<prompt...>', 'Prompt text')
    .action(
      withOutput(io, (env, command) => runExecCommand(env, contextFor(command), command.args))
    )

  program
    .command('install')
    .description('Install the assistant into the workspace with the portable npm')
    .option('-f, --force', 'Reinstall even when already present')
    .action(
      withOutput(io, (env, command) => {
        const force: unknown = command.opts().force
        return runInstallCommand(env, contextFor(command), { force: force === true })
      })
    )

  program
    .command('doctor')
    .description('Show how the assistant resolves and what its environment looks like')
    .action(withOutput(io, (env, command) => runDoctorCommand(env, contextFor(command))))

  return program
}
