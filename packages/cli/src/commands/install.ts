import type { CliContext } from '../context.js'
import type { CommandEnv, CommandResult } from '../output/with-output.js'
import { interruptSignal, rawLineEcho } from './shared.js'

export interface InstallCommandOptions {
  force?: boolean
}

export async function runInstallCommand(
  env: CommandEnv,
  ctx: CliContext,
  options: InstallCommandOptions
): Promise<CommandResult> {
  const interrupt = interruptSignal()
  const outcome = await ctx.session
    .install({ force: options.force === true, onLine: rawLineEcho(env), signal: interrupt.signal })
    .finally(interrupt.dispose)
  let line: string
  if (outcome.skipped) {
    line = env.chalk.dim(`Already installed under ${ctx.paths.installPrefix}. Use --force to reinstall.`)
  } else if (outcome.ok) {
    line = env.chalk.green(`Installed into ${ctx.paths.installPrefix}.`)
  } else if (outcome.cancelled) {
    line = env.chalk.dim('Install cancelled.')
  } else {
    line = env.chalk.red(`npm install exited with ${outcome.exitCode ?? 'a signal'}.`)
  }
  return { ok: outcome.ok, data: outcome, lines: [line] }
}
