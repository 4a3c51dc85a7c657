import type { CliContext } from '../context.js'
import type { CommandEnv, CommandResult } from '../output/with-output.js'
import { rawLineEcho } from './shared.js'

export async function runStatusCommand(env: CommandEnv, ctx: CliContext): Promise<CommandResult> {
  const outcome = await ctx.session.status(rawLineEcho(env))
  const lines = outcome.ok
    ? [env.chalk.green('Authenticated.')]
    : [env.chalk.red('Not signed in.'), env.chalk.dim('Run `usbide-assistant login` to sign in.')]
  return { ok: outcome.ok, data: { authenticated: outcome.ok, ...outcome }, lines }
}
