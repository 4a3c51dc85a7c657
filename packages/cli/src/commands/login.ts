import type { CliContext } from '../context.js'
import type { CommandEnv, CommandResult } from '../output/with-output.js'
import { rawLineEcho } from './shared.js'

export async function runLoginCommand(env: CommandEnv, ctx: CliContext): Promise<CommandResult> {
  const outcome = await ctx.session.login(rawLineEcho(env))
  const lines: string[] = []
  if (outcome.cancelled) {
    lines.push(env.chalk.dim('Login cancelled.'))
  } else if (outcome.ok) {
    lines.push(env.chalk.green('Signed in.'))
  } else {
    lines.push(env.chalk.red(`Login failed (exit ${outcome.exitCode ?? 'signal'}).`))
  }
  return { ok: outcome.ok, data: outcome, lines }
}
