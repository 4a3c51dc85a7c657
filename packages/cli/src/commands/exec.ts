import type { DisplayEvent } from '@usbide/assistant'
import type { CliContext } from '../context.js'
import { renderDiagnostic, renderEvent } from '../output/render.js'
import type { CommandEnv, CommandResult } from '../output/with-output.js'
import { interruptSignal } from './shared.js'

export interface ExecCommandOptions {
  /** Arguments appended after the prompt, passed through as-is. */
  extraArgs?: string[]
  /** Defaults to SIGINT on this process. */
  signal?: AbortSignal
}

export async function runExecCommand(
  env: CommandEnv,
  ctx: CliContext,
  promptWords: string[],
  options: ExecCommandOptions = {}
): Promise<CommandResult> {
  const interrupt = options.signal ? null : interruptSignal()
  const signal = options.signal ?? interrupt?.signal

  const onEvent = env.output.json ? undefined : (event: DisplayEvent) => env.io.out(renderEvent(event, env.chalk))
  try {
    const result = await ctx.session.exec(promptWords.join(' '), {
      onEvent,
      signal,
      extraArgs: options.extraArgs,
    })

    const lines: string[] = []
    if (result.cancelled) {
      lines.push(env.chalk.dim('Cancelled.'))
    } else if (result.diagnostic) {
      lines.push(...renderDiagnostic(result.diagnostic, env.chalk))
    }
    return { ok: result.ok, data: result, lines }
  } finally {
    interrupt?.dispose()
  }
}
