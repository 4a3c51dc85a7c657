import type { CliContext } from '../context.js'
import { renderReport } from '../output/render.js'
import type { CommandEnv, CommandResult } from '../output/with-output.js'

export async function runDoctorCommand(env: CommandEnv, ctx: CliContext): Promise<CommandResult> {
  const report = ctx.session.report()
  return { ok: report.candidate !== null, data: report, lines: renderReport(report, env.chalk) }
}
