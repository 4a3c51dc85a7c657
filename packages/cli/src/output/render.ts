import type { ChalkInstance } from 'chalk'
import {
  isAssistantBridgeError,
  translateCliLine,
  type Diagnostic,
  type DisplayEvent,
  type RawLine,
  type SessionReport,
} from '@usbide/assistant'
import type { OutputOptions } from './with-output.js'

export interface CommandError {
  code: string
  message: string
  guidance?: string
}

export function toCommandError(error: unknown): CommandError {
  if (isAssistantBridgeError(error)) {
    return { code: error.code, message: error.message, guidance: error.guidance }
  }
  if (error instanceof Error) {
    return { code: 'UNEXPECTED_ERROR', message: error.message }
  }
  return { code: 'UNEXPECTED_ERROR', message: String(error) }
}

export function renderError(error: CommandError, output: OutputOptions, chalk: ChalkInstance): string {
  if (output.json) {
    return JSON.stringify({ error }, null, 2)
  }
  const lines = [chalk.red(`Error: ${error.message}`)]
  if (error.guidance) {
    lines.push(chalk.dim(error.guidance))
  }
  return lines.join('\n')
}

/** One transcript entry as a terminal line. */
export function renderEvent(event: DisplayEvent, chalk: ChalkInstance): string {
  switch (event.type) {
    case 'user_message':
      return chalk.blue(`> ${event.text}`)
    case 'assistant_message':
      return chalk.green(event.text)
    case 'action':
      return chalk.yellow(`* ${event.text}`)
    case 'error':
      return chalk.red(`! ${event.message}`)
    case 'notice':
      return chalk.dim(`- ${event.text}`)
  }
}

/** Plain CLI output, with known chatter rewritten. */
export function renderRawLine(line: RawLine, chalk: ChalkInstance): string {
  const translated = translateCliLine(line.text)
  if (translated) {
    return chalk.dim(translated)
  }
  return line.stream === 'stderr' ? chalk.dim(line.text) : line.text
}

export function renderDiagnostic(diagnostic: Diagnostic, chalk: ChalkInstance): string[] {
  return [chalk.red(diagnostic.summary), chalk.dim(diagnostic.guidance)]
}

export function renderReport(report: SessionReport, chalk: ChalkInstance): string[] {
  const lines = [`${chalk.bold('Workspace')}  ${report.root}`]
  if (report.candidate) {
    const { candidate } = report
    const target = candidate.entrypointPath
      ? `${candidate.executablePath} ${candidate.entrypointPath}`
      : candidate.executablePath
    lines.push(`${chalk.bold('Assistant')}  ${chalk.green(candidate.origin)} ${target} (${candidate.invocationStrategy})`)
  } else {
    lines.push(`${chalk.bold('Assistant')}  ${chalk.red(report.resolutionError ?? 'not found')}`)
  }
  lines.push(`${chalk.bold('Runtime')}    ${report.runtime ?? chalk.red('not found')}`)
  lines.push(`${chalk.bold('npm')}        ${report.npmCli ?? chalk.red('not found')}`)
  lines.push(
    `${chalk.bold('Policy')}     sandbox=${report.sandboxSupported ? report.settings.sandbox : 'omitted'} ` +
      `approval=${report.approvalSupported ? report.settings.approval : 'omitted'}`
  )
  lines.push(
    `${chalk.bold('Overrides')}  apiKey=${onOff(report.settings.allowApiKey)} ` +
      `customBase=${onOff(report.settings.allowCustomBase)} autoInstall=${onOff(report.settings.autoInstall)}`
  )
  const env = report.environment
  lines.push(
    `${chalk.bold('Env')}        ${env.variableCount} variables, removed: ${env.removed.length > 0 ? env.removed.join(', ') : 'none'}`
  )
  if (report.pathHead.length > 0) {
    lines.push(`${chalk.bold('PATH')}       ${report.pathHead.join(' | ')}`)
  }
  return lines
}

function onOff(value: boolean): string {
  return value ? 'on' : 'off'
}
