/**
 * Command wrapper for automatic output rendering.
 *
 * Wraps command handlers to render results and handle errors.
 */

import { Command } from 'commander'
import type { OptionValues } from 'commander'
import { Chalk } from 'chalk'
import type { ChalkInstance } from 'chalk'
import { renderError, toCommandError } from './render.js'

export interface OutputOptions {
  json: boolean
  color: boolean
}

/** Where command output goes. Swapped for a buffer in tests. */
export interface CliIO {
  out(text: string): void
  err(text: string): void
  setExitCode(code: number): void
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text + '\n')
  },
  err: (text) => {
    process.stderr.write(text + '\n')
  },
  setExitCode: (code) => {
    process.exitCode = code
  },
}

export interface CommandEnv {
  output: OutputOptions
  io: CliIO
  chalk: ChalkInstance
}

export interface CommandResult {
  ok: boolean
  /** Printed as JSON under --json. */
  data: unknown
  /** Printed one per line otherwise. */
  lines: string[]
}

export function extractOutputOptions(options: OptionValues): OutputOptions {
  return {
    json: options.json === true,
    // Commander uses --no-color -> color: false
    color: options.color !== false,
  }
}

export type CommandHandler = (env: CommandEnv, command: Command) => Promise<CommandResult>

/**
 * Wrap a command handler to render its result.
 *
 * The wrapped handler returns a CommandResult. The wrapper will:
 * 1. Call the handler
 * 2. Render the result as JSON or text lines
 * 3. Set exit code 1 when the result is not ok
 * 4. Render thrown errors to stderr with exit code 1
 */
export function withOutput(io: CliIO, handler: CommandHandler): (...args: unknown[]) => Promise<void> {
  return async (...args) => {
    // Commander passes the command last
    const command = args[args.length - 1]
    if (!(command instanceof Command)) {
      throw new Error('withOutput: action was called without its command')
    }
    const output = extractOutputOptions(command.optsWithGlobals())
    const chalk = new Chalk({ level: output.color ? 1 : 0 })
    const env: CommandEnv = { output, io, chalk }

    try {
      const result = await handler(env, command)
      if (output.json) {
        io.out(JSON.stringify(result.data, null, 2))
      } else if (result.lines.length > 0) {
        io.out(result.lines.join('\n'))
      }
      if (!result.ok) {
        io.setExitCode(1)
      }
    } catch (error) {
      io.err(renderError(toCommandError(error), output, chalk))
      io.setExitCode(1)
    }
  }
}
