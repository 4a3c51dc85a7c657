import type { RawLine } from '@usbide/assistant'
import { renderRawLine } from '../output/render.js'
import type { CommandEnv } from '../output/with-output.js'

/** Live echo of raw CLI lines in text mode; nothing in JSON mode. */
export function rawLineEcho(env: CommandEnv): ((line: RawLine) => void) | undefined {
  if (env.output.json) return undefined
  return (line) => env.io.out(renderRawLine(line, env.chalk))
}

/** AbortSignal tied to Ctrl+C for the duration of one command. */
export function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController()
  const onInterrupt = (): void => controller.abort()
  process.once('SIGINT', onInterrupt)
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onInterrupt)
    },
  }
}
