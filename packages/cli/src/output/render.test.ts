import { describe, expect, it } from 'vitest'
import { Chalk } from 'chalk'
import { AssistantBridgeError } from '@usbide/assistant'
import { renderError, renderEvent, renderRawLine, toCommandError } from './render.js'

const plain = new Chalk({ level: 0 })

describe('renderEvent', () => {
  it('prefixes each event kind', () => {
    expect(renderEvent({ index: 0, type: 'user_message', text: 'fix the build' }, plain)).toBe('> fix the build')
    expect(renderEvent({ index: 1, type: 'assistant_message', text: 'On it.' }, plain)).toBe('On it.')
    expect(
      renderEvent({ index: 2, type: 'action', label: 'command', payload: 'npm test', text: 'command: npm test' }, plain)
    ).toBe('* command: npm test')
    expect(renderEvent({ index: 3, type: 'error', message: 'stream closed' }, plain)).toBe('! stream closed')
    expect(renderEvent({ index: 4, type: 'notice', text: 'Up to date.' }, plain)).toBe('- Up to date.')
  })

  it('colors when the chalk instance has a level', () => {
    const colored = new Chalk({ level: 1 })
    expect(renderEvent({ index: 0, type: 'error', message: 'boom' }, colored)).toBe('\u001b[31m! boom\u001b[39m')
  })
})

describe('renderRawLine', () => {
  it('rewrites known chatter and passes other lines through', () => {
    expect(renderRawLine({ stream: 'stdout', text: 'up to date in 3s', seq: 0 }, plain)).toBe('Up to date.')
    expect(renderRawLine({ stream: 'stderr', text: 'npm warn deprecated', seq: 1 }, plain)).toBe('npm warn deprecated')
  })
})

describe('renderError', () => {
  it('includes guidance for bridge errors', () => {
    const error = toCommandError(
      new AssistantBridgeError('spawn_failed', 'Failed to start codex', { guidance: 'Reinstall the assistant.' })
    )
    expect(renderError(error, { json: false, color: false }, plain)).toBe(
      'Error: Failed to start codex\nReinstall the assistant.'
    )
  })

  it('wraps unknown errors', () => {
    expect(toCommandError('boom')).toEqual({ code: 'UNEXPECTED_ERROR', message: 'boom' })
    expect(renderError(toCommandError(new Error('bad')), { json: true, color: false }, plain)).toBe(
      JSON.stringify({ error: { code: 'UNEXPECTED_ERROR', message: 'bad' } }, null, 2)
    )
  })
})
