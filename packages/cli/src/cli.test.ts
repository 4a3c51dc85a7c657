import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import {
  AssistantSession,
  createSilentLogger,
  resolveAssistantSettings,
  workspacePaths,
  type ToolCandidate,
  type WorkspacePaths,
} from '@usbide/assistant'
import { FakeProcessRunner, type FakeProcessScript } from '@usbide/assistant/test-utils'
import { createCli } from './cli.js'
import type { CliContext, ContextOptions } from './context.js'
import type { CliIO } from './output/index.js'

class BufferIO implements CliIO {
  readonly stdout: string[] = []
  readonly stderr: string[] = []
  exitCode: number | undefined

  out(text: string): void {
    this.stdout.push(text)
  }

  err(text: string): void {
    this.stderr.push(text)
  }

  setExitCode(code: number): void {
    this.exitCode = code
  }
}

const candidate: ToolCandidate = { origin: 'path', executablePath: '/usr/bin/codex', invocationStrategy: 'direct' }
const installer: ToolCandidate = {
  origin: 'portable',
  executablePath: '/opt/node/bin/node',
  entrypointPath: '/opt/node/lib/node_modules/npm/bin/npm-cli.js',
  invocationStrategy: 'direct',
}
const statusOk: FakeProcessScript = { lines: ['Logged in using ChatGPT'], exitCode: 0 }

function delta(text: string): string {
  return JSON.stringify({ type: 'response.output_text.delta', delta: text })
}

describe('usbide-assistant', () => {
  let root: string
  let paths: WorkspacePaths
  let io: BufferIO
  let contextOptions: ContextOptions[]

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), 'usbide-cli-'))
    paths = workspacePaths(root)
    io = new BufferIO()
    contextOptions = []
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  async function run(runner: FakeProcessRunner, ...args: string[]): Promise<void> {
    const logger = createSilentLogger()
    const program = createCli({
      io,
      createContext: (options): CliContext => {
        contextOptions.push(options)
        const session = new AssistantSession({
          paths,
          settings: resolveAssistantSettings(undefined, {}),
          runner,
          logger,
          ambient: () => ({ PATH: path.join(root, 'nobin'), OPENAI_API_KEY: 'test-secret' }),
          platform: 'linux',
          resolveTool: () => candidate,
          resolveInstaller: () => installer,
        })
        return { paths, logger, session }
      },
    })
    program.exitOverride()
    await program.parseAsync(['--no-color', ...args], { from: 'user' })
  }

  it('echoes translated status output', async () => {
    const runner = new FakeProcessRunner([statusOk])

    await run(runner, 'status')

    expect(io.stdout).toEqual(['Logged in with ChatGPT.', 'Authenticated.'])
    expect(io.exitCode).toBeUndefined()
    expect(runner.requests.map((r) => r.argv)).toEqual([['login', 'status']])
  })

  it('reports a failed status check as JSON', async () => {
    const runner = new FakeProcessRunner([{ lines: ['Not logged in'], exitCode: 1 }])

    await run(runner, '--json', 'status')

    expect(io.stdout).toHaveLength(1)
    expect(JSON.parse(io.stdout[0] ?? '')).toEqual({
      authenticated: false,
      ok: false,
      exitCode: 1,
      output: ['Not logged in'],
      cancelled: false,
    })
    expect(io.exitCode).toBe(1)
  })

  it('streams the transcript of exec', async () => {
    const runner = new FakeProcessRunner([
      statusOk,
      { lines: [delta('Hello '), delta('world'), JSON.stringify({ type: 'turn.completed' })], exitCode: 0 },
    ])

    await run(runner, 'exec', 'say', 'hi')

    expect(io.stdout).toEqual(['> say hi', 'Hello world'])
    expect(io.exitCode).toBeUndefined()
    expect(runner.requests[1]?.argv).toEqual([
      'exec',
      '--json',
      '--sandbox',
      'workspace-write',
      '--ask-for-approval',
      'never',
      'say hi',
    ])
  })

  it('prints the diagnostic of a failed exec', async () => {
    const runner = new FakeProcessRunner([
      statusOk,
      {
        lines: [delta('Working'), JSON.stringify({ type: 'error', message: 'unexpected status 401 Unauthorized' })],
        exitCode: 1,
      },
    ])

    await run(runner, 'exec', 'refactor')

    expect(io.stdout).toEqual([
      '> refactor',
      'Working',
      '! unexpected status 401 Unauthorized',
      'The assistant rejected the stored credentials (HTTP 401).\n' +
        'Run the login command again, or log out and log back in with your ChatGPT account.',
    ])
    expect(io.exitCode).toBe(1)
  })

  it('returns the exec result as JSON without streaming', async () => {
    const runner = new FakeProcessRunner([
      statusOk,
      { lines: [delta('Done'), JSON.stringify({ type: 'turn.completed' })], exitCode: 0 },
    ])

    await run(runner, '--json', 'exec', 'finish')

    expect(io.stdout).toHaveLength(1)
    expect(JSON.parse(io.stdout[0] ?? '')).toEqual({
      ok: true,
      exitCode: 0,
      transcript: [
        { index: 0, type: 'user_message', text: 'finish' },
        { index: 1, type: 'assistant_message', text: 'Done' },
      ],
      cancelled: false,
    })
  })

  it('renders an authentication error with guidance', async () => {
    const runner = new FakeProcessRunner([{ exitCode: 1 }])

    await run(runner, 'exec', 'hi')

    expect(io.stdout).toEqual([])
    expect(io.stderr).toEqual([
      'Error: Assistant login status check failed (exit 1)\n' +
        'Run the login command, then send the request again (set USBIDE_CODEX_DEVICE_AUTH=1 if no browser opens).',
    ])
    expect(io.exitCode).toBe(1)
  })

  it('renders errors as JSON', async () => {
    const runner = new FakeProcessRunner([{ exitCode: 1 }])

    await run(runner, '--json', 'exec', 'hi')

    expect(JSON.parse(io.stderr[0] ?? '')).toEqual({
      error: {
        code: 'not_authenticated',
        message: 'Assistant login status check failed (exit 1)',
        guidance:
          'Run the login command, then send the request again (set USBIDE_CODEX_DEVICE_AUTH=1 if no browser opens).',
      },
    })
  })

  it('installs with the portable npm', async () => {
    const runner = new FakeProcessRunner([{ lines: ['up to date in 2s'], exitCode: 0 }])

    await run(runner, 'install')

    expect(io.stdout).toEqual(['Up to date.', `Installed into ${paths.installPrefix}.`])
    expect(runner.requests).toHaveLength(1)
    expect(runner.requests[0]?.candidate).toEqual(installer)
  })

  it('describes the resolved assistant', async () => {
    await run(new FakeProcessRunner(), 'doctor')

    const lines = (io.stdout[0] ?? '').split('\n')
    expect(lines[0]).toBe(`Workspace  ${root}`)
    expect(lines[1]).toBe('Assistant  path /usr/bin/codex (direct)')
    expect(lines[2]).toBe('Runtime    not found')
    expect(lines[3]).toBe('npm        not found')
    expect(lines[4]).toBe('Policy     sandbox=workspace-write approval=never')
    expect(lines[5]).toBe('Overrides  apiKey=off customBase=off autoInstall=on')
    expect(lines[6]).toMatch(/^Env {8}\d+ variables, removed: OPENAI_API_KEY$/)
    expect(lines[7]).toBe(`PATH       ${path.join(root, 'nobin')}`)
  })

  it('passes --root to the context factory', async () => {
    await run(new FakeProcessRunner([statusOk]), '--root', 'portable/workspace', 'status')

    expect(contextOptions).toEqual([{ root: 'portable/workspace' }])
  })
})
