#!/usr/bin/env -S npx tsx
import { createCli } from './cli.js'

const program = createCli()
program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`)
  process.exitCode = 1
})
