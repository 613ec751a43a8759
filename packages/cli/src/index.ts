#!/usr/bin/env tsx
import { createRequire } from 'node:module'
import { CancelledError } from '@corpus/core/errors'
import { runCli } from './cli.js'
import { createProcessContext } from './process-context.js'

const require = createRequire(import.meta.url)
const pkg = require('../package.json') as { version: string }

async function main(): Promise<number> {
  const controller = new AbortController()
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => controller.abort(new CancelledError(`Received ${signal}`)))
  }

  const ctx = await createProcessContext({ version: pkg.version, signal: controller.signal })
  return runCli(process.argv.slice(2), ctx)
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err)
    process.exitCode = 1
  })
