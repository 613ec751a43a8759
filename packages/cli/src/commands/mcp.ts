import { startStdioServer } from '@corpus/mcp/stdio'
import { parseCommandArgs } from '../args.js'
import type { CliContext } from '../context.js'
import { waitForAbort } from './wait.js'

export async function mcpCommand(args: string[], ctx: CliContext): Promise<number> {
  parseCommandArgs('mcp', { args, options: {}, strict: true })

  // ctx.logger writes to stderr; stdout carries the protocol
  const server = await startStdioServer({
    config: ctx.config,
    logger: ctx.logger,
    version: ctx.version,
    rootPath: ctx.rootPath,
  })

  await waitForAbort(ctx.signal)
  await server.close()
  return 0
}
