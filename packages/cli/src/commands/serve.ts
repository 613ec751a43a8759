import { ValidationError } from '@corpus/core/errors'
import { startServer } from '@corpus/server/listen'
import { parseCommandArgs, parseInteger } from '../args.js'
import type { CliContext } from '../context.js'
import { waitForAbort } from './wait.js'

export async function serveCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values } = parseCommandArgs('serve', {
    args,
    options: {
      host: { type: 'string' },
      port: { type: 'string', short: 'p' },
    },
    strict: true,
  })

  const port = parseInteger('port', values.port) ?? ctx.config.server.port
  if (port < 1 || port > 65535) {
    throw new ValidationError(`--port must be between 1 and 65535, got ${port}`, { port })
  }
  const config = {
    ...ctx.config,
    server: { host: values.host ?? ctx.config.server.host, port },
  }
  const server = await startServer(config, { rootPath: ctx.rootPath, logger: ctx.logger })

  await waitForAbort(ctx.signal)
  ctx.logger.info('Shutdown signal received, draining connections')
  await server.close()
  return 0
}
