import { CorpusError } from '@corpus/core/errors'
import { batchCommand } from './commands/batch.js'
import { collectionsCommand } from './commands/collections.js'
import { mcpCommand } from './commands/mcp.js'
import { packCommand } from './commands/pack.js'
import { searchCommand } from './commands/search.js'
import { serveCommand } from './commands/serve.js'
import type { CliContext, Command } from './context.js'

export const USAGE = `Usage: corpus <command> [options]

Commands:
  pack [dir]                 Pack a directory (or --repo URL) into one bundle
  batch <source...>          Pack several directories or repositories in parallel
  search <collection> <q..>  Keyword search over a registered collection
  collections add <source>   Register a bundle or directory
  collections rm <id>        Remove a collection
  collections ls [--stats]   List registered collections
  serve [--host] [--port]    Serve the retrieval API over HTTP (REST + MCP)
  mcp                        Serve the retrieval tools over MCP stdio
  version                    Print the version

Pack options:
  -o, --output PATH          Bundle path (default corpus-out.txt)
  -i, --include GLOB         Only pack matching files (repeatable)
  -x, --exclude GLOB         Skip matching files (repeatable)
  -c, --compress             Normalize whitespace
  -m, --max-compress         Also strip comments
  -z, --gzip                 Gzip the bundle
  -b, --base64               Base64 the gzipped bundle (needs --gzip)
      --no-index             Leave out the file index header
      --index-style STYLE    Index header layout: flat (default) or tree
      --index-depth N        Levels shown by the tree header
      --index-only           Write the file index header only
      --index-output PATH    Also write the JSON manifest here
      --repo URL --ref REF   Pack a GitHub repository
      --config PATH          Read options from a cpack.yml or cpack.json preset
      --register-id ID       Register the bundle in the catalog
      --register-name NAME   Display name (derives the id when --register-id is absent)
      --register-tags a,b    Tags for the catalog entry
      --stats                Print packing statistics`

const COMMANDS = new Map<string, Command>([
  ['pack', packCommand],
  ['batch', batchCommand],
  ['search', searchCommand],
  ['collections', collectionsCommand],
  ['serve', serveCommand],
  ['mcp', mcpCommand],
])

function reportError(err: unknown, ctx: CliContext): void {
  if (err instanceof CorpusError) {
    ctx.logger.debug({ err, errorCode: err.errorCode }, 'Command failed')
    ctx.err(`Error: ${err.message}`)
    return
  }
  ctx.logger.error({ err }, 'Unexpected failure')
  ctx.err(`Error: ${err instanceof Error ? err.message : String(err)}`)
}

/** Run one command line and return the process exit code */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const [name, ...args] = argv

  if (name === undefined) {
    ctx.err(USAGE)
    return 1
  }
  if (name === 'help' || name === '--help' || name === '-h') {
    ctx.out(USAGE)
    return 0
  }
  if (name === 'version' || name === '--version' || name === '-V') {
    ctx.out(ctx.version)
    return 0
  }

  const command = COMMANDS.get(name)
  if (!command) {
    ctx.err(`Unknown command: ${name}`)
    ctx.err(USAGE)
    return 1
  }

  try {
    return await command(args, ctx)
  } catch (err) {
    reportError(err, ctx)
    return 1
  }
}
