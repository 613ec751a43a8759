import { ValidationError } from '@corpus/core/errors'
import { createRetrievalService } from '@corpus/core/retrieval'
import { parseCommandArgs, parseInteger } from '../args.js'
import type { CliContext } from '../context.js'

export async function searchCommand(args: string[], ctx: CliContext): Promise<number> {
  const { values, positionals } = parseCommandArgs('search', {
    args,
    options: {
      'top-k': { type: 'string', short: 'k' },
      'case-sensitive': { type: 'boolean' },
      json: { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  })

  const [collection, ...terms] = positionals
  if (!collection || terms.length === 0) {
    throw new ValidationError('Usage: corpus search <collection> <query...>')
  }
  const query = terms.join(' ')

  const catalog = await ctx.openCatalog()
  try {
    const retrieval = createRetrievalService({
      catalog,
      logger: ctx.logger,
      limits: ctx.config.search,
      timeoutMs: ctx.config.io.timeoutMs,
      exclude: ctx.config.pack.defaultExcludes,
    })
    const results = await retrieval.search(collection, query, {
      topK: parseInteger('top-k', values['top-k']),
      caseSensitive: values['case-sensitive'],
    })

    if (values.json) {
      ctx.out(JSON.stringify({ collection, query, results }, null, 2))
    } else if (results.length === 0) {
      ctx.err(`No matches for "${query}" in ${collection}`)
    } else {
      for (const result of results) {
        ctx.out(`${result.path}:${result.line}: ${result.snippet}`)
      }
    }
    return 0
  } finally {
    catalog.close()
  }
}
