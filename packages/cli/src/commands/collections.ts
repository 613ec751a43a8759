import { stat } from 'node:fs/promises'
import { registerCollection, type CatalogStore, type Collection } from '@corpus/core/catalog'
import { ValidationError, isErrnoException } from '@corpus/core/errors'
import { parseCommandArgs, splitList } from '../args.js'
import type { CliContext } from '../context.js'
import { formatBytes } from '../format.js'

const KINDS = ['directory', 'bundle'] as const

function isKind(value: string): value is Collection['kind'] {
  return KINDS.some((kind) => kind === value)
}

async function sizeColumn(collection: Collection): Promise<string> {
  if (collection.kind !== 'bundle') return 'N/A'
  try {
    return formatBytes((await stat(collection.source)).size)
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return 'missing'
    throw err
  }
}

async function addCollection(args: string[], catalog: CatalogStore, ctx: CliContext): Promise<number> {
  const { values, positionals } = parseCommandArgs('collections add', {
    args,
    options: {
      id: { type: 'string' },
      name: { type: 'string' },
      kind: { type: 'string' },
      tags: { type: 'string' },
      replace: { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  })
  if (positionals.length !== 1) {
    throw new ValidationError('Usage: corpus collections add <source> [--id ID] [--name NAME] [--kind directory|bundle] [--tags a,b]')
  }
  const kind = values.kind
  if (kind !== undefined && !isKind(kind)) {
    throw new ValidationError(`--kind must be directory or bundle, got "${kind}"`, { kind })
  }

  const collection = await registerCollection(catalog, {
    source: positionals[0],
    id: values.id,
    kind,
    name: values.name,
    tags: splitList(values.tags),
    replace: values.replace,
  })
  ctx.out(`added: ${collection.id}`)
  return 0
}

function removeCollection(args: string[], catalog: CatalogStore, ctx: CliContext): number {
  const { positionals } = parseCommandArgs('collections rm', {
    args,
    options: {},
    allowPositionals: true,
    strict: true,
  })
  if (positionals.length !== 1) {
    throw new ValidationError('Usage: corpus collections rm <id>')
  }
  catalog.remove(positionals[0])
  ctx.out(`removed: ${positionals[0]}`)
  return 0
}

async function listCollections(args: string[], catalog: CatalogStore, ctx: CliContext): Promise<number> {
  const { values } = parseCommandArgs('collections ls', {
    args,
    options: {
      stats: { type: 'boolean' },
      json: { type: 'boolean' },
    },
    strict: true,
  })

  const collections = catalog.list()
  if (values.json) {
    ctx.out(JSON.stringify(collections, null, 2))
    return 0
  }
  if (collections.length === 0) {
    ctx.err('No collections registered')
    return 0
  }

  for (const collection of collections) {
    const id = collection.id.padEnd(20)
    const kind = collection.kind.padEnd(10)
    if (values.stats) {
      const size = (await sizeColumn(collection)).padStart(10)
      ctx.out(`${id} ${kind} ${size}  ${collection.source}`)
    } else {
      ctx.out(`${id} ${kind} ${collection.source}`)
    }
  }
  return 0
}

export async function collectionsCommand(args: string[], ctx: CliContext): Promise<number> {
  const [sub, ...rest] = args
  const catalog = await ctx.openCatalog()
  try {
    switch (sub) {
      case 'add':
        return await addCollection(rest, catalog, ctx)
      case 'rm':
      case 'remove':
        return removeCollection(rest, catalog, ctx)
      case 'ls':
      case 'list':
      case undefined:
        return await listCollections(rest, catalog, ctx)
      default:
        throw new ValidationError(`Unknown collections subcommand: ${sub}`, {
          hint: 'Use add, rm or ls',
        })
    }
  } finally {
    catalog.close()
  }
}
