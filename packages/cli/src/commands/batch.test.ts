import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { access, mkdir, mkdtemp, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { NotFoundError, ValidationError } from '@corpus/core/errors'
import { createTestContext, type TestContext } from '../test-context.js'
import { batchCommand, planBatchJobs } from './batch.js'

describe('batchCommand', () => {
  let home: string
  let alpha: string
  let beta: string
  let out: string
  let ctx: TestContext

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'cli-batch-test-'))
    alpha = join(home, 'alpha')
    beta = join(home, 'beta')
    out = join(home, 'out')
    await mkdir(alpha)
    await mkdir(beta)
    await writeFile(join(alpha, 'a.txt'), 'a\n')
    await writeFile(join(beta, 'b.txt'), 'b\n')
    await writeFile(join(beta, 'c.txt'), 'c\n')
    ctx = createTestContext(home)
  })

  afterEach(async () => {
    await rm(home, { recursive: true, force: true })
  })

  it('packs each source into its own bundle and reports JSON lines', async () => {
    const code = await batchCommand([alpha, beta, '-d', out, '--concurrency', '1', '--json'], ctx)

    expect(code).toBe(0)
    const lines = ctx.stdout.map((line) => JSON.parse(line))
    expect(lines).toEqual([
      {
        source: alpha,
        output: join(out, 'alpha.txt'),
        files: 1,
        bytes: (await stat(join(out, 'alpha.txt'))).size,
      },
      {
        source: beta,
        output: join(out, 'beta.txt'),
        files: 2,
        bytes: (await stat(join(out, 'beta.txt'))).size,
      },
    ])
  })

  it('keeps going after a failure and exits with 1', async () => {
    const missing = join(home, 'missing')

    const code = await batchCommand([alpha, missing, '-d', out, '--concurrency', '1'], ctx)

    expect(code).toBe(1)
    expect(ctx.stdout).toEqual([
      `ok    ${alpha} -> ${join(out, 'alpha.txt')} (1 files)`,
      `fail  ${missing}: Path not found: ${missing}`,
    ])
    expect(ctx.stderr).toEqual(['1 of 2 packs failed'])
  })

  it('stops at the first failure with --fail-fast', async () => {
    const missing = join(home, 'missing')

    await expect(
      batchCommand([missing, alpha, '-d', out, '--concurrency', '1', '--fail-fast'], ctx),
    ).rejects.toBeInstanceOf(NotFoundError)
    await expect(access(join(out, 'alpha.txt'))).rejects.toThrow()
  })

  it('reads sources from --file, skipping blanks and comments', async () => {
    const list = join(home, 'sources.txt')
    await writeFile(list, `# packs\n${alpha}\n\n${beta}\n`)

    const code = await batchCommand(['--file', list, '-d', out, '-z'], ctx)

    expect(code).toBe(0)
    await expect(access(join(out, 'alpha.txt.gz'))).resolves.toBeUndefined()
    await expect(access(join(out, 'beta.txt.gz'))).resolves.toBeUndefined()
  })

  it('requires at least one source', async () => {
    await expect(batchCommand(['-d', out], ctx)).rejects.toThrow(
      'No sources given: pass directories or repository URLs, or --file',
    )
  })

  it('rejects a concurrency below 1', async () => {
    await expect(batchCommand([alpha, '--concurrency', '0'], ctx)).rejects.toBeInstanceOf(
      ValidationError,
    )
  })

  it('rejects a non-numeric concurrency', async () => {
    await expect(batchCommand([alpha, '--concurrency', 'two'], ctx)).rejects.toThrow(
      '--concurrency must be an integer, got "two"',
    )
  })
})

describe('planBatchJobs', () => {
  it('names bundles after their sources and de-duplicates names', () => {
    const jobs = planBatchJobs(
      ['/x/docs', '/y/docs', 'https://github.com/acme/tools/tree/main/src/lib'],
      '/out',
      { kind: 'gzip', text: 'plain' },
    )

    expect(jobs).toEqual([
      { source: '/x/docs', remote: false, output: '/out/docs.txt.gz' },
      { source: '/y/docs', remote: false, output: '/out/docs-2.txt.gz' },
      {
        source: 'https://github.com/acme/tools/tree/main/src/lib',
        remote: true,
        output: '/out/acme-tools-src-lib.txt.gz',
      },
    ])
  })

  it('uses .txt for text encodings and .txt.b64 for base64', () => {
    expect(planBatchJobs(['/a'], '/out', { kind: 'compressed' })[0].output).toBe('/out/a.txt')
    expect(planBatchJobs(['/a'], '/out', { kind: 'base64', text: 'plain' })[0].output).toBe(
      '/out/a.txt.b64',
    )
  })

  it('rejects a malformed repository URL up front', () => {
    expect(() => planBatchJobs(['https://example.com/x/y'], '/out', { kind: 'plain' })).toThrow(
      'Only github.com URLs are supported',
    )
  })
})
