import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { findPackPreset, loadPackPreset } from './preset.js'
import { NotFoundError, ValidationError } from '../errors/catalog.js'

describe('pack presets', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'preset-test-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads cpack.json from the packed directory', async () => {
    await writeFile(
      join(dir, 'cpack.json'),
      JSON.stringify({ include: ['**/*.ts'], compress: true, output: 'dist/bundle.txt' }),
    )
    expect(await findPackPreset(dir)).toEqual({
      include: ['**/*.ts'],
      compress: true,
      output: 'dist/bundle.txt',
    })
  })

  it('returns undefined when there is no preset', async () => {
    expect(await findPackPreset(dir)).toBeUndefined()
  })

  it('requires an explicitly named preset to exist', async () => {
    await expect(loadPackPreset(join(dir, 'missing.json'))).rejects.toBeInstanceOf(NotFoundError)
  })

  it('rejects unknown keys and wrong types', async () => {
    await writeFile(join(dir, 'a.json'), JSON.stringify({ gzipp: true }))
    await writeFile(join(dir, 'b.json'), JSON.stringify({ include: '**/*.ts' }))
    await writeFile(join(dir, 'c.json'), '{ nope')

    await expect(loadPackPreset(join(dir, 'a.json'))).rejects.toBeInstanceOf(ValidationError)
    await expect(loadPackPreset(join(dir, 'b.json'))).rejects.toBeInstanceOf(ValidationError)
    await expect(loadPackPreset(join(dir, 'c.json'))).rejects.toBeInstanceOf(ValidationError)
  })

  it('reads cpack.yml as YAML', async () => {
    await writeFile(
      join(dir, 'cpack.yml'),
      ['include:', '  - "src/**/*.py"', 'gzip: true', 'indexStyle: tree', 'indexDepth: 2', ''].join(
        '\n',
      ),
    )
    expect(await findPackPreset(dir)).toEqual({
      include: ['src/**/*.py'],
      gzip: true,
      indexStyle: 'tree',
      indexDepth: 2,
    })
  })

  it('prefers cpack.yml, then cpack.yaml, over cpack.json', async () => {
    await writeFile(join(dir, 'cpack.json'), JSON.stringify({ output: 'from-json.txt' }))
    await writeFile(join(dir, 'cpack.yaml'), 'output: from-yaml.txt\n')
    expect(await findPackPreset(dir)).toEqual({ output: 'from-yaml.txt' })

    await writeFile(join(dir, 'cpack.yml'), 'output: from-yml.txt\n')
    expect(await findPackPreset(dir)).toEqual({ output: 'from-yml.txt' })
  })

  it('treats an empty YAML preset as no settings', async () => {
    await writeFile(join(dir, 'cpack.yaml'), '')
    expect(await findPackPreset(dir)).toEqual({})
  })

  it('rejects malformed YAML and invalid index settings', async () => {
    await writeFile(join(dir, 'broken.yml'), 'include: [a\n')
    await writeFile(join(dir, 'style.yml'), 'indexStyle: json\n')
    await writeFile(join(dir, 'depth.yml'), 'indexDepth: 0\n')

    await expect(loadPackPreset(join(dir, 'broken.yml'))).rejects.toThrow(
      `Pack preset is not valid YAML: ${join(dir, 'broken.yml')}`,
    )
    await expect(loadPackPreset(join(dir, 'style.yml'))).rejects.toBeInstanceOf(ValidationError)
    await expect(loadPackPreset(join(dir, 'depth.yml'))).rejects.toBeInstanceOf(ValidationError)
  })
})
