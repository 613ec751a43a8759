import { readFile } from 'node:fs/promises'
import { extname, join } from 'node:path'
import { parse as parseYaml } from 'yaml'
import { ValidationError } from '../errors/catalog.js'
import { isErrnoException, toCorpusError } from '../errors/fs.js'
import {
  PACK_PRESET_FILENAMES,
  PackPresetSchema,
  type PackPreset,
} from '../schemas/pack-preset.js'

function isYamlPath(path: string): boolean {
  const ext = extname(path).toLowerCase()
  return ext === '.yml' || ext === '.yaml'
}

function parsePresetText(raw: string, path: string): unknown {
  const yaml = isYamlPath(path)
  try {
    // An empty YAML document is an empty preset
    return yaml ? (parseYaml(raw) ?? {}) : JSON.parse(raw)
  } catch (err) {
    throw new ValidationError(`Pack preset is not valid ${yaml ? 'YAML' : 'JSON'}: ${path}`, {
      path,
      reason: err instanceof Error ? err.message : String(err),
    })
  }
}

/**
 * Read a pack preset file, as YAML for .yml/.yaml and JSON otherwise.
 * Returns undefined when `optional` is set and the file does not exist.
 */
export async function loadPackPreset(
  path: string,
  options?: { optional?: boolean },
): Promise<PackPreset | undefined> {
  let raw: string
  try {
    raw = await readFile(path, 'utf-8')
  } catch (err) {
    if (options?.optional && isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return undefined
    }
    throw toCorpusError(err, path, 'Read pack preset')
  }

  const result = PackPresetSchema.safeParse(parsePresetText(raw, path))
  if (!result.success) {
    throw new ValidationError(`Invalid pack preset: ${path}`, {
      path,
      issues: result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    })
  }
  return result.data
}

/** The first of cpack.yml, cpack.yaml and cpack.json beside the packed directory */
export async function findPackPreset(root: string): Promise<PackPreset | undefined> {
  for (const name of PACK_PRESET_FILENAMES) {
    const preset = await loadPackPreset(join(root, name), { optional: true })
    if (preset) return preset
  }
  return undefined
}
