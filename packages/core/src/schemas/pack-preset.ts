import { z } from 'zod'

/**
 * Pack presets read from cpack.yml, cpack.yaml or cpack.json. Every field is optional; values given on
 * the command line win over the preset.
 */
export const PackPresetSchema = z
  .object({
    output: z.string().min(1),
    include: z.array(z.string()),
    exclude: z.array(z.string()),
    compress: z.boolean(),
    maxCompress: z.boolean(),
    gzip: z.boolean(),
    base64: z.boolean(),
    writeIndex: z.boolean(),
    indexOnly: z.boolean(),
    indexStyle: z.enum(['flat', 'tree']),
    indexDepth: z.number().int().min(1),
    indexOutput: z.string().min(1),
  })
  .partial()
  .strict()

export type PackPreset = z.infer<typeof PackPresetSchema>

/** Looked up beside the packed directory, first match wins */
export const PACK_PRESET_FILENAMES = ['cpack.yml', 'cpack.yaml', 'cpack.json'] as const
