import { z } from 'zod'

export const MANIFEST_SCHEMA = 'corpus/v1'

export const TextModeSchema = z.enum(['plain', 'compressed', 'max-compressed'])
export type TextMode = z.infer<typeof TextModeSchema>

export const EncodingNameSchema = z.enum([
  'plain',
  'compressed',
  'max-compressed',
  'gzip',
  'base64',
])
export type EncodingName = z.infer<typeof EncodingNameSchema>

export const ManifestFileSchema = z.object({
  path: z.string().min(1),
  size: z.number().int().nonnegative(),
  lines: z.number().int().nonnegative(),
  hash: z.string().optional(),
})

export const BundleManifestSchema = z.object({
  schema: z.literal(MANIFEST_SCHEMA),
  generatedAt: z.string().datetime(),
  root: z.object({
    kind: z.enum(['directory', 'repo']),
    source: z.string(),
    ref: z.string().optional(),
    subdir: z.string().optional(),
  }),
  encoding: EncodingNameSchema,
  textMode: TextModeSchema.optional(),
  files: z.array(ManifestFileSchema),
  totals: z
    .object({
      files: z.number().int().nonnegative(),
      bytes: z.number().int().nonnegative(),
      byExt: z.record(z.string(), z.number().int().nonnegative()),
    })
    .optional(),
})

export type BundleManifest = z.infer<typeof BundleManifestSchema>
export type ManifestFile = z.infer<typeof ManifestFileSchema>
export type BundleRoot = BundleManifest['root']
