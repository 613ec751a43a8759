export {
  CorpusConfigSchema,
  DEFAULTS,
  DEFAULT_EXCLUDES,
  type CorpusConfig,
  type LoggingConfig,
  type SearchConfig,
} from './corpus-config.js'
export {
  BundleManifestSchema,
  EncodingNameSchema,
  ManifestFileSchema,
  MANIFEST_SCHEMA,
  TextModeSchema,
  type BundleManifest,
  type BundleRoot,
  type EncodingName,
  type ManifestFile,
  type TextMode,
} from './manifest.js'
export { PackPresetSchema, PACK_PRESET_FILENAMES, type PackPreset } from './pack-preset.js'
