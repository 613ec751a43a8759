export {
  CATALOG_DB_FILENAME,
  CORPUS_HOME_ENV,
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveCatalogPath, resolveRootPath } from "./paths.js";
