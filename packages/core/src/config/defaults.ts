import { join } from "node:path";
import { homedir } from "node:os";

export const CORPUS_HOME_ENV = "CORPUS_HOME";

export const DEFAULT_ROOT_PATH = join(homedir(), ".local", "share", "corpus");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");
export const CATALOG_DB_FILENAME = "catalog.db";
