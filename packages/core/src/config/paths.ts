import { homedir } from "node:os";
import { join, resolve } from "node:path";
import {
  CATALOG_DB_FILENAME,
  CORPUS_HOME_ENV,
  DEFAULT_ROOT_PATH,
} from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the corpus home directory: explicit input, then $CORPUS_HOME,
 * then the default under ~/.local/share.
 */
export function resolveRootPath(input?: string): string {
  const fromEnv = process.env[CORPUS_HOME_ENV];
  return resolve(
    expandHomePath(input ?? (fromEnv ? fromEnv : DEFAULT_ROOT_PATH)),
  );
}

export function resolveCatalogPath(rootPath?: string): string {
  return join(resolveRootPath(rootPath), CATALOG_DB_FILENAME);
}
