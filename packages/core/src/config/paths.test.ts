import { afterEach, describe, expect, it, vi } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";
import {
  expandHomePath,
  resolveCatalogPath,
  resolveRootPath,
} from "./paths.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/corpora/main")).toBe(
      resolve(homedir(), "corpora/main"),
    );
  });

  it("leaves non-home paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
  });
});

describe("resolveRootPath", () => {
  it("returns default root path when no input or env is provided", () => {
    vi.stubEnv("CORPUS_HOME", "");
    expect(resolveRootPath()).toBe(resolve(DEFAULT_ROOT_PATH));
  });

  it("prefers CORPUS_HOME over the default", () => {
    vi.stubEnv("CORPUS_HOME", "/tmp/corpus-home");
    expect(resolveRootPath()).toBe("/tmp/corpus-home");
  });

  it("prefers explicit input over CORPUS_HOME", () => {
    vi.stubEnv("CORPUS_HOME", "/tmp/corpus-home");
    expect(resolveRootPath("/srv/corpus")).toBe("/srv/corpus");
  });

  it("resolves relative paths to absolute", () => {
    expect(resolveRootPath("relative/corpus")).toBe(resolve("relative/corpus"));
  });
});

describe("resolveCatalogPath", () => {
  it("places catalog.db under the root", () => {
    expect(resolveCatalogPath("/srv/corpus")).toBe(
      join("/srv/corpus", "catalog.db"),
    );
  });
});
