import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { access, mkdtemp, readFile, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { loadConfig, saveConfig } from "./loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("loadConfig", () => {
  it("returns defaults when file is missing", async () => {
    await withTempDir(async (dir) => {
      const config = await loadConfig({
        configPath: join(dir, "missing", "config.json"),
      });

      expect(config.server.port).toBe(8787);
      expect(config.server.host).toBe("127.0.0.1");
      expect(config.logging.level).toBe("info");
      expect(config.logging.pretty).toBe(false);
      expect(config.search.defaultTopK).toBe(50);
      expect(config.search.maxTopK).toBe(500);
      expect(config.batch.concurrency).toBe(2);
      expect(config.pack.defaultExcludes).toContain("**/node_modules/**");
    });
  });

  it("parses valid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({
          server: { port: 3000, host: "0.0.0.0" },
          logging: { level: "debug", pretty: true },
          search: { defaultTopK: 10, maxTopK: 20 },
          io: { timeoutMs: 500 },
        }),
      );

      const config = await loadConfig({ configPath });

      expect(config.server.port).toBe(3000);
      expect(config.server.host).toBe("0.0.0.0");
      expect(config.logging.level).toBe("debug");
      expect(config.logging.pretty).toBe(true);
      expect(config.search.defaultTopK).toBe(10);
      expect(config.io.timeoutMs).toBe(500);
      expect(config.io.fetchTimeoutMs).toBe(120_000);
    });
  });

  it("throws for invalid config", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ server: { port: -1 } }));

      await expect(loadConfig({ configPath })).rejects.toThrow();
    });
  });

  it("rejects a defaultTopK above maxTopK", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(
        configPath,
        JSON.stringify({ search: { defaultTopK: 600, maxTopK: 500 } }),
      );

      await expect(loadConfig({ configPath })).rejects.toThrow();
    });
  });

  it("throws for malformed JSON", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, "{ invalid json }}}");

      await expect(loadConfig({ configPath })).rejects.toThrow(SyntaxError);
    });
  });

  it("writes defaults to disk when file is missing", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "subdir", "config.json");
      await loadConfig({ configPath });

      await expect(access(configPath)).resolves.toBeUndefined();
      const contents = JSON.parse(await readFile(configPath, "utf-8"));
      expect(contents.server.port).toBe(8787);
      expect(contents.io.timeoutMs).toBe(30_000);
    });
  });

  it("does not rewrite file when config already has all defaults", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");

      await loadConfig({ configPath });
      const firstWrite = await readFile(configPath, "utf-8");

      await loadConfig({ configPath });
      const secondRead = await readFile(configPath, "utf-8");

      expect(secondRead).toBe(firstWrite);
    });
  });

  it("reads config.json from rootPath", async () => {
    await withTempDir(async (dir) => {
      await writeFile(
        join(dir, "config.json"),
        JSON.stringify({ logging: { level: "warn" } }),
      );

      const config = await loadConfig({ rootPath: dir });

      expect(config.logging.level).toBe("warn");
      expect(config.server.port).toBe(8787);
    });
  });
});

describe("saveConfig", () => {
  it("round-trips through loadConfig", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      const config = await loadConfig({ configPath });
      await saveConfig(
        { ...config, batch: { concurrency: 8 } },
        { configPath },
      );

      const reloaded = await loadConfig({ configPath });
      expect(reloaded.batch.concurrency).toBe(8);
    });
  });
});
