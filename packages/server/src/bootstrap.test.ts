import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CorpusConfigSchema } from "@corpus/core/schemas";
import { createSilentLogger } from "@corpus/core/logger";
import { createServer } from "./bootstrap.js";

function makeDefaultConfig() {
  return CorpusConfigSchema.parse({});
}

describe("createServer", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "bootstrap-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("opens the catalog under rootPath and answers /health", async () => {
    const ctx = await createServer(makeDefaultConfig(), {
      rootPath: tempDir,
      logger: createSilentLogger(),
    });

    const res = await ctx.app.request("/health");
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.status).toBe("healthy");
    expect(body.collections).toBe(0);
    expect(body.version).toBe(ctx.version);
    ctx.cleanup();
  });

  it("serves collections registered in the catalog", async () => {
    const ctx = await createServer(makeDefaultConfig(), {
      rootPath: tempDir,
      logger: createSilentLogger(),
    });
    ctx.catalog.add({ id: "home", kind: "directory", source: tempDir });

    const res = await ctx.app.request("/v1/collections");
    expect(await res.json()).toEqual({
      collections: [{ id: "home", kind: "directory", source: tempDir }],
    });
    ctx.cleanup();
  });

  it("applies the configured search limits", async () => {
    const config = CorpusConfigSchema.parse({
      search: { defaultTopK: 5, maxTopK: 10 },
    });
    const ctx = await createServer(config, {
      rootPath: tempDir,
      logger: createSilentLogger(),
    });
    ctx.catalog.add({ id: "home", kind: "directory", source: tempDir });

    const res = await ctx.app.request(
      "/v1/collections/home/search?q=x&top_k=11",
    );
    expect(res.status).toBe(400);
    ctx.cleanup();
  });

  it("startedAt is a reasonable timestamp", async () => {
    const before = new Date();
    const ctx = await createServer(makeDefaultConfig(), {
      rootPath: tempDir,
      logger: createSilentLogger(),
    });
    const after = new Date();

    expect(ctx.startedAt.getTime()).toBeGreaterThanOrEqual(before.getTime());
    expect(ctx.startedAt.getTime()).toBeLessThanOrEqual(after.getTime());
    ctx.cleanup();
  });
});
