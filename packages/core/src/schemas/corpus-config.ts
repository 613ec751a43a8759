import { z } from "zod";

export const DEFAULT_EXCLUDES = [
  "**/.git/**",
  "**/node_modules/**",
  "**/venv/**",
  "**/__pycache__/**",
  "**/bin/**",
];

export const DEFAULTS = {
  server: {
    host: "127.0.0.1",
    port: 8787,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  pack: {
    defaultExcludes: DEFAULT_EXCLUDES,
    output: "corpus-out.txt",
  },
  search: {
    defaultTopK: 50,
    maxTopK: 500,
  },
  io: {
    timeoutMs: 30_000,
    fetchTimeoutMs: 120_000,
  },
  batch: {
    concurrency: 2,
  },
};

export const CorpusConfigSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default(DEFAULTS.server.host),
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  pack: z
    .object({
      defaultExcludes: z
        .array(z.string().min(1))
        .default(DEFAULTS.pack.defaultExcludes)
        .describe("Exclude globs applied to every pack in addition to --exclude"),
      output: z.string().min(1).default(DEFAULTS.pack.output),
    })
    .default(DEFAULTS.pack),
  search: z
    .object({
      defaultTopK: z
        .number()
        .int()
        .min(1)
        .default(DEFAULTS.search.defaultTopK),
      maxTopK: z.number().int().min(1).default(DEFAULTS.search.maxTopK),
    })
    .refine((s) => s.defaultTopK <= s.maxTopK, {
      message: "search.defaultTopK must not exceed search.maxTopK",
    })
    .default(DEFAULTS.search),
  io: z
    .object({
      timeoutMs: z.number().int().positive().default(DEFAULTS.io.timeoutMs),
      fetchTimeoutMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.io.fetchTimeoutMs),
    })
    .default(DEFAULTS.io),
  batch: z
    .object({
      concurrency: z
        .number()
        .int()
        .min(1)
        .max(64)
        .default(DEFAULTS.batch.concurrency),
    })
    .default(DEFAULTS.batch),
});

export type CorpusConfig = z.infer<typeof CorpusConfigSchema>;
export type LoggingConfig = CorpusConfig["logging"];
export type SearchConfig = CorpusConfig["search"];
