import { Hono } from "hono";
import { z } from "zod";
import { ValidationError } from "@corpus/core/errors";
import type { RetrievalService } from "@corpus/core/retrieval";

export interface CollectionsRouteDeps {
  retrieval: RetrievalService;
}

const IntegerParam = z.coerce.number().int();

const FileQuerySchema = z.object({
  path: z.string().min(1),
  start: IntegerParam.optional(),
  end: IntegerParam.optional(),
});

const SearchQuerySchema = z.object({
  q: z.string(),
  top_k: IntegerParam.optional(),
  case_sensitive: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value === "true" || value === "1"),
});

function parseQuery<T extends z.ZodType>(
  schema: T,
  query: Record<string, string>,
): z.infer<T> {
  const result = schema.safeParse(query);
  if (!result.success) {
    const issue = result.error.issues[0];
    const param = issue.path.map(String).join(".");
    throw new ValidationError(
      param ? `Invalid query parameter "${param}": ${issue.message}` : issue.message,
      { issues: result.error.issues.map((i) => ({ path: i.path.map(String), message: i.message })) },
    );
  }
  return result.data;
}

export function collectionsRoutes(deps: CollectionsRouteDeps): Hono {
  const app = new Hono();

  // GET /v1/collections
  app.get("/", (c) => {
    return c.json({ collections: deps.retrieval.listCollections() });
  });

  // GET /v1/collections/:id/files
  app.get("/:id/files", async (c) => {
    const collection = c.req.param("id");
    const files = await deps.retrieval.listFiles(collection);
    return c.json({ collection, files });
  });

  // GET /v1/collections/:id/file?path=&start=&end=
  app.get("/:id/file", async (c) => {
    const { path, start, end } = parseQuery(FileQuerySchema, c.req.query());
    const slice = await deps.retrieval.getFile(c.req.param("id"), path, {
      start,
      end,
    });
    return c.json(slice);
  });

  // GET /v1/collections/:id/search?q=&top_k=&case_sensitive=
  app.get("/:id/search", async (c) => {
    const collection = c.req.param("id");
    const { q, top_k, case_sensitive } = parseQuery(
      SearchQuerySchema,
      c.req.query(),
    );
    const results = await deps.retrieval.search(collection, q, {
      topK: top_k,
      caseSensitive: case_sensitive,
    });
    return c.json({ collection, query: q, results });
  });

  return app;
}
