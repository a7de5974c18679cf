import { Server } from "node:http";
import cors from "cors";
import express from "express";
import { ZodError, z } from "zod";
import { logError, logInfo, serializeError } from "../lib/logging.js";
import { InMemoryReferenceIndex } from "../refactor/retrieval/reference-index.js";
import { referenceMetadataSchema } from "../refactor/retrieval/remote-reference-index.js";

const namespaceSchema = z.string().default("");

const querySchema = z.object({
  vector: z.array(z.number()),
  topK: z.number().int().nonnegative(),
  namespace: namespaceSchema,
  includeMetadata: z.boolean().default(true)
});

const upsertSchema = z.object({
  vectors: z.array(
    z.object({
      id: z.string().min(1),
      values: z.array(z.number()),
      metadata: referenceMetadataSchema.default({})
    })
  ),
  namespace: namespaceSchema
});

const fetchSchema = z.object({
  ids: z.array(z.string().min(1)),
  namespace: namespaceSchema
});

const deleteSchema = z.object({
  ids: z.array(z.string().min(1)).default([]),
  deleteAll: z.boolean().default(false),
  namespace: namespaceSchema
});

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

export interface ReferenceIndexAppOptions {
  /** Index served for the default ("") namespace. */
  index?: InMemoryReferenceIndex;
  apiKey?: string;
  corsOrigins?: string[];
}

/**
 * In-memory vector service speaking the same REST contract as
 * RemoteReferenceIndex, one index per namespace.
 */
export function createReferenceIndexApp(options: ReferenceIndexAppOptions = {}): express.Express {
  const namespaces = new Map<string, InMemoryReferenceIndex>();
  namespaces.set("", options.index ?? new InMemoryReferenceIndex());

  const indexFor = (namespace: string): InMemoryReferenceIndex => {
    let index = namespaces.get(namespace);
    if (!index) {
      index = new InMemoryReferenceIndex();
      namespaces.set(namespace, index);
    }
    return index;
  };

  const app = express();
  app.disable("x-powered-by");

  const corsOrigins = options.corsOrigins ?? [];
  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || corsOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        callback(new Error("Origin not allowed by CORS."));
      }
    })
  );
  app.use(express.json({ limit: "10mb" }));

  app.get("/health", async (_req, res, next) => {
    try {
      let vectors = 0;
      for (const index of namespaces.values()) {
        vectors += await index.size();
      }
      res.json({ ok: true, namespaces: namespaces.size, vectors, now: new Date().toISOString() });
    } catch (error) {
      next(error);
    }
  });

  app.use((req, _res, next) => {
    if (options.apiKey && req.get("Api-Key") !== options.apiKey) {
      next(new HttpError(401, "Unauthorized"));
      return;
    }
    next();
  });

  app.post("/describe_index_stats", async (_req, res, next) => {
    try {
      const stats: Record<string, { vectorCount: number }> = {};
      let total = 0;
      let dimension = 0;

      for (const [namespace, index] of namespaces) {
        const snapshot = index.snapshot();
        stats[namespace] = { vectorCount: snapshot.length };
        total += snapshot.length;
        if (dimension === 0 && snapshot[0]) {
          dimension = snapshot[0].embedding.length;
        }
      }

      res.json({ dimension, totalVectorCount: total, namespaces: stats });
    } catch (error) {
      next(error);
    }
  });

  app.post("/query", async (req, res, next) => {
    try {
      const body = querySchema.parse(req.body ?? {});
      const hits = await indexFor(body.namespace).search(body.vector, body.topK);
      res.json({
        namespace: body.namespace,
        matches: hits.map((hit) => ({
          id: hit.id,
          score: hit.score,
          ...(body.includeMetadata ? { metadata: hit.metadata } : {})
        }))
      });
    } catch (error) {
      next(error);
    }
  });

  app.post("/vectors/upsert", async (req, res, next) => {
    try {
      const body = upsertSchema.parse(req.body ?? {});
      const index = indexFor(body.namespace);
      let upsertedCount = 0;
      for (const vector of body.vectors) {
        if (await index.upsert(vector.id, vector.values, vector.metadata)) {
          upsertedCount += 1;
        }
      }
      res.json({ upsertedCount });
    } catch (error) {
      next(error);
    }
  });

  app.post("/vectors/fetch", async (req, res, next) => {
    try {
      const body = fetchSchema.parse(req.body ?? {});
      const index = indexFor(body.namespace);
      const vectors: Record<string, { id: string; values: number[]; metadata: unknown }> = {};
      for (const id of body.ids) {
        const snippet = await index.getById(id);
        if (snippet) {
          vectors[id] = { id, values: snippet.embedding, metadata: snippet.metadata };
        }
      }
      res.json({ namespace: body.namespace, vectors });
    } catch (error) {
      next(error);
    }
  });

  app.post("/vectors/delete", async (req, res, next) => {
    try {
      const body = deleteSchema.parse(req.body ?? {});
      if (body.deleteAll) {
        namespaces.set(body.namespace, new InMemoryReferenceIndex());
      } else {
        const index = indexFor(body.namespace);
        for (const id of body.ids) {
          await index.delete(id);
        }
      }
      res.json({});
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof ZodError) {
      res.status(400).json({
        error: "Invalid request payload.",
        details: error.issues.map((issue) => issue.message)
      });
      return;
    }

    if (error instanceof HttpError) {
      res.status(error.status).json({ error: error.message });
      return;
    }

    logError("reference_index_server.error", serializeError(error));
    res.status(500).json({ error: "Internal server error." });
  });

  return app;
}

export interface RunningReferenceIndexServer {
  server: Server;
  url: string;
  /** Index behind the default ("") namespace. */
  defaultIndex: InMemoryReferenceIndex;
  close(): Promise<void>;
}

export async function startReferenceIndexServer(
  options: ReferenceIndexAppOptions & { port?: number; host?: string } = {}
): Promise<RunningReferenceIndexServer> {
  const defaultIndex = options.index ?? new InMemoryReferenceIndex();
  const app = createReferenceIndexApp({ ...options, index: defaultIndex });
  const host = options.host ?? "127.0.0.1";

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(options.port ?? 0, host, () => resolve(listening));
    listening.once("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    server.close();
    throw new Error("Reference index server did not report a TCP address.");
  }

  const url = `http://${host}:${address.port}`;
  logInfo("reference_index_server.listening", { url });

  return {
    server,
    url,
    defaultIndex,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      })
  };
}
