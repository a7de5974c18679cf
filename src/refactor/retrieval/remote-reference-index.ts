import { z } from "zod";
import { logWarn, serializeError } from "../../lib/logging.js";
import { JsonValue, ReferenceMetadata, ReferenceSnippet, SearchHit } from "../../types.js";
import { ReferenceIndex } from "./reference-index.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const referenceMetadataSchema = z
  .object({
    title: z.string().optional(),
    content: z.string().optional(),
    tags: z.array(z.string()).optional()
  })
  .catchall(jsonValueSchema);

const statsResponseSchema = z.object({
  dimension: z.number().optional(),
  totalVectorCount: z.number().int().nonnegative().default(0),
  namespaces: z.record(z.object({ vectorCount: z.number().int().nonnegative() })).optional()
});

const queryResponseSchema = z.object({
  matches: z
    .array(
      z.object({
        id: z.string(),
        score: z.number(),
        metadata: referenceMetadataSchema.optional()
      })
    )
    .default([])
});

const fetchResponseSchema = z.object({
  vectors: z
    .record(
      z.object({
        id: z.string().optional(),
        values: z.array(z.number()),
        metadata: referenceMetadataSchema.optional()
      })
    )
    .default({})
});

const upsertResponseSchema = z.object({
  upsertedCount: z.number().int().nonnegative()
});

export interface RemoteReferenceIndexOptions {
  baseUrl: string;
  apiKey?: string;
  namespace?: string;
  requestTimeoutMs?: number;
}

/**
 * Client for a vector service speaking the Pinecone data-plane REST contract.
 * Failures are logged and reported as an empty or negative result.
 */
export class RemoteReferenceIndex implements ReferenceIndex {
  readonly kind = "remote";
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly namespace: string;
  private readonly requestTimeoutMs: number;

  constructor(options: RemoteReferenceIndexOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.apiKey = options.apiKey ?? "";
    this.namespace = options.namespace ?? "";
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
  }

  async isAvailable(): Promise<boolean> {
    const stats = await this.describe("availability");
    return stats !== null;
  }

  async upsert(id: string, embedding: number[], metadata: ReferenceMetadata): Promise<boolean> {
    const payload = await this.post("/vectors/upsert", "upsert", {
      vectors: [{ id, values: embedding, metadata }],
      namespace: this.namespace
    });
    if (payload === null) {
      return false;
    }

    const parsed = upsertResponseSchema.safeParse(payload);
    return parsed.success && parsed.data.upsertedCount > 0;
  }

  async search(query: number[], topK: number): Promise<SearchHit[]> {
    if (topK <= 0) {
      return [];
    }

    const payload = await this.post("/query", "search", {
      vector: query,
      topK,
      namespace: this.namespace,
      includeMetadata: true
    });
    if (payload === null) {
      return [];
    }

    const parsed = queryResponseSchema.safeParse(payload);
    if (!parsed.success) {
      logWarn("remote_reference_index_invalid_response", { operation: "search", issues: parsed.error.issues.length });
      return [];
    }

    return parsed.data.matches.map((match) => ({
      id: match.id,
      score: match.score,
      metadata: match.metadata ?? {}
    }));
  }

  async getById(id: string): Promise<ReferenceSnippet | null> {
    const payload = await this.post("/vectors/fetch", "getById", {
      ids: [id],
      namespace: this.namespace
    });
    if (payload === null) {
      return null;
    }

    const parsed = fetchResponseSchema.safeParse(payload);
    if (!parsed.success) {
      logWarn("remote_reference_index_invalid_response", { operation: "getById", issues: parsed.error.issues.length });
      return null;
    }

    const vector = parsed.data.vectors[id];
    if (!vector) {
      return null;
    }

    return {
      id,
      embedding: vector.values,
      metadata: vector.metadata ?? {}
    };
  }

  async delete(id: string): Promise<boolean> {
    const payload = await this.post("/vectors/delete", "delete", {
      ids: [id],
      namespace: this.namespace
    });
    return payload !== null;
  }

  async size(): Promise<number> {
    const stats = await this.describe("size");
    if (!stats) {
      return 0;
    }

    if (this.namespace && stats.namespaces) {
      return stats.namespaces[this.namespace]?.vectorCount ?? 0;
    }
    return stats.totalVectorCount;
  }

  private async describe(operation: string): Promise<z.infer<typeof statsResponseSchema> | null> {
    const payload = await this.post("/describe_index_stats", operation, {});
    if (payload === null) {
      return null;
    }

    const parsed = statsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      logWarn("remote_reference_index_invalid_response", { operation, issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  private async post(route: string, operation: string, body: Record<string, unknown>): Promise<unknown> {
    try {
      const response = await fetch(`${this.baseUrl}${route}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Api-Key": this.apiKey
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });

      if (!response.ok) {
        logWarn("remote_reference_index_request_failed", {
          operation,
          status: response.status,
          details: await response.text()
        });
        return null;
      }

      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      logWarn("remote_reference_index_request_failed", { operation, error: serializeError(error) });
      return null;
    }
  }
}
