import { createHash } from "node:crypto";
import { z } from "zod";
import { logDebug, logWarn, serializeError } from "./logging.js";

export interface EmbeddingProvider {
  readonly modelName: string;
  dimension(): number;
  isAvailable(): boolean;
  embed(text: string): Promise<number[] | null>;
  embedBatch(texts: string[]): Promise<Array<number[] | null>>;
}

/**
 * Cosine similarity in [-1, 1]. Vectors of different length are compared over
 * the shorter prefix; a zero vector scores 0.
 */
export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  const length = Math.min(left.length, right.length);
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;

  for (let index = 0; index < length; index += 1) {
    const a = left[index];
    const b = right[index];
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }

  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }

  const score = dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
  return Math.max(-1, Math.min(1, score));
}

export function tokenizeIdentifiers(text: string): string[] {
  return text
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 1);
}

/**
 * Local feature-hashing embedder. Each token is hashed into one bucket with a
 * sign taken from the same digest; the result is L2-normalised.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly modelName: string;
  private readonly size: number;

  constructor(size = 256) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Hashing embedding dimension must be a positive integer (got ${size}).`);
    }
    this.size = size;
    this.modelName = `hashing-${size}`;
  }

  dimension(): number {
    return this.size;
  }

  isAvailable(): boolean {
    return true;
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.size).fill(0);

    for (const token of tokenizeIdentifiers(text)) {
      const digest = createHash("sha256").update(token).digest();
      const bucket = digest.readUInt32BE(0) % this.size;
      const sign = (digest[4] & 1) === 0 ? 1 : -1;
      vector[bucket] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }

  async embed(text: string): Promise<number[] | null> {
    return this.embedSync(text);
  }

  async embedBatch(texts: string[]): Promise<Array<number[] | null>> {
    return texts.map((text) => this.embedSync(text));
  }
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative()
    })
  )
});

export interface OpenAiEmbeddingOptions {
  apiKey: string | undefined;
  model?: string;
  dimension?: number;
  batchSize?: number;
  baseUrl?: string;
  requestTimeoutMs?: number;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly modelName: string;
  private readonly apiKey: string;
  private readonly size: number;
  private readonly batchSize: number;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;

  constructor(options: OpenAiEmbeddingOptions) {
    this.apiKey = (options.apiKey ?? "").trim();
    this.modelName = options.model || "text-embedding-ada-002";
    this.size = options.dimension ?? 1536;
    this.batchSize = Math.max(1, options.batchSize ?? 20);
    this.baseUrl = (options.baseUrl || "https://api.openai.com/v1").replace(/\/$/, "");
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  dimension(): number {
    return this.size;
  }

  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  async embed(text: string): Promise<number[] | null> {
    const [vector] = await this.embedBatch([text]);
    return vector ?? null;
  }

  async embedBatch(texts: string[]): Promise<Array<number[] | null>> {
    if (!this.isAvailable()) {
      return texts.map(() => null);
    }

    const results: Array<number[] | null> = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      results.push(...(await this.requestBatch(batch)));
    }
    return results;
  }

  private async requestBatch(batch: string[]): Promise<Array<number[] | null>> {
    try {
      const response = await fetch(`${this.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({ model: this.modelName, input: batch }),
        signal: AbortSignal.timeout(this.requestTimeoutMs)
      });

      if (!response.ok) {
        const details = await response.text();
        logWarn("embedding_request_failed", { model: this.modelName, status: response.status, details });
        return batch.map(() => null);
      }

      const payload = embeddingResponseSchema.parse(await response.json());
      const vectors: Array<number[] | null> = batch.map(() => null);
      for (const entry of payload.data) {
        if (entry.index < vectors.length) {
          vectors[entry.index] = entry.embedding;
        }
      }

      logDebug("embedding_batch_completed", { model: this.modelName, size: batch.length });
      return vectors;
    } catch (error) {
      logWarn("embedding_request_failed", { model: this.modelName, error: serializeError(error) });
      return batch.map(() => null);
    }
  }
}
