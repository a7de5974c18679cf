import { z } from "zod";
import { FileVerdict } from "../../types.js";

export interface ContentCache {
  readonly kind: string;
  get(hash: string): Promise<FileVerdict | null>;
  put(hash: string, verdict: FileVerdict): Promise<void>;
}

const chunkVerdictSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("accepted"),
    chunkIndex: z.number().int().nonnegative(),
    violation: z.boolean(),
    reason: z.string(),
    fix: z.string(),
    attempts: z.number().int().nonnegative()
  }),
  z.object({
    kind: z.literal("exhausted"),
    chunkIndex: z.number().int().nonnegative(),
    violation: z.literal(true),
    reason: z.string(),
    fix: z.string(),
    attempts: z.number().int().nonnegative()
  })
]);

export const fileVerdictSchema = z.object({
  unitId: z.string(),
  contentHash: z.string().regex(/^[0-9a-f]{64}$/),
  violation: z.boolean(),
  chunks: z.array(chunkVerdictSchema),
  aggregatedFix: z.string(),
  reasons: z.array(z.string())
});

export const cacheEntrySchema = z.object({
  version: z.literal(1),
  storedAt: z.string(),
  verdict: fileVerdictSchema
});

export type CacheEntry = z.infer<typeof cacheEntrySchema>;

export function isContentHash(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}

/**
 * Validates a stored entry and checks that it belongs to `hash`.
 */
export function readCacheEntry(hash: string, payload: unknown): FileVerdict | null {
  const parsed = cacheEntrySchema.safeParse(payload);
  if (!parsed.success || parsed.data.verdict.contentHash !== hash) {
    return null;
  }
  return parsed.data.verdict;
}

export function toCacheEntry(verdict: FileVerdict): CacheEntry {
  return {
    version: 1,
    storedAt: new Date().toISOString(),
    verdict
  };
}

export class DisabledContentCache implements ContentCache {
  readonly kind = "disabled";

  async get(_hash: string): Promise<FileVerdict | null> {
    return null;
  }

  async put(_hash: string, _verdict: FileVerdict): Promise<void> {
    return;
  }
}
