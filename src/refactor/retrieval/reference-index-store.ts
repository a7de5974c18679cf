import { promises as fs } from "node:fs";
import { z } from "zod";
import { writeTextFileAtomic } from "../../lib/fs-utils.js";
import { logInfo, logWarn, serializeError } from "../../lib/logging.js";
import { ReferenceSnippet } from "../../types.js";
import { InMemoryReferenceIndex } from "./reference-index.js";
import { referenceMetadataSchema } from "./remote-reference-index.js";

export interface SnapshotMeta {
  modelName: string;
  dimension: number;
}

const snapshotSchema = z.object({
  meta: z.object({
    modelName: z.string(),
    dimension: z.number().int().positive(),
    savedAt: z.string().optional()
  }),
  snippets: z.array(
    z.object({
      id: z.string().min(1),
      emb: z.string(),
      metadata: referenceMetadataSchema.default({})
    })
  )
});

export function encodeEmbedding(values: readonly number[]): string {
  const buffer = Buffer.alloc(values.length * 4);
  values.forEach((value, index) => buffer.writeFloatLE(value, index * 4));
  return buffer.toString("base64");
}

export function decodeEmbedding(encoded: string): number[] | null {
  const buffer = Buffer.from(encoded, "base64");
  if (buffer.byteLength % 4 !== 0) {
    return null;
  }

  const values: number[] = [];
  for (let offset = 0; offset < buffer.byteLength; offset += 4) {
    values.push(buffer.readFloatLE(offset));
  }
  return values;
}

export async function saveIndexSnapshot(
  storePath: string,
  index: InMemoryReferenceIndex,
  meta: SnapshotMeta
): Promise<number> {
  const snippets = index.snapshot();
  const document = {
    meta: { ...meta, savedAt: new Date().toISOString() },
    snippets: snippets.map((snippet) => ({
      id: snippet.id,
      emb: encodeEmbedding(snippet.embedding),
      metadata: snippet.metadata
    }))
  };

  await writeTextFileAtomic(storePath, `${JSON.stringify(document)}\n`);
  logInfo("reference_index_snapshot_saved", { storePath, snippets: snippets.length });
  return snippets.length;
}

/**
 * Loads a snapshot written by {@link saveIndexSnapshot}. A missing, unreadable
 * or incompatible file yields an empty index.
 */
export async function loadIndexSnapshot(storePath: string, meta: SnapshotMeta): Promise<InMemoryReferenceIndex> {
  let raw: string;
  try {
    raw = await fs.readFile(storePath, "utf8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    if (code !== "ENOENT") {
      logWarn("reference_index_snapshot_unreadable", { storePath, error: serializeError(error) });
    }
    return new InMemoryReferenceIndex();
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch (error) {
    logWarn("reference_index_snapshot_unreadable", { storePath, error: serializeError(error) });
    return new InMemoryReferenceIndex();
  }

  const parsed = snapshotSchema.safeParse(parsedJson);
  if (!parsed.success) {
    logWarn("reference_index_snapshot_invalid", { storePath, issues: parsed.error.issues.length });
    return new InMemoryReferenceIndex();
  }

  if (parsed.data.meta.modelName !== meta.modelName || parsed.data.meta.dimension !== meta.dimension) {
    logWarn("reference_index_snapshot_incompatible", {
      storePath,
      storedModel: parsed.data.meta.modelName,
      storedDimension: parsed.data.meta.dimension,
      expectedModel: meta.modelName,
      expectedDimension: meta.dimension
    });
    return new InMemoryReferenceIndex();
  }

  const snippets: ReferenceSnippet[] = [];
  for (const entry of parsed.data.snippets) {
    const embedding = decodeEmbedding(entry.emb);
    if (!embedding) {
      continue;
    }
    snippets.push({ id: entry.id, embedding, metadata: entry.metadata });
  }

  logInfo("reference_index_snapshot_loaded", { storePath, snippets: snippets.length });
  return new InMemoryReferenceIndex(snippets);
}
