import { cosineSimilarity } from "../../lib/embeddings.js";
import { logWarn } from "../../lib/logging.js";
import { ReferenceMetadata, ReferenceSnippet, SearchHit } from "../../types.js";

export interface ReferenceIndex {
  readonly kind: string;
  isAvailable(): Promise<boolean>;
  upsert(id: string, embedding: number[], metadata: ReferenceMetadata): Promise<boolean>;
  search(query: number[], topK: number): Promise<SearchHit[]>;
  getById(id: string): Promise<ReferenceSnippet | null>;
  delete(id: string): Promise<boolean>;
  size(): Promise<number>;
}

export function rankByCosine(
  query: readonly number[],
  snippets: readonly ReferenceSnippet[],
  topK: number,
  indexKind: string
): SearchHit[] {
  if (topK <= 0 || snippets.length === 0) {
    return [];
  }

  let mismatched = 0;
  const scored = snippets.map((snippet, position) => {
    if (snippet.embedding.length !== query.length) {
      mismatched += 1;
    }
    return {
      position,
      hit: {
        id: snippet.id,
        score: cosineSimilarity(query, snippet.embedding),
        metadata: structuredClone(snippet.metadata)
      }
    };
  });

  if (mismatched > 0) {
    logWarn("reference_index_dimension_mismatch", {
      index: indexKind,
      queryDimension: query.length,
      mismatchedSnippets: mismatched
    });
  }

  scored.sort((left, right) => right.hit.score - left.hit.score || left.position - right.position);
  return scored.slice(0, topK).map((entry) => entry.hit);
}

/**
 * Exact linear-scan index. Writes replace entries in a single synchronous step,
 * so a search works on a consistent snapshot.
 */
export class InMemoryReferenceIndex implements ReferenceIndex {
  readonly kind = "memory";
  private readonly entries = new Map<string, ReferenceSnippet>();
  private available = true;

  constructor(snippets: ReferenceSnippet[] = []) {
    for (const snippet of snippets) {
      this.entries.set(snippet.id, cloneSnippet(snippet));
    }
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async upsert(id: string, embedding: number[], metadata: ReferenceMetadata): Promise<boolean> {
    if (!this.available) {
      return false;
    }

    this.entries.set(id, cloneSnippet({ id, embedding, metadata }));
    return true;
  }

  async search(query: number[], topK: number): Promise<SearchHit[]> {
    if (!this.available) {
      return [];
    }

    return rankByCosine(query, Array.from(this.entries.values()), topK, this.kind);
  }

  async getById(id: string): Promise<ReferenceSnippet | null> {
    if (!this.available) {
      return null;
    }

    const snippet = this.entries.get(id);
    return snippet ? cloneSnippet(snippet) : null;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.available) {
      return false;
    }

    return this.entries.delete(id);
  }

  async size(): Promise<number> {
    return this.available ? this.entries.size : 0;
  }

  snapshot(): ReferenceSnippet[] {
    return Array.from(this.entries.values(), cloneSnippet);
  }
}

function cloneSnippet(snippet: ReferenceSnippet): ReferenceSnippet {
  return {
    id: snippet.id,
    embedding: [...snippet.embedding],
    metadata: structuredClone(snippet.metadata)
  };
}
