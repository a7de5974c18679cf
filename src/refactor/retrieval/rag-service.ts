import { EmbeddingProvider } from "../../lib/embeddings.js";
import { logDebug, logInfo, logWarn, serializeError } from "../../lib/logging.js";
import { ReferenceMetadata, SearchHit } from "../../types.js";
import { ReferenceIndex } from "./reference-index.js";

export interface RagServiceOptions {
  index: ReferenceIndex;
  embedder: EmbeddingProvider;
  minScore?: number;
  includeCitations?: boolean;
  enabled?: boolean;
}

export interface IndexableDocument {
  id: string;
  title: string;
  content: string;
  metadata?: ReferenceMetadata;
}

/**
 * Owns the embedder and the reference index and answers similarity queries
 * with hits that clear the relevance threshold.
 */
export class RagService {
  readonly minScore: number;
  readonly includeCitations: boolean;
  private readonly index: ReferenceIndex;
  private readonly embedder: EmbeddingProvider;
  private enabled: boolean;

  constructor(options: RagServiceOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.minScore = options.minScore ?? 0.7;
    this.includeCitations = options.includeCitations ?? true;
    this.enabled = options.enabled ?? true;
  }

  get indexKind(): string {
    return this.index.kind;
  }

  get embeddingModel(): string {
    return this.embedder.modelName;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  async isAvailable(): Promise<boolean> {
    if (!this.enabled || !this.embedder.isAvailable()) {
      return false;
    }
    return this.index.isAvailable();
  }

  async findRelevant(query: string, topK: number): Promise<SearchHit[]> {
    if (topK <= 0 || !(await this.isAvailable())) {
      logDebug("rag_lookup_skipped", { index: this.index.kind, topK });
      return [];
    }

    try {
      const embedding = await this.embedder.embed(query);
      if (!embedding) {
        logWarn("rag_query_embedding_failed", { model: this.embedder.modelName });
        return [];
      }

      const hits = await this.index.search(embedding, topK);
      return hits.filter((hit) => hit.score >= this.minScore);
    } catch (error) {
      logWarn("rag_lookup_failed", { index: this.index.kind, error: serializeError(error) });
      return [];
    }
  }

  async indexDocument(id: string, title: string, content: string, metadata: ReferenceMetadata = {}): Promise<boolean> {
    const indexed = await this.indexDocuments([{ id, title, content, metadata }]);
    return indexed === 1;
  }

  /** Returns the number of documents written to the index. */
  async indexDocuments(documents: IndexableDocument[]): Promise<number> {
    if (documents.length === 0 || !(await this.isAvailable())) {
      return 0;
    }

    const embeddings = await this.embedder.embedBatch(documents.map((document) => document.content));
    let indexed = 0;

    for (let position = 0; position < documents.length; position += 1) {
      const document = documents[position];
      const embedding = embeddings[position];
      if (!embedding) {
        logWarn("rag_document_embedding_failed", { id: document.id });
        continue;
      }

      const stored = await this.index.upsert(document.id, embedding, {
        ...document.metadata,
        title: document.title,
        content: document.content
      });
      if (stored) {
        indexed += 1;
      }
    }

    logInfo("rag_documents_indexed", { index: this.index.kind, requested: documents.length, indexed });
    return indexed;
  }
}
