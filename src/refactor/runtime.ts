import { AppConfig } from "../lib/config.js";
import { EmbeddingProvider, HashingEmbeddingProvider, OpenAiEmbeddingProvider } from "../lib/embeddings.js";
import { logInfo } from "../lib/logging.js";
import { ProviderRegistry, Transformer } from "../lib/providers.js";
import { ContentCache, DisabledContentCache } from "./cache/content-cache.js";
import { FileContentCache } from "./cache/file-content-cache.js";
import { PostgresContentCache, createPostgresPool } from "./cache/postgres-content-cache.js";
import { FileOutputWriter, OutputWriter } from "./output-writer.js";
import { RefactorPipeline } from "./pipeline.js";
import { ContextAssembler } from "./retrieval/context-assembler.js";
import { InMemoryReferenceIndex, ReferenceIndex } from "./retrieval/reference-index.js";
import { loadIndexSnapshot, saveIndexSnapshot } from "./retrieval/reference-index-store.js";
import { RagService } from "./retrieval/rag-service.js";
import { RemoteReferenceIndex } from "./retrieval/remote-reference-index.js";

export function createEmbedder(config: AppConfig): EmbeddingProvider {
  const { embedding } = config;
  const useOpenAi = embedding.provider === "openai" || (embedding.provider === "auto" && Boolean(embedding.apiKey));

  if (useOpenAi) {
    return new OpenAiEmbeddingProvider({
      apiKey: embedding.apiKey,
      model: embedding.model,
      dimension: embedding.dimension,
      batchSize: embedding.batchSize,
      baseUrl: embedding.apiUrl,
      requestTimeoutMs: config.requestTimeoutMs
    });
  }
  return new HashingEmbeddingProvider(embedding.dimension ?? 256);
}

export async function createReferenceIndex(config: AppConfig, embedder: EmbeddingProvider): Promise<ReferenceIndex> {
  if (config.rag.indexBackend === "remote" && config.rag.remoteUrl) {
    return new RemoteReferenceIndex({
      baseUrl: config.rag.remoteUrl,
      apiKey: config.rag.remoteApiKey,
      namespace: config.rag.namespace,
      requestTimeoutMs: Math.min(config.requestTimeoutMs, 30_000)
    });
  }

  if (config.rag.storePath) {
    return loadIndexSnapshot(config.rag.storePath, { modelName: embedder.modelName, dimension: embedder.dimension() });
  }
  return new InMemoryReferenceIndex();
}

export interface CacheHandle {
  cache: ContentCache;
  close(): Promise<void>;
}

export async function createContentCache(config: AppConfig): Promise<CacheHandle> {
  if (!config.cacheEnabled) {
    return { cache: new DisabledContentCache(), close: async () => undefined };
  }

  if (config.cacheBackend === "postgres" && config.databaseUrl) {
    const cache = PostgresContentCache.fromPool(
      createPostgresPool({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl })
    );
    await cache.initialize();
    return { cache, close: () => cache.close() };
  }

  return { cache: new FileContentCache(config.cacheDir), close: async () => undefined };
}

export interface RuntimeOverrides {
  transformer?: Transformer;
  writer?: OutputWriter;
  cache?: ContentCache;
  embedder?: EmbeddingProvider;
  index?: ReferenceIndex;
  env?: NodeJS.ProcessEnv;
}

export interface Runtime {
  pipeline: RefactorPipeline;
  transformer: Transformer;
  rag: RagService | null;
  index: ReferenceIndex | null;
  embedder: EmbeddingProvider;
  cache: ContentCache;
  /** Saves the in-memory index snapshot when a store path is configured. */
  persistIndex(): Promise<void>;
  close(): Promise<void>;
}

export async function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const transformer =
    overrides.transformer ??
    new ProviderRegistry({ env: overrides.env, requestTimeoutMs: config.requestTimeoutMs }).get(config.provider);
  const embedder = overrides.embedder ?? createEmbedder(config);
  const index = config.rag.enabled ? overrides.index ?? (await createReferenceIndex(config, embedder)) : null;
  const rag = index
    ? new RagService({ index, embedder, minScore: config.rag.minScore, includeCitations: config.rag.includeCitations })
    : null;

  const cacheHandle = overrides.cache
    ? { cache: overrides.cache, close: async () => undefined }
    : await createContentCache(config);

  const pipeline = new RefactorPipeline(
    {
      transformer,
      cache: cacheHandle.cache,
      contextAssembler: new ContextAssembler(rag, {
        queryCharLimit: config.rag.queryCharLimit,
        queryPrefix: config.rag.queryPrefix
      }),
      writer: overrides.writer ?? new FileOutputWriter(config.outputDir),
      rag
    },
    {
      chunk: { maxSize: config.maxChunkSize, overlap: config.chunkOverlap, mode: config.chunkMode },
      maxAttempts: config.maxAttempts,
      chunkConcurrency: config.chunkConcurrency,
      topK: config.rag.topK,
      mergeStrategy: config.merge,
      indexProcessedFiles: config.rag.indexProcessedFiles,
      systemPrompt: config.systemPrompt,
      basePrompt: config.basePrompt,
      model: config.model
    }
  );

  logInfo("runtime_ready", {
    provider: transformer.descriptor.id,
    cache: cacheHandle.cache.kind,
    index: index?.kind ?? "disabled",
    embedding: embedder.modelName
  });

  return {
    pipeline,
    transformer,
    rag,
    index,
    embedder,
    cache: cacheHandle.cache,
    persistIndex: async () => {
      if (index instanceof InMemoryReferenceIndex && config.rag.storePath) {
        await saveIndexSnapshot(config.rag.storePath, index, {
          modelName: embedder.modelName,
          dimension: embedder.dimension()
        });
      }
    },
    close: () => cacheHandle.close()
  };
}
