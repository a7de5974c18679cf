import { stableId } from "../lib/hashing.js";
import { logDebug, logInfo, logWarn, serializeError } from "../lib/logging.js";
import { Transformer } from "../lib/providers.js";
import { WorkerPool } from "../lib/worker-pool.js";
import { ChunkVerdict, FileVerdict, MergeStatus, SourceUnit, UnitOutcome } from "../types.js";
import { aggregateVerdicts } from "./aggregation/result-aggregator.js";
import { ContentCache } from "./cache/content-cache.js";
import { ChunkOptions, splitUnit } from "./chunking/chunker.js";
import { MergeStrategy } from "./merge/merge-strategy.js";
import { mergeVerdict } from "./merge/structural-merger.js";
import { OutputWriter } from "./output-writer.js";
import { ContextAssembler } from "./retrieval/context-assembler.js";
import { RagService } from "./retrieval/rag-service.js";
import { ValidationLoop } from "./validation/validation-loop.js";

export interface PipelineOptions {
  chunk: ChunkOptions;
  maxAttempts: number;
  chunkConcurrency: number;
  topK: number;
  mergeStrategy: MergeStrategy;
  indexProcessedFiles?: boolean;
  systemPrompt?: string;
  basePrompt?: string;
  model?: string;
}

export interface PipelineDependencies {
  transformer: Transformer;
  cache: ContentCache;
  contextAssembler: ContextAssembler;
  writer: OutputWriter;
  rag?: RagService | null;
}

/** Per-unit flow: cache lookup, chunk validation, aggregation, merge and write. */
export class RefactorPipeline {
  private readonly deps: PipelineDependencies;
  private readonly options: PipelineOptions;
  private readonly loop: ValidationLoop;

  constructor(deps: PipelineDependencies, options: PipelineOptions) {
    this.deps = deps;
    this.options = options;
    this.loop = new ValidationLoop({
      transformer: deps.transformer,
      systemPrompt: options.systemPrompt,
      basePrompt: options.basePrompt,
      model: options.model,
      onAttempt: (attempt) => logDebug("validation_attempt", { ...attempt })
    });
  }

  async processUnit(unit: SourceUnit, signal?: AbortSignal): Promise<UnitOutcome> {
    const cached = await this.deps.cache.get(unit.contentHash);
    const verdict = cached ?? (await this.evaluate(unit, signal));
    // a cancelled run must not cache or write fallback verdicts
    signal?.throwIfAborted();

    if (!cached) {
      await this.deps.cache.put(unit.contentHash, verdict);
    }

    let mergeStatus: MergeStatus | null = null;
    let outputPath: string | null = null;
    if (verdict.violation) {
      const merged = mergeVerdict(unit, verdict, this.options.mergeStrategy);
      mergeStatus = merged.result.status;
      outputPath = await this.deps.writer.write(unit, merged.finalText);
    }

    if (this.options.indexProcessedFiles && this.deps.rag) {
      await this.indexUnit(unit, verdict);
    }

    const outcome: UnitOutcome = {
      unitId: unit.id,
      contentHash: unit.contentHash,
      cacheHit: cached !== null,
      violation: verdict.violation,
      chunkCount: verdict.chunks.length,
      exhaustedChunks: verdict.chunks.filter((chunk) => chunk.kind === "exhausted").length,
      mergeStatus,
      outputPath,
      reasons: verdict.reasons
    };

    logInfo("unit_processed", {
      unitId: unit.id,
      cacheHit: outcome.cacheHit,
      violation: outcome.violation,
      chunks: outcome.chunkCount,
      exhaustedChunks: outcome.exhaustedChunks,
      mergeStatus
    });
    return outcome;
  }

  async evaluate(unit: SourceUnit, signal?: AbortSignal): Promise<FileVerdict> {
    const chunks = splitUnit(unit, this.options.chunk);
    const pool = new WorkerPool(this.options.chunkConcurrency);

    try {
      const outcomes = await Promise.all(
        chunks.map((chunk) =>
          pool.submit(async () => {
            const context = await this.deps.contextAssembler.assemble(chunk, this.options.topK).catch((error: unknown) => {
              logWarn("context_assembly_failed", { unitId: unit.id, chunkIndex: chunk.index, error: serializeError(error) });
              return "";
            });
            return this.loop.run(chunk, context, this.options.maxAttempts, signal);
          })
        )
      );

      const verdicts: ChunkVerdict[] = outcomes.map((outcome, position) => {
        if (outcome.status === "fulfilled") {
          return outcome.value;
        }
        const chunkIndex = chunks[position]?.index ?? position;
        if (outcome.status === "rejected") {
          throw new Error(`chunk ${chunkIndex} of ${unit.id} failed`, { cause: outcome.error });
        }
        throw new Error(`chunk ${chunkIndex} of ${unit.id} was abandoned`);
      });

      return aggregateVerdicts(unit, verdicts);
    } finally {
      await pool.shutdown(0);
    }
  }

  private async indexUnit(unit: SourceUnit, verdict: FileVerdict): Promise<void> {
    const rag = this.deps.rag;
    if (!rag) {
      return;
    }

    const documents = [
      {
        id: stableId("unit", unit.id, unit.contentHash),
        title: unit.id,
        content: unit.text,
        metadata: { source: "processed_file", contentHash: unit.contentHash }
      }
    ];
    if (verdict.violation) {
      documents.push({
        id: stableId("fix", unit.id, unit.contentHash),
        title: `${unit.id} (suggested fix)`,
        content: verdict.aggregatedFix,
        metadata: { source: "suggested_fix", contentHash: unit.contentHash }
      });
    }

    await rag.indexDocuments(documents);
  }
}
