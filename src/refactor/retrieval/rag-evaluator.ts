import path from "node:path";
import { z } from "zod";
import { EmbeddingProvider, cosineSimilarity } from "../../lib/embeddings.js";
import { errorMessage } from "../../lib/errors.js";
import { writeTextFileAtomic } from "../../lib/fs-utils.js";
import { logDebug, logInfo, logWarn } from "../../lib/logging.js";
import { ReferenceIndex } from "./reference-index.js";

export const evaluationSuiteSchema = z
  .object({
    topK: z.number().int().positive().default(5),
    queries: z
      .array(
        z.object({
          query: z.string().min(1),
          expectedKeywords: z.array(z.string().min(1)).default([])
        })
      )
      .default([]),
    /** Group name to ids of documents that should embed close together. */
    groups: z.record(z.array(z.string().min(1))).default({})
  })
  .strict();

export type EvaluationSuite = z.infer<typeof evaluationSuiteSchema>;

export interface EvaluatedHit {
  id: string;
  score: number;
  title: string;
  excerpt: string;
  keywordHits: number;
}

export interface QueryEvaluation {
  query: string;
  expectedKeywords: string[];
  resultsCount: number;
  topScore: number;
  keywordHits: number;
  embeddingMs: number;
  searchMs: number;
  hits: EvaluatedHit[];
  error?: string;
}

export interface RetrievalEvaluation {
  totalQueries: number;
  avgRelevanceScore: number;
  avgKeywordHits: number;
  /** Share of queries with at least one expected keyword in their hits. */
  keywordHitRate: number;
  queries: QueryEvaluation[];
}

export interface GroupEvaluation {
  group: string;
  documentCount: number;
  retrievedDocuments: number;
  similarityPairs: number;
  avgIntraGroupSimilarity: number;
  avgInterGroupSimilarity: number;
}

export interface EmbeddingEvaluation {
  embeddingModel: string;
  embeddingDimension: number;
  avgIntraGroupSimilarity: number;
  avgInterGroupSimilarity: number;
  groups: GroupEvaluation[];
}

export interface RagEvaluationReport {
  timestamp: string;
  indexKind: string;
  retrieval: RetrievalEvaluation;
  embedding: EmbeddingEvaluation;
}

export interface RagEvaluatorOptions {
  index: ReferenceIndex;
  embedder: EmbeddingProvider;
  now?: () => Date;
}

const excerptLength = 200;

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

function countKeywords(content: string, keywords: readonly string[]): number {
  const normalized = content.toLowerCase();
  return keywords.filter((keyword) => normalized.includes(keyword.toLowerCase())).length;
}

function excerptOf(content: string): string {
  return content.length > excerptLength ? `${content.slice(0, excerptLength)}...` : content;
}

/**
 * Measures retrieval quality over a suite of test queries and how tightly
 * related documents cluster in embedding space.
 */
export class RagEvaluator {
  private readonly index: ReferenceIndex;
  private readonly embedder: EmbeddingProvider;
  private readonly now: () => Date;

  constructor(options: RagEvaluatorOptions) {
    this.index = options.index;
    this.embedder = options.embedder;
    this.now = options.now ?? (() => new Date());
  }

  async evaluate(suite: EvaluationSuite): Promise<RagEvaluationReport> {
    const retrieval = await this.evaluateQueries(suite.queries, suite.topK);
    const embedding = await this.evaluateGroups(suite.groups);

    return {
      timestamp: this.now().toISOString(),
      indexKind: this.index.kind,
      retrieval,
      embedding
    };
  }

  async evaluateQueries(queries: EvaluationSuite["queries"], topK: number): Promise<RetrievalEvaluation> {
    const evaluations: QueryEvaluation[] = [];
    for (const entry of queries) {
      evaluations.push(await this.evaluateQuery(entry.query, entry.expectedKeywords, topK));
    }

    const summary: RetrievalEvaluation = {
      totalQueries: evaluations.length,
      avgRelevanceScore: mean(evaluations.map((evaluation) => evaluation.topScore)),
      avgKeywordHits: mean(evaluations.map((evaluation) => evaluation.keywordHits)),
      keywordHitRate: mean(evaluations.map((evaluation) => (evaluation.keywordHits > 0 ? 1 : 0))),
      queries: evaluations
    };

    logInfo("rag_retrieval_evaluated", {
      totalQueries: summary.totalQueries,
      avgRelevanceScore: summary.avgRelevanceScore,
      avgKeywordHits: summary.avgKeywordHits,
      keywordHitRate: summary.keywordHitRate
    });
    return summary;
  }

  private async evaluateQuery(query: string, expectedKeywords: string[], topK: number): Promise<QueryEvaluation> {
    const evaluation: QueryEvaluation = {
      query,
      expectedKeywords,
      resultsCount: 0,
      topScore: 0,
      keywordHits: 0,
      embeddingMs: 0,
      searchMs: 0,
      hits: []
    };

    try {
      const embedStarted = performance.now();
      const embedding = await this.embedder.embed(query);
      evaluation.embeddingMs = performance.now() - embedStarted;
      if (!embedding) {
        evaluation.error = "query embedding unavailable";
        return evaluation;
      }

      const searchStarted = performance.now();
      const hits = await this.index.search(embedding, topK);
      evaluation.searchMs = performance.now() - searchStarted;

      evaluation.hits = hits.map((hit) => {
        const content = typeof hit.metadata.content === "string" ? hit.metadata.content : "";
        return {
          id: hit.id,
          score: hit.score,
          title: typeof hit.metadata.title === "string" && hit.metadata.title ? hit.metadata.title : "Untitled",
          excerpt: excerptOf(content),
          keywordHits: countKeywords(content, expectedKeywords)
        };
      });
      evaluation.resultsCount = hits.length;
      evaluation.topScore = hits.length > 0 ? hits[0].score : 0;
      evaluation.keywordHits = evaluation.hits.reduce((sum, hit) => sum + hit.keywordHits, 0);
    } catch (error) {
      logWarn("rag_query_evaluation_failed", { query, error: errorMessage(error) });
      evaluation.error = errorMessage(error);
    }

    logDebug("rag_query_evaluated", {
      query,
      results: evaluation.resultsCount,
      topScore: evaluation.topScore,
      keywordHits: evaluation.keywordHits
    });
    return evaluation;
  }

  async evaluateGroups(groups: Record<string, string[]>): Promise<EmbeddingEvaluation> {
    const vectorsByGroup = new Map<string, number[][]>();
    for (const [group, ids] of Object.entries(groups)) {
      const vectors: number[][] = [];
      for (const id of ids) {
        const snippet = await this.index.getById(id);
        if (!snippet || snippet.embedding.length === 0) {
          logWarn("rag_evaluation_document_missing", { group, id });
          continue;
        }
        vectors.push(snippet.embedding);
      }
      vectorsByGroup.set(group, vectors);
    }

    const results: GroupEvaluation[] = [];
    for (const [group, vectors] of vectorsByGroup) {
      const intra: number[] = [];
      for (let left = 0; left < vectors.length; left += 1) {
        for (let right = left + 1; right < vectors.length; right += 1) {
          intra.push(cosineSimilarity(vectors[left], vectors[right]));
        }
      }

      const inter: number[] = [];
      for (const [otherGroup, otherVectors] of vectorsByGroup) {
        if (otherGroup === group) {
          continue;
        }
        for (const vector of vectors) {
          for (const other of otherVectors) {
            inter.push(cosineSimilarity(vector, other));
          }
        }
      }

      results.push({
        group,
        documentCount: groups[group].length,
        retrievedDocuments: vectors.length,
        similarityPairs: intra.length,
        avgIntraGroupSimilarity: mean(intra),
        avgInterGroupSimilarity: mean(inter)
      });
    }

    const summary: EmbeddingEvaluation = {
      embeddingModel: this.embedder.modelName,
      embeddingDimension: this.embedder.dimension(),
      avgIntraGroupSimilarity: mean(results.map((result) => result.avgIntraGroupSimilarity)),
      avgInterGroupSimilarity: mean(results.map((result) => result.avgInterGroupSimilarity)),
      groups: results
    };

    logInfo("rag_embedding_evaluated", {
      model: summary.embeddingModel,
      groups: results.length,
      avgIntraGroupSimilarity: summary.avgIntraGroupSimilarity,
      avgInterGroupSimilarity: summary.avgInterGroupSimilarity
    });
    return summary;
  }
}

export function evaluationReportFileName(timestamp: Date): string {
  const stamp = timestamp.toISOString().replace(/\.\d+Z$/, "").replace(/[-:]/g, "").replace("T", "_");
  return `rag-eval-${stamp}.json`;
}

/** Writes `rag-eval-YYYYMMDD_HHMMSS.json` under `directory` and returns its path. */
export async function saveEvaluationReport(directory: string, report: RagEvaluationReport): Promise<string> {
  const target = path.join(path.resolve(directory), evaluationReportFileName(new Date(report.timestamp)));
  await writeTextFileAtomic(target, `${JSON.stringify(report, null, 2)}\n`);
  return target;
}
