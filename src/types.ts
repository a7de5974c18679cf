export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface SourceUnit {
  /** Path relative to the source root, forward slashes. */
  readonly id: string;
  /** Absolute path on disk, when the unit was read from a file. */
  readonly path: string;
  readonly text: string;
  /** Lowercase hex SHA-256 of the exact source bytes. */
  readonly contentHash: string;
}

export type ChunkMode = "line" | "structure" | "paragraph" | "auto";

export type ChunkLabel = "header" | "type-head" | "type-body" | "member" | "window" | "paragraph";

export interface Chunk {
  readonly unitId: string;
  /** 0-based emission order within the unit. */
  readonly index: number;
  readonly text: string;
  readonly label?: ChunkLabel;
  /** 1-based inclusive line range in the unit; paragraph chunks report the covered paragraphs. */
  readonly startLine: number;
  readonly endLine: number;
}

export interface ModelVerdict {
  violation: boolean;
  reason: string;
  fix: string;
}

export type AttemptOutcome = "accepted" | "rejected" | "malformed";

export interface GenerationAttempt {
  chunkIndex: number;
  attempt: number;
  rawOutput: string | null;
  verdict?: ModelVerdict;
  outcome: AttemptOutcome;
  feedback?: string;
}

export type ChunkVerdict =
  | {
      kind: "accepted";
      chunkIndex: number;
      violation: boolean;
      reason: string;
      fix: string;
      attempts: number;
    }
  | {
      kind: "exhausted";
      chunkIndex: number;
      violation: true;
      reason: string;
      fix: string;
      attempts: number;
    };

export interface FileVerdict {
  unitId: string;
  contentHash: string;
  violation: boolean;
  chunks: ChunkVerdict[];
  aggregatedFix: string;
  reasons: string[];
}

export type MergeResult =
  | { status: "merged"; mergedDeclarations: string[] }
  | { status: "partially-merged"; mergedDeclarations: string[]; unmergedBlocks: string[] }
  | { status: "unmerged"; reason: string }
  | { status: "failed"; parseError: string };

export type MergeStatus = MergeResult["status"];

export interface MergeOutput {
  finalText: string;
  result: MergeResult;
}

export interface UnitOutcome {
  unitId: string;
  contentHash: string;
  cacheHit: boolean;
  violation: boolean;
  chunkCount: number;
  exhaustedChunks: number;
  mergeStatus: MergeStatus | null;
  outputPath: string | null;
  reasons: string[];
}

export type UnitReport =
  | { unitId: string; status: "completed"; outcome: UnitOutcome }
  | { unitId: string; status: "failed"; error: string }
  | { unitId: string; status: "abandoned" };

export interface RunReport {
  startedAt: string;
  finishedAt: string;
  units: UnitReport[];
  totals: {
    units: number;
    completed: number;
    failed: number;
    abandoned: number;
    violations: number;
    cacheHits: number;
  };
}

export interface ReferenceMetadata {
  title?: string;
  content?: string;
  tags?: string[];
  [key: string]: JsonValue | undefined;
}

export interface ReferenceSnippet {
  id: string;
  embedding: number[];
  metadata: ReferenceMetadata;
}

export interface SearchHit {
  id: string;
  score: number;
  metadata: ReferenceMetadata;
}
