import { ChunkVerdict, FileVerdict, SourceUnit } from "../../types.js";

export const fixMarkerPattern = /^\/\/--- fix for chunk (\d+) ---$/;

export function fixMarker(index: number): string {
  return `//--- fix for chunk ${index} ---`;
}

export function noViolationMarker(index: number): string {
  return `//--- chunk ${index} => no violation`;
}

/**
 * Folds per-chunk verdicts into one file verdict. Output follows chunk index
 * order no matter the order the verdicts arrive in.
 */
export function aggregateVerdicts(unit: Pick<SourceUnit, "id" | "contentHash">, verdicts: ChunkVerdict[]): FileVerdict {
  const ordered = [...verdicts].sort((left, right) => left.chunkIndex - right.chunkIndex);

  for (let position = 1; position < ordered.length; position += 1) {
    if (ordered[position].chunkIndex === ordered[position - 1].chunkIndex) {
      throw new Error(`Duplicate verdict for chunk ${ordered[position].chunkIndex} of ${unit.id}`);
    }
  }

  let aggregatedFix = "";
  const reasons: string[] = [];

  for (const verdict of ordered) {
    if (verdict.violation) {
      aggregatedFix += `${fixMarker(verdict.chunkIndex)}\n${verdict.fix}\n`;
      reasons.push(`chunk ${verdict.chunkIndex} => ${verdict.reason}`);
    } else {
      aggregatedFix += `${noViolationMarker(verdict.chunkIndex)}\n`;
      reasons.push(`chunk ${verdict.chunkIndex} => no violation`);
    }
  }

  return {
    unitId: unit.id,
    contentHash: unit.contentHash,
    violation: ordered.some((verdict) => verdict.violation),
    chunks: ordered,
    aggregatedFix,
    reasons
  };
}
