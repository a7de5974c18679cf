import { errorMessage } from "../../lib/errors.js";
import { logDebug, logWarn, serializeError } from "../../lib/logging.js";
import { FileVerdict, MergeOutput, MergeResult, SourceUnit } from "../../types.js";
import { fixMarkerPattern } from "../aggregation/result-aggregator.js";
import { formatParseError, parseSource } from "../validation/structural-parser.js";
import { mergeByDeclaration } from "./ast-merge.js";
import { applyHeuristicEdits } from "./heuristics.js";
import { MergeStrategy } from "./merge-strategy.js";
import { neutraliseForBlockComment } from "./splices.js";

export const unmergedBlocksHeader = "arch-repair: fix blocks that could not be merged";
export const unmergedFixHeader = "arch-repair: fix could not be merged automatically";

const noViolationLinePattern = /^\/\/--- chunk \d+ => no violation$/;

export function appendAnnotation(base: string, header: string, body: string): string {
  const separator = base.length === 0 || base.endsWith("\n") ? "" : "\n";
  return `${base}${separator}\n/* ${header}\n\n${neutraliseForBlockComment(body)}\n*/\n`;
}

/**
 * Splits an aggregated fix on its `//--- fix for chunk N ---` markers. Marker
 * lines for chunks without a violation are dropped.
 */
export function splitFixBlocks(aggregatedFix: string): string[] {
  const blocks: string[] = [];
  let current: string[] = [];

  const flush = (): void => {
    const block = current.join("\n").trim();
    if (block) {
      blocks.push(block);
    }
    current = [];
  };

  for (const line of aggregatedFix.split(/\r?\n/)) {
    if (fixMarkerPattern.test(line.trim())) {
      flush();
      continue;
    }
    if (noViolationLinePattern.test(line.trim())) {
      continue;
    }
    current.push(line);
  }
  flush();

  return blocks;
}

function heuristicFallback(
  unit: SourceUnit,
  verdict: FileVerdict,
  strategy: MergeStrategy,
  result: Extract<MergeResult, { status: "unmerged" | "failed" }>,
  originalParses: boolean
): MergeOutput {
  let edited: string;
  try {
    edited = applyHeuristicEdits(unit.text, strategy);
  } catch (error) {
    logWarn("merge_heuristics_failed", { unitId: unit.id, error: serializeError(error) });
    edited = unit.text;
  }

  if (originalParses && edited !== unit.text && !parseSource(edited, unit.id).ok) {
    logDebug("merge_heuristics_discarded", { unitId: unit.id });
    edited = unit.text;
  }

  return {
    finalText: appendAnnotation(edited, unmergedFixHeader, verdict.aggregatedFix),
    result
  };
}

function mergeBlocks(unit: SourceUnit, verdict: FileVerdict, strategy: MergeStrategy): MergeOutput | null {
  const whole = mergeByDeclaration(unit.text, verdict.aggregatedFix, unit.id, strategy);
  if (whole.ok) {
    return {
      finalText: whole.text,
      result: { status: "merged", mergedDeclarations: whole.mergedDeclarations }
    };
  }
  logDebug("merge_whole_fix_skipped", { unitId: unit.id, reason: whole.reason });

  let text = unit.text;
  const mergedDeclarations: string[] = [];
  const unmergedBlocks: string[] = [];

  for (const block of splitFixBlocks(verdict.aggregatedFix)) {
    const outcome = mergeByDeclaration(text, block, unit.id, strategy);
    if (outcome.ok) {
      text = outcome.text;
      for (const name of outcome.mergedDeclarations) {
        if (!mergedDeclarations.includes(name)) {
          mergedDeclarations.push(name);
        }
      }
    } else {
      logDebug("merge_block_skipped", { unitId: unit.id, reason: outcome.reason });
      unmergedBlocks.push(block);
    }
  }

  if (mergedDeclarations.length === 0) {
    return null;
  }

  if (unmergedBlocks.length === 0) {
    return { finalText: text, result: { status: "merged", mergedDeclarations } };
  }

  return {
    finalText: appendAnnotation(text, unmergedBlocksHeader, unmergedBlocks.join(`\n\n//--- unmerged block ---\n`)),
    result: { status: "partially-merged", mergedDeclarations, unmergedBlocks }
  };
}

/**
 * Folds a file verdict back into the unit's text, degrading from a structural
 * merge to pattern-based edits. Never throws.
 */
export function mergeVerdict(unit: SourceUnit, verdict: FileVerdict, strategy: MergeStrategy): MergeOutput {
  const original = parseSource(unit.text, unit.id);
  if (!original.ok) {
    return heuristicFallback(
      unit,
      verdict,
      strategy,
      { status: "failed", parseError: formatParseError(original.error) },
      false
    );
  }

  try {
    const merged = mergeBlocks(unit, verdict, strategy);
    if (merged) {
      return merged;
    }
    return heuristicFallback(
      unit,
      verdict,
      strategy,
      { status: "unmerged", reason: "no fix block could be merged into the original" },
      true
    );
  } catch (error) {
    logWarn("merge_structural_failed", { unitId: unit.id, error: serializeError(error) });
    return heuristicFallback(unit, verdict, strategy, { status: "unmerged", reason: `merge error: ${errorMessage(error)}` }, true);
  }
}
