export interface TextSplice {
  start: number;
  end: number;
  text: string;
}

/**
 * Applies non-overlapping splices expressed in offsets of `source`. At equal
 * offsets a removal is applied before an insertion so the inserted text survives.
 */
export function applySplices(source: string, splices: readonly TextSplice[]): string {
  const ordered = [...splices].sort((left, right) => right.start - left.start || right.end - left.end);

  let result = source;
  let floor = Number.POSITIVE_INFINITY;
  for (const splice of ordered) {
    if (splice.end > floor) {
      throw new Error(`Overlapping splice at ${splice.start}-${splice.end}`);
    }
    result = `${result.slice(0, splice.start)}${splice.text}${result.slice(splice.end)}`;
    floor = splice.start;
  }
  return result;
}

/**
 * Widens [start, end) to whole lines when the range is alone on its lines,
 * including the trailing line break.
 */
export function wholeLineRange(text: string, start: number, end: number): { start: number; end: number } {
  let lineStart = start;
  while (lineStart > 0 && (text[lineStart - 1] === " " || text[lineStart - 1] === "\t")) {
    lineStart -= 1;
  }

  let lineEnd = end;
  while (lineEnd < text.length && (text[lineEnd] === " " || text[lineEnd] === "\t")) {
    lineEnd += 1;
  }

  const startsLine = lineStart === 0 || text[lineStart - 1] === "\n";
  const endsLine = lineEnd === text.length || text[lineEnd] === "\n" || text[lineEnd] === "\r";
  if (!startsLine || !endsLine) {
    return { start, end };
  }

  if (text[lineEnd] === "\r" && text[lineEnd + 1] === "\n") {
    lineEnd += 2;
  } else if (text[lineEnd] === "\n") {
    lineEnd += 1;
  }
  return { start: lineStart, end: lineEnd };
}

export function indentationAt(text: string, position: number): string {
  const lineStart = text.lastIndexOf("\n", position - 1) + 1;
  const match = /^[ \t]*/.exec(text.slice(lineStart, position));
  return match ? match[0] : "";
}

/** Neutralises comment terminators so `text` can live inside a block comment. */
export function neutraliseForBlockComment(text: string): string {
  return text.replaceAll("*/", "*\\/");
}
