import { ConfigurationError } from "../../lib/errors.js";
import { Chunk, ChunkLabel, ChunkMode, SourceUnit } from "../../types.js";
import { isProseTextPath, isScriptPath } from "../source-unit.js";

export interface ChunkOptions {
  maxSize: number;
  overlap: number;
  mode: ChunkMode;
}

interface LineSpan {
  text: string;
  startLine: number;
  endLine: number;
  label: ChunkLabel;
}

const importStartPattern = /^\s*import\b/;
const importEndPattern = /(?:\bfrom\s*["'][^"']+["']|^\s*import\s*["'][^"']+["'])\s*;?\s*(?:\/\/.*)?$/;
const declarationPattern =
  /^(?:export\s+(?:default\s+)?)?(?:declare\s+)?(?:abstract\s+)?(?:async\s+)?(?:class|interface|enum|const\s+enum|function\*?|namespace)(?=[\s{*(]|$)/;
const memberPattern =
  /^(\s+)(?:(?:public|private|protected|static|readonly|abstract|async|override|declare|get|set)\s+)*\*?(?:constructor|[A-Za-z_$#][\w$]*)\s*(?:<[^>]*>)?\s*\(/;
const controlKeywords = new Set(["if", "for", "while", "switch", "catch", "return", "function", "await", "new", "typeof", "do", "else"]);
const annotationLinePattern = /^\s*(?:@|\/\/|\/\*|\*)/;

export function validateChunkOptions(options: Pick<ChunkOptions, "maxSize" | "overlap">): void {
  const issues: string[] = [];

  if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
    issues.push(`maxSize must be a positive integer (got ${String(options.maxSize)})`);
  }
  if (!Number.isInteger(options.overlap) || options.overlap < 0) {
    issues.push(`overlap must be a non-negative integer (got ${String(options.overlap)})`);
  }
  if (issues.length === 0 && options.maxSize <= options.overlap) {
    issues.push(`maxSize (${options.maxSize}) must be greater than overlap (${options.overlap})`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid chunking options", issues);
  }
}

export function resolveChunkMode(unitId: string, mode: ChunkMode): Exclude<ChunkMode, "auto"> {
  if (mode !== "auto") {
    return mode;
  }
  if (isScriptPath(unitId)) {
    return "structure";
  }
  if (isProseTextPath(unitId)) {
    return "paragraph";
  }
  return "line";
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

function span(lines: string[], start: number, endExclusive: number, label: ChunkLabel): LineSpan {
  return {
    text: lines.slice(start, endExclusive).join("\n"),
    startLine: start + 1,
    endLine: endExclusive,
    label
  };
}

/**
 * Windows of `maxSize` lines over `lines[from, to)`, advancing by
 * `maxSize - overlap`. Stops once a window reaches `to`.
 */
function lineWindowSpans(lines: string[], from: number, to: number, maxSize: number, overlap: number): LineSpan[] {
  const spans: LineSpan[] = [];
  const step = maxSize - overlap;

  for (let start = from; start < to; start += step) {
    const end = Math.min(start + maxSize, to);
    spans.push(span(lines, start, end, "window"));
    if (end >= to) {
      break;
    }
  }

  return spans;
}

function findHeaderEnd(lines: string[]): number {
  let lastImportEnd = -1;
  let inImport = false;

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];

    if (!inImport && importStartPattern.test(line)) {
      inImport = true;
    }

    if (inImport) {
      if (importEndPattern.test(line)) {
        inImport = false;
        lastImportEnd = index;
      }
      continue;
    }

    if (declarationPattern.test(line)) {
      break;
    }
  }

  return lastImportEnd;
}

function climbAnnotations(lines: string[], start: number, floor: number, indent: string | null): number {
  let cursor = start;

  while (cursor - 1 > floor) {
    const previous = lines[cursor - 1];
    if (!annotationLinePattern.test(previous)) {
      break;
    }
    if (indent !== null && !previous.startsWith(indent)) {
      break;
    }
    cursor -= 1;
  }

  return cursor;
}

function findDeclarationStarts(lines: string[], headerEnd: number): number[] {
  const starts: number[] = [];
  let floor = headerEnd;

  for (let index = headerEnd + 1; index < lines.length; index += 1) {
    if (!declarationPattern.test(lines[index])) {
      continue;
    }

    const start = climbAnnotations(lines, index, floor, "");
    starts.push(start);
    floor = index;
  }

  return starts;
}

function findMemberStarts(lines: string[], from: number, to: number): number[] {
  let memberIndent: string | null = null;

  for (let index = from + 1; index < to; index += 1) {
    const line = lines[index];
    if (line.trim() === "") {
      continue;
    }
    const indent = /^(\s+)/.exec(line);
    if (indent) {
      memberIndent = indent[1];
    }
    break;
  }

  if (memberIndent === null) {
    return [];
  }

  const starts: number[] = [];
  let floor = from;

  for (let index = from + 1; index < to; index += 1) {
    const line = lines[index];
    const match = memberPattern.exec(line);
    if (!match || match[1] !== memberIndent) {
      continue;
    }

    const name = line.trim().split(/[\s(<]/)[0];
    if (controlKeywords.has(name)) {
      continue;
    }

    const start = climbAnnotations(lines, index, floor, memberIndent);
    starts.push(start);
    floor = index;
  }

  return starts;
}

function declarationSpans(
  lines: string[],
  from: number,
  to: number,
  maxSize: number,
  overlap: number
): LineSpan[] {
  if (to - from <= maxSize) {
    return [span(lines, from, to, "type-body")];
  }

  const memberStarts = findMemberStarts(lines, from, to);
  if (memberStarts.length === 0) {
    return lineWindowSpans(lines, from, to, maxSize, overlap);
  }

  const spans: LineSpan[] = [];
  const firstMember = memberStarts[0];

  if (firstMember > from) {
    if (firstMember - from <= maxSize) {
      spans.push(span(lines, from, firstMember, "type-head"));
    } else {
      spans.push(...lineWindowSpans(lines, from, firstMember, maxSize, overlap));
    }
  }

  for (let index = 0; index < memberStarts.length; index += 1) {
    const start = memberStarts[index];
    const end = index + 1 < memberStarts.length ? memberStarts[index + 1] : to;

    if (end - start <= maxSize) {
      spans.push(span(lines, start, end, "member"));
    } else {
      spans.push(...lineWindowSpans(lines, start, end, maxSize, overlap));
    }
  }

  return spans;
}

function structureSpans(lines: string[], maxSize: number, overlap: number): LineSpan[] {
  const headerEnd = findHeaderEnd(lines);
  const declarationStarts = findDeclarationStarts(lines, headerEnd);

  if (headerEnd < 0 && declarationStarts.length === 0) {
    return lineWindowSpans(lines, 0, lines.length, maxSize, overlap);
  }

  const spans: LineSpan[] = [];

  if (headerEnd >= 0) {
    const header = span(lines, 0, headerEnd + 1, "header");
    if (headerEnd + 1 <= maxSize) {
      spans.push(header);
    } else {
      spans.push(
        ...lineWindowSpans(lines, 0, headerEnd + 1, maxSize, overlap).map((entry) => ({ ...entry, label: "header" as const }))
      );
    }
  }

  const firstDeclaration = declarationStarts.length > 0 ? declarationStarts[0] : lines.length;
  if (firstDeclaration > headerEnd + 1) {
    spans.push(...lineWindowSpans(lines, headerEnd + 1, firstDeclaration, maxSize, overlap));
  }

  for (let index = 0; index < declarationStarts.length; index += 1) {
    const start = declarationStarts[index];
    const end = index + 1 < declarationStarts.length ? declarationStarts[index + 1] : lines.length;
    spans.push(...declarationSpans(lines, start, end, maxSize, overlap));
  }

  return spans;
}

interface Paragraph {
  text: string;
  startLine: number;
  endLine: number;
}

function toParagraphs(lines: string[]): Paragraph[] {
  const paragraphs: Paragraph[] = [];
  let start = -1;

  for (let index = 0; index <= lines.length; index += 1) {
    const blank = index === lines.length || lines[index].trim() === "";
    if (!blank && start < 0) {
      start = index;
    }
    if (blank && start >= 0) {
      paragraphs.push({
        text: lines.slice(start, index).join("\n"),
        startLine: start + 1,
        endLine: index
      });
      start = -1;
    }
  }

  return paragraphs;
}

function paragraphSpans(lines: string[], maxSize: number, overlap: number): LineSpan[] {
  const spans: LineSpan[] = [];
  let current = "";
  let currentStart = 0;
  let currentEnd = 0;

  const flush = (): void => {
    const text = current.trim();
    if (text) {
      spans.push({ text, startLine: currentStart, endLine: currentEnd, label: "paragraph" });
    }
  };

  for (const paragraph of toParagraphs(lines)) {
    if (current.length > 0 && current.length + paragraph.text.length + 2 > maxSize) {
      flush();
      current = overlap > 0 && current.length > overlap ? current.slice(current.length - overlap) : "";
      currentStart = paragraph.startLine;
    }

    if (current.length > 0) {
      current += "\n\n";
    } else {
      currentStart = paragraph.startLine;
    }
    current += paragraph.text;
    currentEnd = paragraph.endLine;
  }

  flush();
  return spans;
}

export function splitText(unitId: string, text: string, options: ChunkOptions): Chunk[] {
  validateChunkOptions(options);

  if (text.trim() === "") {
    return [];
  }

  const lines = splitLines(text);
  const mode = resolveChunkMode(unitId, options.mode);

  let spans: LineSpan[];
  if (mode === "structure") {
    spans = structureSpans(lines, options.maxSize, options.overlap);
  } else if (mode === "paragraph") {
    spans = paragraphSpans(lines, options.maxSize, options.overlap);
  } else {
    spans = lineWindowSpans(lines, 0, lines.length, options.maxSize, options.overlap);
  }

  return spans
    .filter((entry) => entry.text.trim() !== "")
    .map((entry, index) => ({
      unitId,
      index,
      text: entry.text,
      label: entry.label,
      startLine: entry.startLine,
      endLine: entry.endLine
    }));
}

export function splitUnit(unit: SourceUnit, options: ChunkOptions): Chunk[] {
  return splitText(unit.id, unit.text, options);
}
