import { MergeStrategy } from "./merge-strategy.js";
import { TextSplice, applySplices, indentationAt, wholeLineRange } from "./splices.js";

export const removedMemberNote = (name: string): string => `// arch-repair: removed ${name}`;
export const removedCheckNote = "// arch-repair: removed domain check";

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Index just past the bracket matching `text[openIndex]`, skipping string
 * literals and comments. Returns -1 when unbalanced.
 */
export function findMatchingBracket(text: string, openIndex: number): number {
  const open = text[openIndex];
  const close = open === "(" ? ")" : open === "[" ? "]" : "}";
  let depth = 0;
  let index = openIndex;

  while (index < text.length) {
    const char = text[index];
    const next = text[index + 1];

    if (char === "/" && next === "/") {
      const lineEnd = text.indexOf("\n", index);
      index = lineEnd < 0 ? text.length : lineEnd;
      continue;
    }
    if (char === "/" && next === "*") {
      const commentEnd = text.indexOf("*/", index + 2);
      index = commentEnd < 0 ? text.length : commentEnd + 2;
      continue;
    }
    if (char === '"' || char === "'" || char === "`") {
      index += 1;
      while (index < text.length && text[index] !== char) {
        index += text[index] === "\\" ? 2 : 1;
      }
      index += 1;
      continue;
    }

    if (char === open) {
      depth += 1;
    } else if (char === close) {
      depth -= 1;
      if (depth === 0) {
        return index + 1;
      }
    }
    index += 1;
  }

  return -1;
}

function skipWhitespace(text: string, index: number): number {
  let cursor = index;
  while (cursor < text.length && /\s/.test(text[cursor])) {
    cursor += 1;
  }
  return cursor;
}

function memberRemovalSplices(text: string, name: string): TextSplice[] {
  const pattern = new RegExp(
    `^[ \\t]*(?:export\\s+)?(?:(?:public|private|protected|static|async|override|function)\\s+)*${escapeRegExp(name)}\\s*(?:<[^>\\n]*>)?\\s*\\(`,
    "gm"
  );
  const splices: TextSplice[] = [];

  for (const match of text.matchAll(pattern)) {
    const matchStart = match.index ?? 0;
    const paramsOpen = matchStart + match[0].length - 1;
    const paramsEnd = findMatchingBracket(text, paramsOpen);
    if (paramsEnd < 0) {
      continue;
    }

    const bodyOpen = text.indexOf("{", paramsEnd);
    const statementEnd = text.indexOf(";", paramsEnd);
    if (bodyOpen < 0 || (statementEnd >= 0 && statementEnd < bodyOpen)) {
      continue;
    }

    const bodyEnd = findMatchingBracket(text, bodyOpen);
    if (bodyEnd < 0) {
      continue;
    }

    const declarationStart = skipWhitespace(text, matchStart);
    const range = wholeLineRange(text, declarationStart, bodyEnd);
    const indent = indentationAt(text, declarationStart);
    const trailing = range.end > bodyEnd ? "\n" : "";
    splices.push({ start: range.start, end: range.end, text: `${indent}${removedMemberNote(name)}${trailing}` });
  }

  return splices;
}

function keywordCheckSplices(text: string, keywords: readonly string[]): TextSplice[] {
  if (keywords.length === 0) {
    return [];
  }

  const keywordPattern = new RegExp(`\\b(?:${keywords.map(escapeRegExp).join("|")})\\b`, "i");
  const splices: TextSplice[] = [];

  for (const match of text.matchAll(/\bif\s*\(/g)) {
    const ifStart = match.index ?? 0;
    const conditionOpen = ifStart + match[0].length - 1;
    const conditionEnd = findMatchingBracket(text, conditionOpen);
    if (conditionEnd < 0 || !keywordPattern.test(text.slice(conditionOpen, conditionEnd))) {
      continue;
    }

    const bodyStart = skipWhitespace(text, conditionEnd);
    let statementEnd: number;
    if (text[bodyStart] === "{") {
      statementEnd = findMatchingBracket(text, bodyStart);
    } else {
      const semicolon = text.indexOf(";", bodyStart);
      statementEnd = semicolon < 0 ? -1 : semicolon + 1;
    }
    if (statementEnd < 0) {
      continue;
    }

    // if/else chains are left in place
    if (/^else\b/.test(text.slice(skipWhitespace(text, statementEnd)))) {
      continue;
    }
    if (/\belse\s*$/.test(text.slice(0, ifStart))) {
      continue;
    }

    splices.push({ start: ifStart, end: statementEnd, text: removedCheckNote });
  }

  return dropNested(splices);
}

function dropNested(splices: TextSplice[]): TextSplice[] {
  const ordered = [...splices].sort((left, right) => left.start - right.start || right.end - left.end);
  const kept: TextSplice[] = [];
  let reach = -1;

  for (const splice of ordered) {
    if (splice.start < reach) {
      continue;
    }
    kept.push(splice);
    reach = splice.end;
  }
  return kept;
}

/**
 * Pattern-based rendition of the merge rules, used when the structural merge
 * is not possible. Works on unparseable text as well.
 */
export function applyHeuristicEdits(text: string, strategy: MergeStrategy): string {
  const removals = dropNested(strategy.memberRemovals.flatMap((name) => memberRemovalSplices(text, name)));
  const withoutMembers = applySplices(text, removals);
  return applySplices(withoutMembers, keywordCheckSplices(withoutMembers, strategy.domainKeywords));
}
