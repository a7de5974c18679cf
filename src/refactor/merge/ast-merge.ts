import ts from "typescript";
import { parseSource } from "../validation/structural-parser.js";
import { MergeStrategy, mentionsDomainKeyword, removesMember } from "./merge-strategy.js";
import { TextSplice, applySplices, indentationAt, wholeLineRange } from "./splices.js";

type MergeableDeclaration =
  | ts.ClassDeclaration
  | ts.FunctionDeclaration
  | ts.InterfaceDeclaration
  | ts.EnumDeclaration;

export type AstMergeOutcome =
  | { ok: true; text: string; mergedDeclarations: string[] }
  | { ok: false; reason: string };

function isMergeableDeclaration(node: ts.Node): node is MergeableDeclaration {
  return (
    ts.isClassDeclaration(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isEnumDeclaration(node)
  );
}

function declarationKind(node: MergeableDeclaration): string {
  if (ts.isClassDeclaration(node)) {
    return "class";
  }
  if (ts.isFunctionDeclaration(node)) {
    return "function";
  }
  if (ts.isInterfaceDeclaration(node)) {
    return "interface";
  }
  return "enum";
}

function topLevelDeclarations(sourceFile: ts.SourceFile): Map<string, MergeableDeclaration> {
  const declarations = new Map<string, MergeableDeclaration>();
  for (const statement of sourceFile.statements) {
    if (!isMergeableDeclaration(statement) || !statement.name) {
      continue;
    }
    const key = `${declarationKind(statement)}:${statement.name.text}`;
    if (!declarations.has(key)) {
      declarations.set(key, statement);
    }
  }
  return declarations;
}

export function memberName(member: ts.ClassElement | ts.TypeElement): string | null {
  if (ts.isConstructorDeclaration(member)) {
    return "constructor";
  }
  const name = member.name;
  if (!name) {
    return null;
  }
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return null;
}

function functionBody(node: ts.Node): ts.Block | undefined {
  if (
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node) ||
    ts.isFunctionDeclaration(node)
  ) {
    return node.body;
  }
  return undefined;
}

function removalSplice(text: string, sourceFile: ts.SourceFile, node: ts.Node): TextSplice {
  const range = wholeLineRange(text, node.getStart(sourceFile, true), node.getEnd());
  return { start: range.start, end: range.end, text: "" };
}

function keywordCheckSplices(
  text: string,
  sourceFile: ts.SourceFile,
  body: ts.Block | undefined,
  strategy: MergeStrategy
): TextSplice[] {
  if (!body || strategy.domainKeywords.length === 0) {
    return [];
  }

  return body.statements
    .filter(
      (statement): statement is ts.IfStatement =>
        ts.isIfStatement(statement) &&
        mentionsDomainKeyword(statement.expression.getText(sourceFile), strategy.domainKeywords)
    )
    .map((statement) => removalSplice(text, sourceFile, statement));
}

function memberInsertion(
  text: string,
  originalClass: ts.ClassDeclaration,
  fixSource: ts.SourceFile,
  additions: ts.ClassElement[]
): TextSplice | null {
  if (additions.length === 0) {
    return null;
  }

  const closeBrace = originalClass.getEnd() - 1;
  const lineStart = text.lastIndexOf("\n", closeBrace - 1) + 1;
  const onOwnLine = text.slice(lineStart, closeBrace).trim() === "";
  const closingIndent = onOwnLine ? text.slice(lineStart, closeBrace) : "";
  const firstMember = originalClass.members[0];
  const originalSource = originalClass.getSourceFile();
  const memberIndent = firstMember ? indentationAt(text, firstMember.getStart(originalSource)) || `${closingIndent}  ` : `${closingIndent}  `;

  const body = additions.map((member) => `${memberIndent}${member.getText(fixSource)}`).join("\n\n");
  if (onOwnLine) {
    return { start: lineStart, end: lineStart, text: `\n${body}\n` };
  }
  return { start: closeBrace, end: closeBrace, text: `\n${body}\n` };
}

function mergeClass(
  text: string,
  sourceFile: ts.SourceFile,
  original: ts.ClassDeclaration,
  fixSource: ts.SourceFile,
  fix: ts.ClassDeclaration,
  strategy: MergeStrategy
): TextSplice[] {
  const splices: TextSplice[] = [];
  const originalNames = new Set<string>();

  for (const member of original.members) {
    const name = memberName(member);
    if (name !== null) {
      originalNames.add(name);
    }

    if (name !== null && removesMember(strategy, name)) {
      splices.push(removalSplice(text, sourceFile, member));
      continue;
    }
    splices.push(...keywordCheckSplices(text, sourceFile, functionBody(member), strategy));
  }

  const additions = fix.members.filter((member) => {
    const name = memberName(member);
    if (name === null || originalNames.has(name) || removesMember(strategy, name)) {
      return false;
    }
    return ts.isMethodDeclaration(member) || ts.isPropertyDeclaration(member) || ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member);
  });

  const seen = new Set<string>();
  const uniqueAdditions = additions.filter((member) => {
    const name = `${member.kind}:${memberName(member) ?? ""}`;
    if (seen.has(name)) {
      return false;
    }
    seen.add(name);
    return true;
  });

  const insertion = memberInsertion(text, original, fixSource, uniqueAdditions);
  if (insertion) {
    splices.push(insertion);
  }
  return splices;
}

function mergeInterface(
  text: string,
  sourceFile: ts.SourceFile,
  original: ts.InterfaceDeclaration,
  strategy: MergeStrategy
): TextSplice[] {
  return original.members
    .filter((member) => {
      const name = memberName(member);
      return name !== null && removesMember(strategy, name);
    })
    .map((member) => removalSplice(text, sourceFile, member));
}

/**
 * Merges declarations of `fixText` into `originalText` by name. Only the
 * original's text is edited; the result must parse again.
 */
export function mergeByDeclaration(
  originalText: string,
  fixText: string,
  fileName: string,
  strategy: MergeStrategy
): AstMergeOutcome {
  const original = parseSource(originalText, fileName);
  if (!original.ok) {
    return { ok: false, reason: `original does not parse: ${original.error.message}` };
  }
  const fix = parseSource(fixText, fileName);
  if (!fix.ok) {
    return { ok: false, reason: `fix does not parse: ${fix.error.line}:${fix.error.column} ${fix.error.message}` };
  }

  const originalDeclarations = topLevelDeclarations(original.sourceFile);
  const splices: TextSplice[] = [];
  const mergedDeclarations: string[] = [];

  for (const [key, fixDeclaration] of topLevelDeclarations(fix.sourceFile)) {
    const target = originalDeclarations.get(key);
    if (!target) {
      continue;
    }

    if (ts.isClassDeclaration(target) && ts.isClassDeclaration(fixDeclaration)) {
      splices.push(...mergeClass(originalText, original.sourceFile, target, fix.sourceFile, fixDeclaration, strategy));
    } else if (ts.isInterfaceDeclaration(target)) {
      splices.push(...mergeInterface(originalText, original.sourceFile, target, strategy));
    } else if (ts.isFunctionDeclaration(target)) {
      splices.push(...keywordCheckSplices(originalText, original.sourceFile, target.body, strategy));
    }
    mergedDeclarations.push(key.slice(key.indexOf(":") + 1));
  }

  if (mergedDeclarations.length === 0) {
    return { ok: false, reason: "no declaration of the fix matches a declaration of the original" };
  }

  const merged = applySplices(originalText, splices);
  const reparsed = parseSource(merged, fileName);
  if (!reparsed.ok) {
    return { ok: false, reason: `merged text does not parse: ${reparsed.error.message}` };
  }

  return { ok: true, text: merged, mergedDeclarations };
}
