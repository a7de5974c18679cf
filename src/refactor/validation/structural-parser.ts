import path from "node:path";
import ts from "typescript";

export interface ParseError {
  message: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export type ParseResult = { ok: true; sourceFile: ts.SourceFile } | { ok: false; error: ParseError };

export function getScriptKind(filePath: string): ts.ScriptKind {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".tsx") {
    return ts.ScriptKind.TSX;
  }
  if (ext === ".jsx") {
    return ts.ScriptKind.JSX;
  }
  if (ext === ".js" || ext === ".mjs" || ext === ".cjs") {
    return ts.ScriptKind.JS;
  }
  return ts.ScriptKind.TS;
}

function parserFileName(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const known = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];
  return known.includes(ext) ? fileName : `${fileName}.ts`;
}

function describeDiagnostic(diagnostic: ts.Diagnostic, fallback: ts.SourceFile): ParseError {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  const file = diagnostic.file ?? fallback;
  const position = file.getLineAndCharacterOfPosition(diagnostic.start ?? 0);
  return {
    message,
    line: position.line + 1,
    column: position.character + 1
  };
}

/**
 * Syntax-only acceptance check. Type errors are not reported; the first
 * syntactic diagnostic (in source order) is.
 */
export function parseSource(text: string, fileName = "snippet.ts"): ParseResult {
  const normalizedName = parserFileName(fileName);
  const sourceFile = ts.createSourceFile(normalizedName, text, ts.ScriptTarget.Latest, true, getScriptKind(normalizedName));

  const output = ts.transpileModule(text, {
    fileName: normalizedName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
      jsx: ts.JsxEmit.Preserve,
      noLib: true,
      noResolve: true
    }
  });

  const diagnostics = (output.diagnostics ?? [])
    .filter((diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error)
    .sort((left, right) => (left.start ?? 0) - (right.start ?? 0));

  if (diagnostics.length > 0) {
    return { ok: false, error: describeDiagnostic(diagnostics[0], sourceFile) };
  }

  return { ok: true, sourceFile };
}

export function isParseable(text: string, fileName?: string): boolean {
  return parseSource(text, fileName).ok;
}

export function formatParseError(error: ParseError): string {
  return `${error.line}:${error.column} ${error.message}`;
}
