import { promises as fs } from "node:fs";
import path from "node:path";
import { sha256Hex } from "../lib/hashing.js";
import { collectFiles, normalizeToPosix } from "../lib/fs-utils.js";
import { SourceUnit } from "../types.js";

export const scriptExtensions = ["ts", "tsx", "mts", "cts", "js", "jsx", "mjs", "cjs"];

const textExtensions = new Set(["md", "markdown", "txt", "text"]);

function extensionOf(filePath: string): string {
  return path.extname(filePath).toLowerCase().replace(/^\./, "");
}

export function isScriptPath(filePath: string): boolean {
  return scriptExtensions.includes(extensionOf(filePath));
}

export function isProseTextPath(filePath: string): boolean {
  return textExtensions.has(extensionOf(filePath));
}

export function createSourceUnit(id: string, text: string, absolutePath = id): SourceUnit {
  return {
    id: normalizeToPosix(id),
    path: absolutePath,
    text,
    contentHash: sha256Hex(text)
  };
}

export async function readSourceUnit(rootDir: string, absolutePath: string): Promise<SourceUnit> {
  const bytes = await fs.readFile(absolutePath);
  const relative = normalizeToPosix(path.relative(path.resolve(rootDir), path.resolve(absolutePath)));

  return {
    id: relative || path.basename(absolutePath),
    path: absolutePath,
    text: bytes.toString("utf8"),
    contentHash: sha256Hex(bytes)
  };
}

export async function discoverSourceUnits(
  rootDir: string,
  options: { extensions?: string[]; excludedDirs?: string[] } = {}
): Promise<SourceUnit[]> {
  const files = await collectFiles(rootDir, {
    extensions: options.extensions ?? scriptExtensions,
    excludedDirs: options.excludedDirs
  });
  if (files.length === 0) {
    return [];
  }

  const resolvedRoot = path.resolve(rootDir);
  const stat = await fs.stat(resolvedRoot);
  const base = stat.isFile() ? path.dirname(resolvedRoot) : resolvedRoot;

  const units: SourceUnit[] = [];
  for (const file of files) {
    units.push(await readSourceUnit(base, file.absolutePath));
  }
  return units;
}
