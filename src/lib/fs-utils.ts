import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

export interface DiscoveredFile {
  absolutePath: string;
  relativePath: string;
}

export interface CollectFilesOptions {
  extensions: string[];
  excludedDirs?: string[];
}

export const defaultExcludedDirs = ["node_modules", ".git", "dist", "build", "coverage", ".cache"];

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export function normalizeToPosix(value: string): string {
  return value.replaceAll("\\", "/");
}

export function safeResolvePath(rootDir: string, relativePath: string): string {
  const normalized = relativePath.replace(/^\/+/, "");
  const candidate = path.resolve(rootDir, normalized);
  const safeRoot = `${path.resolve(rootDir)}${path.sep}`;

  if (candidate !== path.resolve(rootDir) && !candidate.startsWith(safeRoot)) {
    throw new Error(`Unsafe path: ${relativePath}`);
  }

  return candidate;
}

export async function readTextFile(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

/**
 * Writes through a sibling temp file and renames it into place, so concurrent
 * readers see either the previous content or the complete new content.
 */
export async function writeTextFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;

  try {
    await fs.writeFile(tempPath, content, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw error;
  }
}

export function compareNormalizedPaths(left: string, right: string): number {
  const normalizedLeft = normalizeToPosix(left.normalize("NFC"));
  const normalizedRight = normalizeToPosix(right.normalize("NFC"));

  if (normalizedLeft < normalizedRight) {
    return -1;
  }
  if (normalizedLeft > normalizedRight) {
    return 1;
  }
  return 0;
}

function hasAllowedExtension(filePath: string, extensions: Set<string>): boolean {
  const ext = path.extname(filePath).toLowerCase().replace(/^\./, "");
  return extensions.has(ext);
}

export async function collectFiles(rootDir: string, options: CollectFilesOptions): Promise<DiscoveredFile[]> {
  const root = path.resolve(rootDir);
  const extensions = new Set(options.extensions.map((ext) => ext.toLowerCase().replace(/^\./, "")));
  const excluded = new Set(options.excludedDirs ?? defaultExcludedDirs);
  const files: DiscoveredFile[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (excluded.has(entry.name)) {
        continue;
      }

      const absolute = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(absolute);
        continue;
      }

      if (!entry.isFile() || !hasAllowedExtension(absolute, extensions)) {
        continue;
      }

      files.push({
        absolutePath: absolute,
        relativePath: normalizeToPosix(path.relative(root, absolute))
      });
    }
  }

  try {
    const stat = await fs.stat(root);
    if (stat.isFile()) {
      return hasAllowedExtension(root, extensions)
        ? [{ absolutePath: root, relativePath: path.basename(root) }]
        : [];
    }
    await walk(root);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }

  files.sort((a, b) => compareNormalizedPaths(a.relativePath, b.relativePath));
  return files;
}
