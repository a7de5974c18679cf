import { promises as fs } from "node:fs";
import path from "node:path";
import { writeTextFileAtomic } from "../../lib/fs-utils.js";
import { logDebug, logWarn, serializeError } from "../../lib/logging.js";
import { FileVerdict } from "../../types.js";
import { ContentCache, isContentHash, readCacheEntry, toCacheEntry } from "./content-cache.js";

/** One `<hash>.json` file per entry under the cache directory. */
export class FileContentCache implements ContentCache {
  readonly kind = "file";
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  entryPath(hash: string): string {
    return path.join(this.directory, `${hash}.json`);
  }

  async get(hash: string): Promise<FileVerdict | null> {
    if (!isContentHash(hash)) {
      return null;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.entryPath(hash), "utf8");
    } catch (error) {
      const code = error instanceof Error && "code" in error ? error.code : undefined;
      if (code !== "ENOENT") {
        logWarn("content_cache_read_failed", { cache: this.kind, hash, error: serializeError(error) });
      }
      return null;
    }

    try {
      const verdict = readCacheEntry(hash, JSON.parse(raw));
      if (!verdict) {
        logWarn("content_cache_entry_invalid", { cache: this.kind, hash });
        return null;
      }
      logDebug("content_cache_hit", { cache: this.kind, hash });
      return verdict;
    } catch (error) {
      logWarn("content_cache_entry_invalid", { cache: this.kind, hash, error: serializeError(error) });
      return null;
    }
  }

  async put(hash: string, verdict: FileVerdict): Promise<void> {
    if (!isContentHash(hash) || verdict.contentHash !== hash) {
      logWarn("content_cache_put_rejected", { cache: this.kind, hash, verdictHash: verdict.contentHash });
      return;
    }

    try {
      await writeTextFileAtomic(this.entryPath(hash), `${JSON.stringify(toCacheEntry(verdict), null, 2)}\n`);
    } catch (error) {
      logWarn("content_cache_write_failed", { cache: this.kind, hash, error: serializeError(error) });
    }
  }
}
