import pg from "pg";
import type { QueryResultRow } from "pg";
import { logDebug, logWarn, serializeError } from "../../lib/logging.js";
import { FileVerdict } from "../../types.js";
import { ContentCache, isContentHash, readCacheEntry, toCacheEntry } from "./content-cache.js";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

export const verdictCacheTable = "arch_repair_verdict_cache";

const schemaSql = `
CREATE TABLE IF NOT EXISTS ${verdictCacheTable} (
  content_hash TEXT PRIMARY KEY,
  entry JSONB NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

export interface PostgresPoolOptions {
  databaseUrl: string;
  ssl?: "require" | "disable";
  rejectUnauthorized?: boolean;
}

export function createPostgresPool(options: PostgresPoolOptions): pg.Pool {
  return new pg.Pool({
    connectionString: options.databaseUrl,
    ssl:
      options.ssl === "require"
        ? {
            rejectUnauthorized: options.rejectUnauthorized !== false
          }
        : undefined
  });
}

export class PostgresContentCache implements ContentCache {
  readonly kind = "postgres";
  private readonly db: Queryable;
  private readonly onClose: (() => Promise<void>) | null;

  constructor(db: Queryable, onClose: (() => Promise<void>) | null = null) {
    this.db = db;
    this.onClose = onClose;
  }

  static fromPool(pool: pg.Pool): PostgresContentCache {
    const db: Queryable = {
      query: (text: string, values?: unknown[]) => pool.query(text, values)
    };
    return new PostgresContentCache(db, () => pool.end());
  }

  async initialize(): Promise<void> {
    await this.db.query(schemaSql);
  }

  async close(): Promise<void> {
    if (this.onClose) {
      await this.onClose();
    }
  }

  async get(hash: string): Promise<FileVerdict | null> {
    if (!isContentHash(hash)) {
      return null;
    }

    try {
      const result = await this.db.query(`SELECT entry FROM ${verdictCacheTable} WHERE content_hash = $1`, [hash]);
      const row = result.rows[0];
      if (!row) {
        return null;
      }

      const entry: unknown = row.entry;
      const payload: unknown = typeof entry === "string" ? JSON.parse(entry) : entry;
      const verdict = readCacheEntry(hash, payload);
      if (!verdict) {
        logWarn("content_cache_entry_invalid", { cache: this.kind, hash });
        return null;
      }

      logDebug("content_cache_hit", { cache: this.kind, hash });
      return verdict;
    } catch (error) {
      logWarn("content_cache_read_failed", { cache: this.kind, hash, error: serializeError(error) });
      return null;
    }
  }

  async put(hash: string, verdict: FileVerdict): Promise<void> {
    if (!isContentHash(hash) || verdict.contentHash !== hash) {
      logWarn("content_cache_put_rejected", { cache: this.kind, hash, verdictHash: verdict.contentHash });
      return;
    }

    try {
      await this.db.query(
        `INSERT INTO ${verdictCacheTable} (content_hash, entry)
         VALUES ($1, $2::jsonb)
         ON CONFLICT (content_hash) DO UPDATE
         SET entry = EXCLUDED.entry,
             updated_at = NOW()`,
        [hash, JSON.stringify(toCacheEntry(verdict))]
      );
    } catch (error) {
      logWarn("content_cache_write_failed", { cache: this.kind, hash, error: serializeError(error) });
    }
  }
}
