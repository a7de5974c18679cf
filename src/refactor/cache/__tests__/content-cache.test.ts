import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test, { TestContext } from "node:test";
import type { QueryResultRow } from "pg";
import { sha256Hex } from "../../../lib/hashing.js";
import { FileVerdict } from "../../../types.js";
import { DisabledContentCache, readCacheEntry, toCacheEntry } from "../content-cache.js";
import { FileContentCache } from "../file-content-cache.js";
import { PostgresContentCache, Queryable, verdictCacheTable } from "../postgres-content-cache.js";

function verdictFor(text: string): FileVerdict {
  return {
    unitId: "src/order-service.ts",
    contentHash: sha256Hex(text),
    violation: true,
    chunks: [{ kind: "accepted", chunkIndex: 0, violation: true, reason: "db call", fix: "const a = 1;", attempts: 1 }],
    aggregatedFix: "//--- fix for chunk 0 ---\nconst a = 1;\n",
    reasons: ["chunk 0 => db call"]
  };
}

async function tempDir(t: TestContext): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "arch-repair-cache-"));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  return dir;
}

/** Answers the three statements the Postgres cache issues. */
class FakeQueryable implements Queryable {
  readonly statements: string[] = [];
  readonly rows = new Map<string, string>();
  failing = false;

  async query(text: string, values: unknown[] = []): Promise<{ rows: QueryResultRow[] }> {
    this.statements.push(text.trim().split(/\s+/)[0] ?? "");
    if (this.failing) {
      throw new Error("connection refused");
    }

    const [hash, entry] = values;
    if (text.includes("CREATE TABLE")) {
      return { rows: [] };
    }
    if (text.startsWith("SELECT") && typeof hash === "string") {
      const stored = this.rows.get(hash);
      return { rows: stored === undefined ? [] : [{ entry: JSON.parse(stored) }] };
    }
    if (text.startsWith("INSERT") && typeof hash === "string" && typeof entry === "string") {
      this.rows.set(hash, entry);
      return { rows: [] };
    }
    throw new Error(`unexpected statement: ${text}`);
  }
}

test("cache entries only match their own content hash", () => {
  const verdict = verdictFor("class A {}");
  const entry = toCacheEntry(verdict);
  assert.deepEqual(readCacheEntry(verdict.contentHash, entry), verdict);
  assert.equal(readCacheEntry(sha256Hex("class B {}"), entry), null);
  assert.equal(readCacheEntry(verdict.contentHash, { version: 2, verdict }), null);
});

test("FileContentCache stores one entry per hash and is idempotent", async (t) => {
  const dir = await tempDir(t);
  const cache = new FileContentCache(dir);
  const verdict = verdictFor("class A {}");

  assert.equal(await cache.get(verdict.contentHash), null);
  await cache.put(verdict.contentHash, verdict);
  await cache.put(verdict.contentHash, verdict);

  assert.deepEqual(await cache.get(verdict.contentHash), verdict);
  assert.deepEqual(await fs.readdir(dir), [`${verdict.contentHash}.json`]);
});

test("FileContentCache is sensitive to single-byte changes", async (t) => {
  const dir = await tempDir(t);
  const cache = new FileContentCache(dir);
  const verdict = verdictFor("class A {}");
  await cache.put(verdict.contentHash, verdict);

  assert.equal(await cache.get(sha256Hex("class A {} ")), null);
  assert.equal(await cache.get(sha256Hex("class a {}")), null);
});

test("FileContentCache treats corrupt or mismatched entries as misses", async (t) => {
  const dir = await tempDir(t);
  const cache = new FileContentCache(dir);
  const verdict = verdictFor("class A {}");

  await fs.writeFile(cache.entryPath(verdict.contentHash), "{broken", "utf8");
  assert.equal(await cache.get(verdict.contentHash), null);

  const other = sha256Hex("class B {}");
  await cache.put(other, verdict);
  assert.equal(await cache.get(other), null);
  assert.equal(await cache.get("not-a-hash"), null);
});

test("PostgresContentCache upserts and reads entries", async () => {
  const db = new FakeQueryable();
  const cache = new PostgresContentCache(db);
  const verdict = verdictFor("class A {}");

  await cache.initialize();
  assert.equal(await cache.get(verdict.contentHash), null);
  await cache.put(verdict.contentHash, verdict);
  await cache.put(verdict.contentHash, verdict);

  assert.deepEqual(await cache.get(verdict.contentHash), verdict);
  assert.equal(db.rows.size, 1);
  assert.deepEqual(db.statements, ["CREATE", "SELECT", "INSERT", "INSERT", "SELECT"]);
  assert.equal(verdictCacheTable, "arch_repair_verdict_cache");
});

test("PostgresContentCache degrades to misses when the database fails", async () => {
  const db = new FakeQueryable();
  db.failing = true;
  const cache = new PostgresContentCache(db);
  const verdict = verdictFor("class A {}");

  await cache.put(verdict.contentHash, verdict);
  assert.equal(await cache.get(verdict.contentHash), null);
});

test("DisabledContentCache never stores anything", async () => {
  const cache = new DisabledContentCache();
  const verdict = verdictFor("class A {}");
  await cache.put(verdict.contentHash, verdict);
  assert.equal(await cache.get(verdict.contentHash), null);
});
