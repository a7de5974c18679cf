import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test, { TestContext } from "node:test";
import { InMemoryReferenceIndex } from "../reference-index.js";
import { decodeEmbedding, encodeEmbedding, loadIndexSnapshot, saveIndexSnapshot } from "../reference-index-store.js";

async function tempDir(t: TestContext): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "arch-repair-index-"));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  return dir;
}

test("embedding encoding keeps float32 values", () => {
  assert.deepEqual(decodeEmbedding(encodeEmbedding([0.5, -1.25, 0])), [0.5, -1.25, 0]);
  assert.equal(decodeEmbedding(Buffer.from([1, 2, 3]).toString("base64")), null);
});

test("index snapshots survive a save and load", async (t) => {
  const dir = await tempDir(t);
  const storePath = path.join(dir, "nested", "index.json");
  const meta = { modelName: "hashing-2", dimension: 2 };

  const index = new InMemoryReferenceIndex([
    { id: "a", embedding: [0.5, 0.25], metadata: { title: "A", content: "alpha", tags: ["x"] } },
    { id: "b", embedding: [1, 0], metadata: {} }
  ]);
  assert.equal(await saveIndexSnapshot(storePath, index, meta), 2);

  const loaded = await loadIndexSnapshot(storePath, meta);
  assert.deepEqual(loaded.snapshot(), index.snapshot());
});

test("loadIndexSnapshot starts empty for missing, corrupt or incompatible files", async (t) => {
  const dir = await tempDir(t);
  const meta = { modelName: "hashing-2", dimension: 2 };

  assert.equal(await (await loadIndexSnapshot(path.join(dir, "missing.json"), meta)).size(), 0);

  const corrupt = path.join(dir, "corrupt.json");
  await fs.writeFile(corrupt, "{not json", "utf8");
  assert.equal(await (await loadIndexSnapshot(corrupt, meta)).size(), 0);

  const stored = path.join(dir, "stored.json");
  await saveIndexSnapshot(stored, new InMemoryReferenceIndex([{ id: "a", embedding: [1, 0], metadata: {} }]), meta);
  assert.equal(await (await loadIndexSnapshot(stored, { modelName: "other", dimension: 2 })).size(), 0);
  assert.equal(await (await loadIndexSnapshot(stored, { modelName: "hashing-2", dimension: 3 })).size(), 0);
  assert.equal(await (await loadIndexSnapshot(stored, meta)).size(), 1);
});
