import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import test, { TestContext } from "node:test";
import { HashingEmbeddingProvider } from "../../lib/embeddings.js";
import { Transformer } from "../../lib/providers.js";
import { FileContentCache } from "../cache/file-content-cache.js";
import { ContentCache } from "../cache/content-cache.js";
import { ChunkOptions } from "../chunking/chunker.js";
import { defaultMergeStrategy } from "../merge/merge-strategy.js";
import { FileOutputWriter, OutputWriter } from "../output-writer.js";
import { RefactorPipeline } from "../pipeline.js";
import { ContextAssembler } from "../retrieval/context-assembler.js";
import { RagService } from "../retrieval/rag-service.js";
import { InMemoryReferenceIndex } from "../retrieval/reference-index.js";
import { createSourceUnit } from "../source-unit.js";
import { fallbackAnnotation } from "../validation/validation-loop.js";
import { MemoryContentCache, MemoryOutputWriter } from "./helpers/memory-stores.js";
import { RoutingTransformer, ScriptedTransformer, verdictText } from "./helpers/scripted-transformer.js";

const lines = (...parts: string[]): string => parts.join("\n");

function pipelineFor(
  transformer: Transformer,
  cache: ContentCache,
  writer: OutputWriter,
  chunk: ChunkOptions,
  extra: { chunkConcurrency?: number; rag?: RagService; maxAttempts?: number } = {}
): RefactorPipeline {
  return new RefactorPipeline(
    {
      transformer,
      cache,
      writer,
      contextAssembler: new ContextAssembler(extra.rag ?? null, { queryCharLimit: 0, queryPrefix: "" }),
      rag: extra.rag ?? null
    },
    {
      chunk,
      maxAttempts: extra.maxAttempts ?? 3,
      chunkConcurrency: extra.chunkConcurrency ?? 2,
      topK: 2,
      mergeStrategy: defaultMergeStrategy,
      indexProcessedFiles: extra.rag !== undefined
    }
  );
}

class OfflineContextAssembler extends ContextAssembler {
  constructor() {
    super(null, { queryCharLimit: 0, queryPrefix: "" });
  }

  async assemble(): Promise<string> {
    throw new Error("reference index offline");
  }
}

function chunkIndexOf(section: string): number {
  const match = /#(\d+)\) ===/.exec(section);
  return match ? Number(match[1]) : -1;
}

async function tempDir(t: TestContext): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "arch-repair-pipeline-"));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  return dir;
}

test("a corrected chunk is aggregated after a clean one and merged into the file", async () => {
  const unit = createSourceUnit(
    "src/pricing.ts",
    lines(
      "export const rate = 2;",
      "export function price(q: number) {",
      '  if (q > stock) throw new Error("no stock");',
      "  return db.price(q);",
      "}",
      ""
    )
  );
  const correctedFix = lines("export function price(q: number) {", "  return pricing.quote(q);", "}");

  let pricingAttempts = 0;
  const transformer = new RoutingTransformer((section) => {
    if (chunkIndexOf(section) === 0) {
      return { ok: true, text: verdictText(false, "constant only") };
    }
    pricingAttempts += 1;
    return pricingAttempts === 1
      ? { ok: true, text: "The function reads the database directly." }
      : { ok: true, text: verdictText(true, "domain check in infrastructure", correctedFix) };
  });

  const cache = new MemoryContentCache();
  const writer = new MemoryOutputWriter();
  const outcome = await pipelineFor(transformer, cache, writer, { maxSize: 10, overlap: 0, mode: "structure" }).processUnit(
    unit
  );

  assert.deepEqual(outcome, {
    unitId: "src/pricing.ts",
    contentHash: unit.contentHash,
    cacheHit: false,
    violation: true,
    chunkCount: 2,
    exhaustedChunks: 0,
    mergeStatus: "merged",
    outputPath: "out/src/pricing.ts",
    reasons: ["chunk 0 => no violation", "chunk 1 => domain check in infrastructure"]
  });
  assert.equal(transformer.calls, 3);
  assert.equal(
    cache.entries.get(unit.contentHash)?.aggregatedFix,
    `//--- chunk 0 => no violation\n//--- fix for chunk 1 ---\n${correctedFix}\n`
  );
  assert.equal(
    writer.written.get("src/pricing.ts"),
    lines("export const rate = 2;", "export function price(q: number) {", "  return db.price(q);", "}", "")
  );
});

test("a chunk whose replies never validate ends in the annotated fallback", async () => {
  const unit = createSourceUnit("src/legacy.ts", "export const legacy = load();\n");
  const transformer = new RoutingTransformer(() => ({ ok: true, text: "{ not json" }));
  const cache = new MemoryContentCache();
  const writer = new MemoryOutputWriter();

  const outcome = await pipelineFor(transformer, cache, writer, { maxSize: 10, overlap: 0, mode: "line" }).processUnit(unit);

  assert.equal(transformer.calls, 3);
  assert.equal(outcome.violation, true);
  assert.equal(outcome.exhaustedChunks, 1);
  assert.equal(outcome.mergeStatus, "unmerged");
  assert.ok(outcome.reasons[0].startsWith("chunk 0 => max attempts reached (3): malformed verdict: "));

  const stored = cache.entries.get(unit.contentHash);
  assert.equal(stored?.chunks[0].kind, "exhausted");
  assert.equal(stored?.chunks[0].fix, `${fallbackAnnotation}\n/*\nexport const legacy = load();\n*/`);
});

test("an unchanged file is served from the cache with byte-identical output", async (t) => {
  const dir = await tempDir(t);
  const unitText = lines(
    "export class InventoryService {",
    "  directDbCall(): void {",
    '    db.query("select 1");',
    "  }",
    "",
    "  count(): number {",
    "    return this.items.length;",
    "  }",
    "}",
    ""
  );
  const fix = lines("export class InventoryService {", "  count(): number {", "    return this.items.length;", "  }", "}");
  const transformer = new RoutingTransformer(() => ({ ok: true, text: verdictText(true, "persistence in service", fix) }));

  const cache = new FileContentCache(path.join(dir, "cache"));
  const writer = new FileOutputWriter(path.join(dir, "out"));
  const pipeline = pipelineFor(transformer, cache, writer, { maxSize: 300, overlap: 0, mode: "line" });
  const unit = createSourceUnit("src/inventory-service.ts", unitText);

  const first = await pipeline.processUnit(unit);
  assert.equal(first.cacheHit, false);
  assert.equal(first.outputPath, path.join(dir, "out", "src", "inventory-service.ts"));
  const firstBytes = await fs.readFile(path.join(dir, "out", "src", "inventory-service.ts"));
  assert.equal(
    firstBytes.toString("utf8"),
    lines("export class InventoryService {", "", "  count(): number {", "    return this.items.length;", "  }", "}", "")
  );
  assert.equal(transformer.calls, 1);

  await fs.rm(path.join(dir, "out"), { recursive: true });
  const second = await pipeline.processUnit(createSourceUnit("src/inventory-service.ts", unitText));
  assert.equal(second.cacheHit, true);
  assert.equal(transformer.calls, 1);
  assert.deepEqual(await fs.readFile(path.join(dir, "out", "src", "inventory-service.ts")), firstBytes);

  const edited = await pipeline.processUnit(createSourceUnit("src/inventory-service.ts", `${unitText} `));
  assert.equal(edited.cacheHit, false);
  assert.equal(transformer.calls, 2);
});

test("chunk verdicts keep their order when chunks finish out of order", async () => {
  const source = Array.from({ length: 6 }, (_, index) => `export const v${index} = ${index};`).join("\n");
  const transformer = new RoutingTransformer(async (section) => {
    const index = chunkIndexOf(section);
    await new Promise((resolve) => setTimeout(resolve, (6 - index) * 5));
    return { ok: true, text: verdictText(true, `constant ${index}`, `export const v${index} = ${index * 2};`) };
  });
  const cache = new MemoryContentCache();
  const unit = createSourceUnit("src/constants.ts", source);

  await pipelineFor(transformer, cache, new MemoryOutputWriter(), { maxSize: 1, overlap: 0, mode: "line" }, {
    chunkConcurrency: 4
  }).processUnit(unit);

  const expected = Array.from(
    { length: 6 },
    (_, index) => `//--- fix for chunk ${index} ---\nexport const v${index} = ${index * 2};\n`
  ).join("");
  assert.equal(cache.entries.get(unit.contentHash)?.aggregatedFix, expected);
  assert.deepEqual(
    cache.entries.get(unit.contentHash)?.reasons,
    Array.from({ length: 6 }, (_, index) => `chunk ${index} => constant ${index}`)
  );
});

test("a clean file is cached but not written", async () => {
  const transformer = new RoutingTransformer(() => ({ ok: true, text: verdictText(false, "fine") }));
  const cache = new MemoryContentCache();
  const writer = new MemoryOutputWriter();
  const unit = createSourceUnit("src/clean.ts", "export const ok = true;\n");

  const outcome = await pipelineFor(transformer, cache, writer, { maxSize: 10, overlap: 0, mode: "line" }).processUnit(unit);

  assert.equal(outcome.violation, false);
  assert.equal(outcome.mergeStatus, null);
  assert.equal(outcome.outputPath, null);
  assert.equal(writer.written.size, 0);
  assert.equal(cache.entries.size, 1);
});

test("a cancelled unit caches and writes nothing", async () => {
  const transformer = new RoutingTransformer(() => ({ ok: true, text: verdictText(false, "fine") }));
  const cache = new MemoryContentCache();
  const writer = new MemoryOutputWriter();
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(
    pipelineFor(transformer, cache, writer, { maxSize: 10, overlap: 0, mode: "line" }).processUnit(
      createSourceUnit("src/a.ts", "export const a = 1;\n"),
      controller.signal
    )
  );
  assert.equal(transformer.calls, 0);
  assert.equal(cache.puts, 0);
  assert.equal(writer.written.size, 0);
});

test("processed files and their fixes are indexed when enabled", async () => {
  const index = new InMemoryReferenceIndex();
  const rag = new RagService({ index, embedder: new HashingEmbeddingProvider() });
  const transformer = new RoutingTransformer(() => ({
    ok: true,
    text: verdictText(true, "rename", "export const total = sum(items);")
  }));

  await pipelineFor(transformer, new MemoryContentCache(), new MemoryOutputWriter(), { maxSize: 10, overlap: 0, mode: "line" }, {
    rag
  }).processUnit(createSourceUnit("src/total.ts", "export const total = add(items);\n"));

  assert.deepEqual(
    index
      .snapshot()
      .map((snippet) => snippet.metadata.title)
      .sort(),
    ["src/total.ts", "src/total.ts (suggested fix)"]
  );
});

test("throwing collaborators still yield a fallback verdict and an annotated output", async () => {
  const unit = createSourceUnit("src/legacy.ts", "export const legacy = load();\n");
  const transformer = new ScriptedTransformer([], async () => {
    throw new Error("socket hang up");
  });
  const cache = new MemoryContentCache();
  const writer = new MemoryOutputWriter();
  const pipeline = new RefactorPipeline(
    { transformer, cache, writer, contextAssembler: new OfflineContextAssembler() },
    {
      chunk: { maxSize: 10, overlap: 0, mode: "line" },
      maxAttempts: 2,
      chunkConcurrency: 1,
      topK: 2,
      mergeStrategy: defaultMergeStrategy
    }
  );

  const outcome = await pipeline.processUnit(unit);

  assert.equal(transformer.requests.length, 2);
  assert.equal(outcome.violation, true);
  assert.equal(outcome.exhaustedChunks, 1);
  assert.equal(outcome.mergeStatus, "unmerged");
  assert.deepEqual(outcome.reasons, ["chunk 0 => max attempts reached (2): transformer unavailable: socket hang up"]);
  assert.equal(cache.entries.get(unit.contentHash)?.chunks[0].kind, "exhausted");
  assert.ok(writer.written.has("src/legacy.ts"));
});
