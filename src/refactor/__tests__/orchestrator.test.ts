import assert from "node:assert/strict";
import test from "node:test";
import { SourceUnit, UnitOutcome } from "../../types.js";
import { UnitProcessor, runAll, summarizeRun } from "../orchestrator.js";
import { createSourceUnit } from "../source-unit.js";

function outcomeFor(unit: SourceUnit, violation = false): UnitOutcome {
  return {
    unitId: unit.id,
    contentHash: unit.contentHash,
    cacheHit: false,
    violation,
    chunkCount: 1,
    exhaustedChunks: 0,
    mergeStatus: null,
    outputPath: null,
    reasons: []
  };
}

class FakeProcessor implements UnitProcessor {
  readonly finished: string[] = [];
  private readonly behaviour: (unit: SourceUnit, signal?: AbortSignal) => Promise<UnitOutcome>;

  constructor(behaviour: (unit: SourceUnit, signal?: AbortSignal) => Promise<UnitOutcome>) {
    this.behaviour = behaviour;
  }

  async processUnit(unit: SourceUnit, signal?: AbortSignal): Promise<UnitOutcome> {
    const outcome = await this.behaviour(unit, signal);
    this.finished.push(unit.id);
    return outcome;
  }
}

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
const units = ["a.ts", "b.ts", "c.ts"].map((id) => createSourceUnit(id, `export const id = "${id}";\n`));

test("runAll isolates a failing unit", async () => {
  const processor = new FakeProcessor(async (unit) => {
    if (unit.id === "b.ts") {
      throw new Error("transformer exploded");
    }
    return outcomeFor(unit, unit.id === "c.ts");
  });

  const report = await runAll(units, processor, { concurrency: 2, shutdownTimeoutMs: 1_000 });

  assert.deepEqual(
    report.units.map((entry) => entry.status),
    ["completed", "failed", "completed"]
  );
  assert.deepEqual(report.units[1], { unitId: "b.ts", status: "failed", error: "transformer exploded" });
  assert.deepEqual(report.totals, { units: 3, completed: 2, failed: 1, abandoned: 0, violations: 1, cacheHits: 0 });
});

test("runAll reports units in input order whatever the completion order", async () => {
  const processor = new FakeProcessor(async (unit) => {
    await delay(unit.id === "a.ts" ? 30 : unit.id === "b.ts" ? 15 : 1);
    return outcomeFor(unit);
  });

  const report = await runAll(units, processor, { concurrency: 3, shutdownTimeoutMs: 1_000 });

  assert.deepEqual(processor.finished, ["c.ts", "b.ts", "a.ts"]);
  assert.deepEqual(
    report.units.map((entry) => entry.unitId),
    ["a.ts", "b.ts", "c.ts"]
  );
});

test("runAll abandons units still running at the shutdown deadline", async () => {
  const processor = new FakeProcessor(
    (unit, signal) =>
      new Promise<UnitOutcome>((resolve, reject) => {
        if (unit.id !== "b.ts") {
          resolve(outcomeFor(unit));
          return;
        }
        signal?.addEventListener("abort", () => reject(new Error("cancelled")), { once: true });
      })
  );

  const report = await runAll(units, processor, { concurrency: 3, shutdownTimeoutMs: 25 });

  assert.deepEqual(report.units[1], { unitId: "b.ts", status: "abandoned" });
  assert.deepEqual(report.totals, { units: 3, completed: 2, failed: 0, abandoned: 1, violations: 0, cacheHits: 0 });
});

test("summarizeRun stamps the run window", () => {
  const report = summarizeRun(new Date("2024-01-01T00:00:00.000Z"), new Date("2024-01-01T00:00:05.000Z"), []);
  assert.deepEqual(report, {
    startedAt: "2024-01-01T00:00:00.000Z",
    finishedAt: "2024-01-01T00:00:05.000Z",
    units: [],
    totals: { units: 0, completed: 0, failed: 0, abandoned: 0, violations: 0, cacheHits: 0 }
  });
});
