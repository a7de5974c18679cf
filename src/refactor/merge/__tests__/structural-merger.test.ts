import assert from "node:assert/strict";
import test from "node:test";
import { ChunkVerdict, FileVerdict, SourceUnit } from "../../../types.js";
import { aggregateVerdicts } from "../../aggregation/result-aggregator.js";
import { createSourceUnit } from "../../source-unit.js";
import { mergeByDeclaration } from "../ast-merge.js";
import { defaultMergeStrategy } from "../merge-strategy.js";
import { appendAnnotation, mergeVerdict, splitFixBlocks, unmergedBlocksHeader, unmergedFixHeader } from "../structural-merger.js";

function violation(chunkIndex: number, fix: string): ChunkVerdict {
  return { kind: "accepted", chunkIndex, violation: true, reason: "layering", fix, attempts: 1 };
}

function verdictFor(unit: SourceUnit, fixes: string[]): FileVerdict {
  return aggregateVerdicts(
    unit,
    fixes.map((fix, index) => violation(index, fix))
  );
}

const lines = (...parts: string[]): string => parts.join("\n");

test("appendAnnotation closes a block comment around the body", () => {
  assert.equal(appendAnnotation("a", "h", "x */ y"), "a\n\n/* h\n\nx *\\/ y\n*/\n");
  assert.equal(appendAnnotation("a\n", "h", "b"), "a\n\n/* h\n\nb\n*/\n");
});

test("splitFixBlocks drops markers and clean chunks", () => {
  assert.deepEqual(
    splitFixBlocks("//--- fix for chunk 0 ---\nconst a = 1;\n//--- chunk 1 => no violation\n//--- fix for chunk 2 ---\n  b();\n"),
    ["const a = 1;", "b();"]
  );
});

test("mergeByDeclaration edits interfaces by member name", () => {
  const outcome = mergeByDeclaration(
    "interface Port {\n  directDbCall(): void;\n  save(): void;\n}\n",
    "interface Port {\n  save(): void;\n}\n",
    "port.ts",
    defaultMergeStrategy
  );
  assert.deepEqual(outcome, { ok: true, text: "interface Port {\n  save(): void;\n}\n", mergedDeclarations: ["Port"] });

  assert.deepEqual(mergeByDeclaration("class A {}\n", "class B {}\n", "a.ts", defaultMergeStrategy), {
    ok: false,
    reason: "no declaration of the fix matches a declaration of the original"
  });
});

test("a fix matching the original class is merged structurally", () => {
  const unit = createSourceUnit(
    "src/order-service.ts",
    lines(
      "export class OrderService {",
      "  private readonly repo: OrderRepository;",
      "",
      "  constructor(repo: OrderRepository) {",
      "    this.repo = repo;",
      "  }",
      "",
      "  directDbCall(): void {",
      '    db.query("select 1");',
      "  }",
      "",
      "  place(order: Order): void {",
      "    if (order.quantity > stock) {",
      '      throw new Error("no stock");',
      "    }",
      "    this.repo.save(order);",
      "  }",
      "}",
      ""
    )
  );
  const fix = lines(
    "export class OrderService {",
    "  place(order: Order): void {",
    "    this.repo.save(order);",
    "  }",
    "",
    "  cancel(order: Order): void {",
    "    this.repo.remove(order);",
    "  }",
    "}"
  );

  const output = mergeVerdict(unit, verdictFor(unit, [fix]), defaultMergeStrategy);

  assert.deepEqual(output.result, { status: "merged", mergedDeclarations: ["OrderService"] });
  assert.equal(
    output.finalText,
    lines(
      "export class OrderService {",
      "  private readonly repo: OrderRepository;",
      "",
      "  constructor(repo: OrderRepository) {",
      "    this.repo = repo;",
      "  }",
      "",
      "",
      "  place(order: Order): void {",
      "    this.repo.save(order);",
      "  }",
      "",
      "  cancel(order: Order): void {",
      "    this.repo.remove(order);",
      "  }",
      "}",
      ""
    )
  );
});

test("blocks that cannot be merged are kept as an annotation", () => {
  const unit = createSourceUnit(
    "src/stock-service.ts",
    lines(
      "export class StockService {",
      "  directDbCall(): number {",
      '    return db.query("select stock");',
      "  }",
      "",
      "  reserve(amount: number): void {",
      "    this.reserved += amount;",
      "  }",
      "}",
      ""
    )
  );
  const classFix = lines(
    "export class StockService {",
    "  reserve(amount: number): void {",
    "    this.reserved += amount;",
    "  }",
    "}"
  );
  const fragment = lines("  ship(order: Order): void {", "    this.repo.ship(order);", "  }");

  const output = mergeVerdict(unit, verdictFor(unit, [classFix, fragment]), defaultMergeStrategy);

  assert.deepEqual(output.result, {
    status: "partially-merged",
    mergedDeclarations: ["StockService"],
    unmergedBlocks: [lines("ship(order: Order): void {", "    this.repo.ship(order);", "  }")]
  });
  assert.equal(
    output.finalText,
    lines(
      "export class StockService {",
      "",
      "  reserve(amount: number): void {",
      "    this.reserved += amount;",
      "  }",
      "}",
      "",
      `/* ${unmergedBlocksHeader}`,
      "",
      "ship(order: Order): void {",
      "    this.repo.ship(order);",
      "  }",
      "*/",
      ""
    )
  );
});

test("an unrelated fix falls back to heuristic edits on a parseable original", () => {
  const unit = createSourceUnit(
    "src/reorder.ts",
    lines("export function reorder(item: Item): void {", "  if (item.stock < 1) {", "    restock(item);", "  }", "  ship(item);", "}", "")
  );

  const output = mergeVerdict(unit, verdictFor(unit, ["export class Other {}"]), defaultMergeStrategy);

  assert.deepEqual(output.result, { status: "unmerged", reason: "no fix block could be merged into the original" });
  assert.equal(
    output.finalText,
    lines(
      "export function reorder(item: Item): void {",
      "  // arch-repair: removed domain check",
      "  ship(item);",
      "}",
      "",
      `/* ${unmergedFixHeader}`,
      "",
      "//--- fix for chunk 0 ---",
      "export class Other {}",
      "",
      "*/",
      ""
    )
  );
});

test("an unparseable original yields a failed merge with heuristic edits and the full fix", () => {
  const unit = createSourceUnit(
    "src/broken.ts",
    lines(
      "export class Broken {",
      "  directDbCall(): void {",
      '    db.query("x");',
      "  }",
      "  check(order: Order) {",
      "    if (order.price > 10) {",
      "      return;",
      "    }",
      "  }",
      "  oops( {",
      "}",
      ""
    )
  );

  const output = mergeVerdict(unit, verdictFor(unit, ["export class Broken {}"]), defaultMergeStrategy);

  assert.equal(output.result.status, "failed");
  if (output.result.status === "failed") {
    assert.match(output.result.parseError, /^\d+:\d+ /);
  }
  assert.equal(
    output.finalText,
    lines(
      "export class Broken {",
      "  // arch-repair: removed directDbCall",
      "  check(order: Order) {",
      "    // arch-repair: removed domain check",
      "  }",
      "  oops( {",
      "}",
      "",
      `/* ${unmergedFixHeader}`,
      "",
      "//--- fix for chunk 0 ---",
      "export class Broken {}",
      "",
      "*/",
      ""
    )
  );
});
