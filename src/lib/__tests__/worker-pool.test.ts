import assert from "node:assert/strict";
import test from "node:test";
import { PoolClosedError } from "../errors.js";
import { WorkerPool } from "../worker-pool.js";

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

test("WorkerPool never runs more tasks than its concurrency", async () => {
  const pool = new WorkerPool(2);
  let active = 0;
  let peak = 0;

  const outcomes = await Promise.all(
    [30, 10, 20, 5, 15].map((ms, index) =>
      pool.submit(async () => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(ms);
        active -= 1;
        return index;
      })
    )
  );

  assert.equal(peak, 2);
  assert.deepEqual(outcomes, [0, 1, 2, 3, 4].map((value) => ({ status: "fulfilled", value })));
  assert.equal(await pool.shutdown(100), true);
});

test("WorkerPool reports task errors without stopping other tasks", async () => {
  const pool = new WorkerPool(1);
  const failure = new Error("boom");

  const [failed, succeeded] = await Promise.all([
    pool.submit(async () => {
      throw failure;
    }),
    pool.submit(async () => "ok")
  ]);

  assert.deepEqual(failed, { status: "rejected", error: failure });
  assert.deepEqual(succeeded, { status: "fulfilled", value: "ok" });
  await pool.shutdown(100);
});

test("WorkerPool refuses work after shutdown", async () => {
  const pool = new WorkerPool(1);
  assert.equal(await pool.shutdown(10), true);
  await assert.rejects(pool.submit(async () => 1), PoolClosedError);
});

test("WorkerPool abandons running and queued tasks at the shutdown deadline", async () => {
  const pool = new WorkerPool(1);
  let queuedStarted = false;

  const running = pool.submit((signal) => untilAborted(signal));
  const queued = pool.submit(async () => {
    queuedStarted = true;
    return "late";
  });
  assert.equal(pool.activeCount, 1);
  assert.equal(pool.pendingCount, 1);

  assert.equal(await pool.shutdown(20), false);
  assert.equal(pool.signal.aborted, true);
  assert.deepEqual(await running, { status: "abandoned" });
  assert.deepEqual(await queued, { status: "abandoned" });
  assert.equal(queuedStarted, false);
});

test("WorkerPool rejects a non-positive concurrency", () => {
  assert.throws(() => new WorkerPool(0));
});
