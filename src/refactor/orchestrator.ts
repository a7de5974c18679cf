import { errorMessage } from "../lib/errors.js";
import { logError, logInfo, logWarn, serializeError } from "../lib/logging.js";
import { WorkerPool } from "../lib/worker-pool.js";
import { RunReport, SourceUnit, UnitOutcome, UnitReport } from "../types.js";

export interface UnitProcessor {
  processUnit(unit: SourceUnit, signal?: AbortSignal): Promise<UnitOutcome>;
}

export interface OrchestratorOptions {
  concurrency: number;
  shutdownTimeoutMs: number;
  now?: () => Date;
}

export function summarizeRun(startedAt: Date, finishedAt: Date, units: UnitReport[]): RunReport {
  const completed = units.filter(
    (report): report is Extract<UnitReport, { status: "completed" }> => report.status === "completed"
  );

  return {
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    units,
    totals: {
      units: units.length,
      completed: completed.length,
      failed: units.filter((report) => report.status === "failed").length,
      abandoned: units.filter((report) => report.status === "abandoned").length,
      violations: completed.filter((report) => report.outcome.violation).length,
      cacheHits: completed.filter((report) => report.outcome.cacheHit).length
    }
  };
}

/**
 * Runs every unit through the processor on a bounded pool. A failing unit is
 * recorded and does not affect the others; the run ends by the shutdown
 * deadline at the latest.
 */
export async function runAll(
  units: readonly SourceUnit[],
  processor: UnitProcessor,
  options: OrchestratorOptions
): Promise<RunReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const pool = new WorkerPool(options.concurrency);

  logInfo("run_started", { units: units.length, concurrency: options.concurrency });

  const submissions = units.map(async (unit): Promise<UnitReport> => {
    const outcome = await pool.submit((signal) => processor.processUnit(unit, signal));

    if (outcome.status === "fulfilled") {
      return { unitId: unit.id, status: "completed", outcome: outcome.value };
    }
    if (outcome.status === "rejected") {
      logError("unit_failed", { unitId: unit.id, error: serializeError(outcome.error) });
      return { unitId: unit.id, status: "failed", error: errorMessage(outcome.error) };
    }

    logWarn("unit_abandoned", { unitId: unit.id });
    return { unitId: unit.id, status: "abandoned" };
  });

  const drained = await pool.shutdown(options.shutdownTimeoutMs);
  if (!drained) {
    logWarn("run_shutdown_timeout", { shutdownTimeoutMs: options.shutdownTimeoutMs });
  }

  const report = summarizeRun(startedAt, now(), await Promise.all(submissions));
  logInfo("run_finished", { ...report.totals });
  return report;
}
