// ─────────────────────────────────────────────────────────────
// Batch Processor — Run every configured manual, one at a time
// ─────────────────────────────────────────────────────────────

import type { ManualJob } from "../config/manualConfig";

export interface BatchResult {
  total: number;
  succeeded: number;
  failed: number;
  results: {
    model: string;
    status: "success" | "failed";
    error?: string;
    duration: number;
  }[];
}

/**
 * Run a processing function across all jobs in order. With
 * `continueOnError` a failing job is recorded and the batch moves on;
 * otherwise the first failure aborts the batch.
 */
export async function processBatch(
  jobs: readonly ManualJob[],
  processFn: (job: ManualJob) => Promise<void>,
  options?: { continueOnError?: boolean }
): Promise<BatchResult> {
  const result: BatchResult = { total: jobs.length, succeeded: 0, failed: 0, results: [] };

  if (jobs.length === 0) {
    console.log(`[BATCH] No manuals configured`);
    return result;
  }

  console.log(`[BATCH] ${jobs.length} manual(s) to process`);
  console.log("");

  for (let i = 0; i < jobs.length; i++) {
    const job = jobs[i];
    console.log(`[BATCH] (${i + 1}/${jobs.length}) ${job.model}`);
    const start = Date.now();

    try {
      await processFn(job);
      const duration = Date.now() - start;
      result.succeeded++;
      result.results.push({ model: job.model, status: "success", duration });
      console.log(`[BATCH] ✓ Completed in ${duration}ms`);
    } catch (err: unknown) {
      const duration = Date.now() - start;
      const message = err instanceof Error ? err.message : String(err);
      result.failed++;
      result.results.push({ model: job.model, status: "failed", error: message, duration });
      console.error(`[BATCH] ✗ Failed: ${message}`);

      if (!options?.continueOnError) {
        throw new Error(`Batch aborted at ${job.model}: ${message}`);
      }
    }

    console.log("");
  }

  return result;
}

/**
 * Print a summary table of batch results.
 */
export function printBatchSummary(result: BatchResult): void {
  console.log("═══════════════════════════════════════════════════════");
  console.log("  BATCH SUMMARY");
  console.log("═══════════════════════════════════════════════════════");
  console.log(`  Total:     ${result.total}`);
  console.log(`  Succeeded: ${result.succeeded}`);
  console.log(`  Failed:    ${result.failed}`);
  console.log("");

  if (result.failed > 0) {
    console.log("  FAILURES:");
    for (const r of result.results.filter((r) => r.status === "failed")) {
      console.log(`    - ${r.model}: ${r.error}`);
    }
    console.log("");
  }

  const totalTime = result.results.reduce((sum, r) => sum + r.duration, 0);
  console.log(`  Total time: ${(totalTime / 1000).toFixed(1)}s`);
  console.log("");
}
