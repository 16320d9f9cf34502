// ─────────────────────────────────────────────────────────────
// Manual Generator — Text manual → block stream → PDF / HTML / JSON
// ─────────────────────────────────────────────────────────────

import path from "path";
import { processBatch } from "../batch/batchProcessor";
import type { BatchResult } from "../batch/batchProcessor";
import type { ManualConfig, ManualJob } from "../config/manualConfig";
import { exportManualHtml } from "../export/htmlExport";
import { exportBlocksJSON } from "../export/jsonExport";
import { exportManualPdf } from "../export/pdfExport";
import { readManualText } from "../ingest";
import { countBlocks, scanManual } from "../parser/blockAggregator";
import type { ClassifierOptions, ScanResult } from "../schema/manualSchema";
import { classifierOptionsFor } from "../styles/brandConfig";
import type { StyleRegistry } from "../styles/styleRegistry";

export interface GenerateOptions {
  registry: StyleRegistry;
  outputDir: string;
  html?: boolean;
  json?: boolean;
  classifier?: Partial<ClassifierOptions>;
  year?: number;
}

export interface GeneratedManual {
  model: string;
  scan: ScanResult;
  pdfPath: string;
  pageCount: number;
  htmlPath?: string;
  jsonPath?: string;
}

/** Default PDF name when a job does not set one */
export function defaultOutputName(job: ManualJob): string {
  const slug = job.title.replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
  return `${job.model}_${slug}_Manual.pdf`;
}

/**
 * Parse a manual's source text and write its rendered outputs.
 */
export async function generateManual(job: ManualJob, options: GenerateOptions): Promise<GeneratedManual> {
  console.log(`[PARSE] ${job.model} — ${job.title}`);

  const text = readManualText(job.source);
  const scan = scanManual(text, classifierOptionsFor(options.registry.brand, options.classifier));

  const counts = Object.entries(countBlocks(scan.blocks))
    .map(([kind, n]) => `${kind}=${n}`)
    .join(" ");
  console.log(`[PARSE] ${scan.lineCount} lines → ${scan.blocks.length} blocks (${counts})`);
  for (const d of scan.diagnostics) {
    console.warn(`[PARSE] ⚠ line ${d.lineNumber}: ${d.message}`);
  }

  const meta = { model: job.model, title: job.title, year: options.year };
  const pdfPath = job.output ?? path.join(options.outputDir, defaultOutputName(job));
  const base = pdfPath.replace(/\.pdf$/i, "");

  const { pageCount } = await exportManualPdf(scan.blocks, meta, options.registry, pdfPath);
  const result: GeneratedManual = { model: job.model, scan, pdfPath, pageCount };

  if (options.html) {
    result.htmlPath = exportManualHtml(scan.blocks, meta, options.registry, `${base}.html`);
  }
  if (options.json) {
    result.jsonPath = exportBlocksJSON(scan, meta, `${base}.blocks.json`);
  }

  return result;
}

/**
 * Generate every configured manual. A failing manual is reported in the
 * batch result and the rest still run.
 */
export async function generateManuals(
  config: ManualConfig,
  options: GenerateOptions
): Promise<{ batch: BatchResult; generated: GeneratedManual[] }> {
  const generated: GeneratedManual[] = [];
  const batch = await processBatch(
    config.manuals,
    async (job) => {
      generated.push(await generateManual(job, options));
    },
    { continueOnError: true }
  );
  return { batch, generated };
}
