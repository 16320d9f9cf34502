// ─────────────────────────────────────────────────────────────
// JSON Export — Write the block stream for downstream tooling
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import type { ScanResult } from "../schema/manualSchema";
import type { ManualMeta } from "./htmlExport";

/** Serialized form of a scanned manual */
export interface BlockStreamDocument {
  model: string;
  title: string;
  lineCount: number;
  blocks: ScanResult["blocks"];
  diagnostics: ScanResult["diagnostics"];
}

export function toBlockStreamDocument(scan: ScanResult, meta: ManualMeta): BlockStreamDocument {
  return {
    model: meta.model,
    title: meta.title,
    lineCount: scan.lineCount,
    blocks: scan.blocks,
    diagnostics: scan.diagnostics,
  };
}

/**
 * Export the block stream as pretty-printed JSON.
 */
export function exportBlocksJSON(scan: ScanResult, meta: ManualMeta, outputPath: string): string {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(outputPath, JSON.stringify(toBlockStreamDocument(scan, meta), null, 2), "utf-8");
  console.log(`[EXPORT] JSON → ${outputPath}`);
  return outputPath;
}
