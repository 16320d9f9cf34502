// ─────────────────────────────────────────────────────────────
// Text Ingest — Plain-text and Markdown manuals
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import type { ExtractedText, InputFormat } from "../schema/manualSchema";

/**
 * Read a manual's text. A UTF-8 byte-order mark is dropped so that the
 * first line classifies like any other.
 */
export function readManualText(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Manual text file not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, "utf-8").replace(/^\uFEFF/, "");
}

export async function ingestText(filePath: string, format: InputFormat = "txt"): Promise<ExtractedText> {
  const text = readManualText(filePath);
  return { text, format, pageCount: 1, failedPages: [] };
}
