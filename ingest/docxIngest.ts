// ─────────────────────────────────────────────────────────────
// DOCX Ingest — Raw text from Word documents
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import mammoth from "mammoth";
import type { ExtractedText } from "../schema/manualSchema";

/**
 * Extract raw text from a DOCX file. Word has no fixed pagination, so
 * the whole body counts as a single page.
 */
export async function ingestDOCX(filePath: string): Promise<ExtractedText> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`DOCX file not found: ${filePath}`);
  }

  const buffer = fs.readFileSync(filePath);
  const result = await mammoth.extractRawText({ buffer });

  for (const message of result.messages) {
    console.warn(`[INGEST] ${message.type}: ${message.message}`);
  }

  return { text: result.value, format: "docx", pageCount: 1, failedPages: [] };
}
