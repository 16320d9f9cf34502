// ─────────────────────────────────────────────────────────────
// Ingest Index — Text extraction dispatcher
// ─────────────────────────────────────────────────────────────

import path from "path";
import type { ExtractedText, InputFormat } from "../schema/manualSchema";
import { ingestPDF, extractPages, openPdfSource } from "./pdfIngest";
import { ingestDOCX } from "./docxIngest";
import { ingestHTML, htmlToText } from "./htmlIngest";
import { ingestText, readManualText } from "./textIngest";

/** Map file extensions to input formats */
const EXT_MAP: Record<string, InputFormat> = {
  ".pdf": "pdf",
  ".docx": "docx",
  ".html": "html",
  ".htm": "html",
  ".txt": "txt",
  ".md": "md",
  ".markdown": "md",
};

export function detectFormat(filePath: string): InputFormat | undefined {
  return EXT_MAP[path.extname(filePath).toLowerCase()];
}

/**
 * Extract plain text from any supported document.
 * Routes on file extension.
 */
export async function extractDocumentText(filePath: string): Promise<ExtractedText> {
  const format = detectFormat(filePath);

  if (!format) {
    throw new Error(
      `Unsupported file format: ${path.extname(filePath) || "(none)"}\nSupported: ${Object.keys(EXT_MAP).join(", ")}`
    );
  }

  console.log(`[INGEST] Processing ${path.basename(filePath)} as ${format.toUpperCase()}...`);

  switch (format) {
    case "pdf":
      return ingestPDF(filePath);
    case "docx":
      return ingestDOCX(filePath);
    case "html":
      return ingestHTML(filePath);
    case "txt":
    case "md":
      return ingestText(filePath, format);
  }
}

export { ingestPDF, extractPages, openPdfSource, ingestDOCX, ingestHTML, htmlToText, ingestText, readManualText };
export type { PdfPageSource } from "./pdfIngest";
