// ─────────────────────────────────────────────────────────────
// PDF Ingest — Page-by-page text extraction
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import type { ExtractedText } from "../schema/manualSchema";

/** Minimal view of a PDF that can yield text one page at a time */
export interface PdfPageSource {
  pageCount(): Promise<number>;
  pageText(pageNumber: number): Promise<string>;
  close(): Promise<void>;
}

// pdf-parse v2 exports a class-based API
type PDFParseClass = new (opts: { data: Buffer | Uint8Array; verbosity?: number }) => {
  getText(opts?: { partial?: number[] }): Promise<{ text: string; total: number; pages: { text: string; num: number }[] }>;
  getInfo(opts?: Record<string, unknown>): Promise<{ total: number }>;
  destroy(): Promise<void>;
};

/** Loaded on first use so that text-only runs never touch pdf.js */
function loadPDFParse(): PDFParseClass {
  const { PDFParse } = require("pdf-parse") as { PDFParse: PDFParseClass };
  return PDFParse;
}

/** Open a PDF buffer with pdf-parse */
export function openPdfSource(data: Buffer): PdfPageSource {
  const PDFParse = loadPDFParse();
  const parser = new PDFParse({ data });

  return {
    pageCount: async () => (await parser.getInfo()).total,
    pageText: async (pageNumber) => {
      const result = await parser.getText({ partial: [pageNumber] });
      return result.pages.map((p) => p.text).join("\n");
    },
    close: () => parser.destroy(),
  };
}

/**
 * Pull text from every page. A page that fails to extract contributes
 * an empty string and is listed in `failedPages`; the rest still count.
 */
export async function extractPages(source: PdfPageSource): Promise<ExtractedText> {
  const pageCount = await source.pageCount();
  const pages: string[] = [];
  const failedPages: number[] = [];

  for (let page = 1; page <= pageCount; page++) {
    try {
      pages.push(await source.pageText(page));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[INGEST] Page ${page} extraction failed, using empty text: ${reason}`);
      pages.push("");
      failedPages.push(page);
    }
  }

  return { text: pages.join("\n"), format: "pdf", pageCount, failedPages };
}

/**
 * Extract text from a PDF file on disk.
 */
export async function ingestPDF(filePath: string): Promise<ExtractedText> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`PDF file not found: ${filePath}`);
  }

  const source = openPdfSource(fs.readFileSync(filePath));
  try {
    return await extractPages(source);
  } finally {
    await source.close().catch((err: unknown) => {
      console.warn(`[INGEST] PDF parser cleanup failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  }
}
