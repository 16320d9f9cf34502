// ─────────────────────────────────────────────────────────────
// HTML Ingest — Visible text from HTML documents
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import * as cheerio from "cheerio";
import type { ExtractedText } from "../schema/manualSchema";

/** Body text of an HTML string, with script and style content removed */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $("script, style, noscript").remove();
  return $("body").text();
}

/**
 * Extract visible text from an HTML file.
 */
export async function ingestHTML(filePath: string): Promise<ExtractedText> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`HTML file not found: ${filePath}`);
  }

  const text = htmlToText(fs.readFileSync(filePath, "utf-8"));
  return { text, format: "html", pageCount: 1, failedPages: [] };
}
