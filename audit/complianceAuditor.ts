// ─────────────────────────────────────────────────────────────
// Compliance Auditor — Keyword survival between manual versions
// ─────────────────────────────────────────────────────────────
//
// A keyword is flagged when it appears in the original document and
// no longer appears in the rewrite. Matching is substring-based on
// normalized text, so "100–240" in a PDF matches "100-240".
//
// ─────────────────────────────────────────────────────────────

import path from "path";
import type { ManualJob } from "../config/manualConfig";
import { extractDocumentText, readManualText } from "../ingest";

/** Result of auditing one original/rewrite pair */
export interface ManualAuditReport {
  model: string;
  originalFile: string;
  rewrittenFile: string;
  status: "audited" | "failed";
  missing: string[];
  pageCount: number;
  failedPages: number[];
  error?: string;
}

/** Lower-case, unify en/em dashes to "-", collapse whitespace runs */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[–—]/g, "-")
    .replace(/\s+/g, " ");
}

/**
 * Keywords present in `reference` but absent from `candidate`, in the
 * order of `keywords`. Both bodies are normalized before comparison.
 */
export function findMissingKeywords(reference: string, candidate: string, keywords: readonly string[]): string[] {
  const normalizedReference = normalizeText(reference);
  const normalizedCandidate = normalizeText(candidate);
  const seen = new Set<string>();
  const missing: string[] = [];

  for (const keyword of keywords) {
    const normalized = normalizeText(keyword);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);

    if (normalizedReference.includes(normalized) && !normalizedCandidate.includes(normalized)) {
      missing.push(keyword);
    }
  }

  return missing;
}

/**
 * Audit a single configured manual. Extraction failures for individual
 * pages reduce the reference text; a missing file fails this manual only.
 */
export async function auditManual(job: ManualJob, keywords: readonly string[]): Promise<ManualAuditReport> {
  const report: ManualAuditReport = {
    model: job.model,
    originalFile: job.originalDocument ? path.basename(job.originalDocument) : "",
    rewrittenFile: job.rewrittenText ? path.basename(job.rewrittenText) : "",
    status: "audited",
    missing: [],
    pageCount: 0,
    failedPages: [],
  };

  try {
    if (!job.originalDocument || !job.rewrittenText) {
      throw new Error(`Manual ${job.model} has no originalDocument/rewrittenText pair configured`);
    }

    const original = await extractDocumentText(job.originalDocument);
    const rewritten = readManualText(job.rewrittenText);

    report.pageCount = original.pageCount;
    report.failedPages = original.failedPages;
    report.missing = findMissingKeywords(original.text, rewritten, keywords);
  } catch (err: unknown) {
    report.status = "failed";
    report.error = err instanceof Error ? err.message : String(err);
    console.error(`[AUDIT] ✗ ${job.model}: ${report.error}`);
  }

  return report;
}

/** Audit every job in order; manuals share no state */
export async function auditManuals(jobs: readonly ManualJob[], keywords: readonly string[]): Promise<ManualAuditReport[]> {
  const reports: ManualAuditReport[] = [];
  for (const job of jobs) {
    reports.push(await auditManual(job, keywords));
  }
  return reports;
}

/** Per-model report, as printed by the CLI */
export function formatAuditReport(report: ManualAuditReport): string {
  const lines = [
    "=".repeat(72),
    `${report.model} audit`,
    `  original:  ${report.originalFile}`,
    `  rewritten: ${report.rewrittenFile}`,
  ];

  if (report.status === "failed") {
    lines.push(`  audit failed: ${report.error ?? "unknown error"}`);
    return lines.join("\n");
  }

  if (report.failedPages.length > 0) {
    lines.push(`  failed pages (treated as empty): ${report.failedPages.join(", ")} of ${report.pageCount}`);
  }
  lines.push(`  flagged missing keywords (present in original, absent in rewrite): ${report.missing.length}`);
  for (const keyword of report.missing) {
    lines.push(`   - ${keyword}`);
  }
  return lines.join("\n");
}
