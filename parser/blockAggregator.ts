// ─────────────────────────────────────────────────────────────
// Block Aggregator — Drive the classifier across a whole manual
// ─────────────────────────────────────────────────────────────

import { DEFAULT_CLASSIFIER_OPTIONS } from "../schema/manualSchema";
import type {
  ClassifierOptions,
  Decision,
  ManualBlock,
  ManualLine,
  ScanDiagnostic,
  ScanResult,
} from "../schema/manualSchema";
import { classifyAt } from "./blockClassifier";
import { GLYPHS, isUpperCaseLine, toManualLines } from "./lineRules";

export { collectUntil } from "./multilineCollector";

/**
 * Scan a manual into its block stream plus the full decision trace.
 * Accepts the decoded text or lines already split by `toManualLines`.
 */
export function scanManual(
  input: string | ManualLine[],
  options: Partial<ClassifierOptions> = {}
): ScanResult {
  const lines = typeof input === "string" ? toManualLines(input) : input;
  const resolved: ClassifierOptions = { ...DEFAULT_CLASSIFIER_OPTIONS, ...options };

  const blocks: ManualBlock[] = [];
  const decisions: Decision[] = [];
  const diagnostics: ScanDiagnostic[] = [];

  let cursor = 0;
  while (cursor < lines.length) {
    const decision = classifyAt(lines, cursor, resolved);
    decisions.push(decision);
    if (decision.block) blocks.push(decision.block);

    const ambiguity = detectAmbiguity(lines[cursor], decision);
    if (ambiguity) diagnostics.push(ambiguity);

    // Every rule consumes at least the cursor line
    cursor = Math.max(decision.span.end, cursor + 1);
  }

  return { blocks, decisions, diagnostics, lineCount: lines.length };
}

/** Blocks only */
export function parseManual(content: string, options: Partial<ClassifierOptions> = {}): ManualBlock[] {
  return scanManual(content, options).blocks;
}

/**
 * An upper-case line that opens with a list glyph reaches the heading
 * rule before the list rules. It is kept as a heading and reported.
 */
function detectAmbiguity(line: ManualLine, decision: Decision): ScanDiagnostic | null {
  if (decision.rule !== "uppercase-subsection") return null;
  const text = line.text;
  if (!text.startsWith(GLYPHS.bullet) && !text.startsWith(GLYPHS.checkbox)) return null;
  if (!isUpperCaseLine(text)) return null;
  return {
    lineNumber: line.index + 1,
    message: `Upper-case line starting with "${text[0]}" classified as subsection header: ${text}`,
  };
}

/** Count blocks by kind — used for CLI summaries */
export function countBlocks(blocks: ManualBlock[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const block of blocks) {
    counts[block.kind] = (counts[block.kind] || 0) + 1;
  }
  return counts;
}
