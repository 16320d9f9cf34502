// ─────────────────────────────────────────────────────────────
// Multi-line Collector — Gather continuation lines for callouts
// ─────────────────────────────────────────────────────────────

import type { ManualLine } from "../schema/manualSchema";

export interface CollectedLines {
  lines: string[];
  next: number;              // index of the terminating line (not consumed)
}

/**
 * Take the line at `start` unconditionally, then every following line
 * until `isTerminator` matches or the input ends.
 */
export function collectUntil(
  lines: ManualLine[],
  start: number,
  isTerminator: (text: string) => boolean
): CollectedLines {
  const collected = [lines[start].text];
  let next = start + 1;

  while (next < lines.length && !isTerminator(lines[next].text)) {
    collected.push(lines[next].text);
    next++;
  }

  return { lines: collected, next };
}
