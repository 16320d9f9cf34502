// ─────────────────────────────────────────────────────────────
// Line Rules — Local syntactic cues used by the block classifier
// ─────────────────────────────────────────────────────────────

import type { ClassifierOptions, ManualLine } from "../schema/manualSchema";

/** Leading glyphs and literal markers found in manual text */
export const GLYPHS = {
  warning: "⚠",
  checkbox: "□",
  bullet: "•",
} as const;

const WARNING_MARKERS = [GLYPHS.warning, "WARNING"];
const NOTE_MARKERS = ["NOTE:", "IMPORTANT:", "CAUTION:"];
const PROBLEM_MARKER = "PROBLEM:";
const NUMBERED_PATTERN = /^\d+\./;

/**
 * Split a decoded document into lines. Every line keeps its raw form;
 * rules only ever look at the trimmed text.
 */
export function toManualLines(content: string): ManualLine[] {
  return content.split("\n").map((raw, index) => ({ raw, text: raw.trim(), index }));
}

/** A single character repeated, with a minimum length */
function isRunOf(text: string, char: string, minLength: number): boolean {
  if (text.length < minLength) return false;
  for (const c of text) {
    if (c !== char) return false;
  }
  return true;
}

export function isDelimiterLine(text: string, options: ClassifierOptions): boolean {
  return isRunOf(text, "=", options.minDelimiterLength);
}

export function isUnderlineLine(text: string, options: ClassifierOptions): boolean {
  return isRunOf(text, "-", options.minUnderlineLength);
}

/**
 * True when the text has at least one cased character and none in
 * lower case ("SAFETY RULES", "1. CHECK"); "====" and "12." are not.
 */
export function isUpperCaseLine(text: string): boolean {
  return text !== text.toLowerCase() && text === text.toUpperCase();
}

/** Cover-page furniture: brand banner, model line, manual title, or nothing */
export function isDecorativeLine(text: string, options: ClassifierOptions): boolean {
  if (!text) return true;
  if (text.includes(options.brandName) && text.includes(options.productLine)) return true;
  return text.startsWith("MODEL:") || text === "INSTRUCTION MANUAL";
}

/** A section title that merely repeats the brand, e.g. "ACME POWER TOOLS" */
export function isBrandBanner(title: string, options: ClassifierOptions): boolean {
  return title.startsWith(`${options.brandName} `);
}

export function isWarningStart(text: string): boolean {
  return WARNING_MARKERS.some((m) => text.startsWith(m));
}

export function isNoteStart(text: string): boolean {
  return NOTE_MARKERS.some((m) => text.startsWith(m));
}

export function isProblemStart(text: string): boolean {
  return text.startsWith(PROBLEM_MARKER);
}

/** Lines that must never be styled as a heading */
export function isCalloutMarker(text: string): boolean {
  return isWarningStart(text) || isNoteStart(text) || isProblemStart(text);
}

export function isChecklistStart(text: string): boolean {
  return text.startsWith(GLYPHS.checkbox);
}

/** "• item" or "- item"; a lone "-" or "-x" is not a bullet */
export function isBulletStart(text: string): boolean {
  if (text.startsWith(GLYPHS.bullet)) return true;
  return text.startsWith("-") && text.length > 2 && text[1] === " ";
}

export function isNumberedStart(text: string): boolean {
  return NUMBERED_PATTERN.test(text);
}

export function endsWithColon(text: string, options: ClassifierOptions): boolean {
  return text.endsWith(":") && text.length < options.maxColonHeaderLength;
}

/** "Before each use:" → "Before each use", "Setup --:" → "Setup" */
export function stripHeaderColon(text: string): string {
  return text.replace(/:+$/, "").replace(/-+$/, "").trim();
}

/**
 * Ends a multi-line warning or note. The terminating line is left for
 * the next classification step.
 */
export function isCalloutTerminator(text: string, options: ClassifierOptions): boolean {
  return (
    !text ||
    isWarningStart(text) ||
    isNoteStart(text) ||
    isUpperCaseLine(text) ||
    isChecklistStart(text) ||
    text.startsWith(GLYPHS.bullet) ||
    text.startsWith("-") ||
    isNumberedStart(text) ||
    isProblemStart(text) ||
    endsWithColon(text, options)
  );
}

/** "⚠WARNING" and "⚠  WARNING" both become "⚠ WARNING" */
export function normalizeWarningGlyphs(text: string): string {
  return text.replace(/⚠\s*/g, `${GLYPHS.warning} `).trim();
}
