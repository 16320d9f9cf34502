// ─────────────────────────────────────────────────────────────
// Block Classifier — Ordered rule table over manual lines
// ─────────────────────────────────────────────────────────────
//
// Rules are tried top to bottom at the cursor and the first one that
// matches decides. The order is the contract: a line such as
// "WARNING: HOT SURFACE" is upper case, but the callout exclusions on
// the heading rules hand it to the warning rule.
//
// ─────────────────────────────────────────────────────────────

import type {
  ClassifierOptions,
  Decision,
  ManualBlock,
  ManualLine,
  RuleName,
} from "../schema/manualSchema";
import {
  GLYPHS,
  endsWithColon,
  isBrandBanner,
  isBulletStart,
  isCalloutMarker,
  isCalloutTerminator,
  isChecklistStart,
  isDecorativeLine,
  isDelimiterLine,
  isNoteStart,
  isNumberedStart,
  isProblemStart,
  isUnderlineLine,
  isUpperCaseLine,
  isWarningStart,
  normalizeWarningGlyphs,
  stripHeaderColon,
} from "./lineRules";
import { collectUntil } from "./multilineCollector";

/** What a rule sees at the cursor */
export interface RuleContext {
  lines: ManualLine[];
  cursor: number;
  line: ManualLine;
  options: ClassifierOptions;
}

export interface BlockRule {
  name: RuleName;
  apply(ctx: RuleContext): Decision | null;
}

/** Consume `count` lines starting at the cursor */
function consume(ctx: RuleContext, rule: RuleName, count: number, block?: ManualBlock): Decision {
  return { rule, span: { start: ctx.cursor, end: ctx.cursor + count }, block };
}

function nextNonBlank(lines: ManualLine[], from: number): number {
  let i = from;
  while (i < lines.length && !lines[i].text) i++;
  return i;
}

// ── Structural noise ───────────────────────────────────────

/** "=====" / title / "=====" — a major section, or cover furniture */
const delimiterUnit: BlockRule = {
  name: "major-section",
  apply(ctx) {
    const { lines, cursor, options } = ctx;
    if (!isDelimiterLine(ctx.line.text, options)) return null;

    const titleIndex = nextNonBlank(lines, cursor + 1);
    if (titleIndex >= lines.length) {
      return { rule: "trailing-delimiter", span: { start: cursor, end: lines.length } };
    }

    const title = lines[titleIndex].text;
    const closeIndex = nextNonBlank(lines, titleIndex + 1);
    if (closeIndex >= lines.length || !isDelimiterLine(lines[closeIndex].text, options)) {
      return consume(ctx, "stray-delimiter", 1);
    }

    const span = { start: cursor, end: closeIndex + 1 };
    if (isDecorativeLine(title, options) || isBrandBanner(title, options)) {
      return { rule: "cover-banner", span };
    }
    return { rule: "major-section", span, block: { kind: "major-section-header", title } };
  },
};

const decorativeLine: BlockRule = {
  name: "decorative",
  apply: (ctx) => (isDecorativeLine(ctx.line.text, ctx.options) ? consume(ctx, "decorative", 1) : null),
};

const underlineLine: BlockRule = {
  name: "underline",
  apply: (ctx) => (isUnderlineLine(ctx.line.text, ctx.options) ? consume(ctx, "underline", 1) : null),
};

// ── Headings ───────────────────────────────────────────────

const underlinedSubsection: BlockRule = {
  name: "underlined-subsection",
  apply(ctx) {
    const following = ctx.lines[ctx.cursor + 1];
    if (!following || !isUnderlineLine(following.text, ctx.options)) return null;
    if (isCalloutMarker(ctx.line.text)) return null;
    return consume(ctx, "underlined-subsection", 2, { kind: "subsection-header", title: ctx.line.text });
  },
};

const uppercaseSubsection: BlockRule = {
  name: "uppercase-subsection",
  apply(ctx) {
    const text = ctx.line.text;
    if (!isUpperCaseLine(text) || text.length <= 3 || isCalloutMarker(text)) return null;
    return consume(ctx, "uppercase-subsection", 1, { kind: "subsection-header", title: text });
  },
};

const problemHeader: BlockRule = {
  name: "problem",
  apply: (ctx) =>
    isProblemStart(ctx.line.text)
      ? consume(ctx, "problem", 1, { kind: "problem-header", text: ctx.line.text })
      : null,
};

const colonSubsection: BlockRule = {
  name: "colon-subsection",
  apply(ctx) {
    const text = ctx.line.text;
    if (!endsWithColon(text, ctx.options) || isCalloutMarker(text)) return null;
    if (text.startsWith(GLYPHS.bullet) || isChecklistStart(text)) return null;
    return consume(ctx, "colon-subsection", 1, { kind: "subsection-header", title: stripHeaderColon(text) });
  },
};

// ── Callouts ───────────────────────────────────────────────

const warningCallout: BlockRule = {
  name: "warning",
  apply(ctx) {
    if (!isWarningStart(ctx.line.text)) return null;
    const { lines, next } = collectUntil(ctx.lines, ctx.cursor, (t) => isCalloutTerminator(t, ctx.options));
    const text = normalizeWarningGlyphs(lines.join(" "));
    return { rule: "warning", span: { start: ctx.cursor, end: next }, block: { kind: "warning", text } };
  },
};

const noteCallout: BlockRule = {
  name: "note",
  apply(ctx) {
    if (!isNoteStart(ctx.line.text)) return null;
    const { lines, next } = collectUntil(ctx.lines, ctx.cursor, (t) => isCalloutTerminator(t, ctx.options));
    return { rule: "note", span: { start: ctx.cursor, end: next }, block: { kind: "note", text: lines.join(" ") } };
  },
};

// ── List items & body ──────────────────────────────────────

const checklistItem: BlockRule = {
  name: "checklist",
  apply: (ctx) =>
    isChecklistStart(ctx.line.text)
      ? consume(ctx, "checklist", 1, { kind: "checklist-item", text: ctx.line.text.slice(GLYPHS.checkbox.length).trim() })
      : null,
};

const bulletItem: BlockRule = {
  name: "bullet",
  apply: (ctx) =>
    isBulletStart(ctx.line.text) ? consume(ctx, "bullet", 1, { kind: "bullet", text: ctx.line.text }) : null,
};

const numberedItem: BlockRule = {
  name: "numbered",
  apply: (ctx) =>
    isNumberedStart(ctx.line.text)
      ? consume(ctx, "numbered", 1, { kind: "numbered-item", text: ctx.line.text })
      : null,
};

const paragraph: BlockRule = {
  name: "paragraph",
  apply: (ctx) => consume(ctx, "paragraph", 1, { kind: "paragraph", text: ctx.line.text }),
};

/** Evaluation order. The last rule always matches. */
export const BLOCK_RULES: readonly BlockRule[] = [
  delimiterUnit,
  decorativeLine,
  underlineLine,
  underlinedSubsection,
  uppercaseSubsection,
  problemHeader,
  colonSubsection,
  warningCallout,
  noteCallout,
  checklistItem,
  bulletItem,
  numberedItem,
  paragraph,
];

/**
 * Decide which block starts at `cursor` and how many lines it takes.
 * Total: every cursor inside the input yields a decision consuming at
 * least one line.
 */
export function classifyAt(lines: ManualLine[], cursor: number, options: ClassifierOptions): Decision {
  const ctx: RuleContext = { lines, cursor, line: lines[cursor], options };
  for (const rule of BLOCK_RULES) {
    const decision = rule.apply(ctx);
    if (decision) return decision;
  }
  return consume(ctx, "paragraph", 1, { kind: "paragraph", text: ctx.line.text });
}
