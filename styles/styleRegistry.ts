// ─────────────────────────────────────────────────────────────
// Style Registry — Visual style per block kind
// ─────────────────────────────────────────────────────────────
//
// Built explicitly for a brand and passed to each exporter; nothing
// here is global. Sizes are in points.
//
// ─────────────────────────────────────────────────────────────

import type { BlockKind } from "../schema/manualSchema";
import type { ManualBrand } from "./brandConfig";

export type FontWeight = "regular" | "bold";

export interface BlockStyle {
  fontSize: number;
  leading: number;
  weight: FontWeight;
  color: string;
  align: "left" | "center";
  backgroundColor?: string;
  borderColor?: string;
  borderWidth: number;
  padding: number;
  leftIndent: number;
  rightIndent: number;
  spaceBefore: number;
  spaceAfter: number;
  keepWithNext: boolean;
  prefix?: string;             // drawn before the block text
}

export interface CoverStyles {
  brand: BlockStyle;
  title: BlockStyle;
  model: BlockStyle;
  subtitle: BlockStyle;
  notice: BlockStyle;
}

export interface PageChromeStyle {
  fontSize: number;
  copyrightSize: number;
  color: string;
  ruleColor: string;
  ruleWidth: number;
}

export interface StyleRegistry {
  brand: ManualBrand;
  blocks: Record<BlockKind, BlockStyle>;
  cover: CoverStyles;
  chrome: PageChromeStyle;
}

const BASE: BlockStyle = {
  fontSize: 9,
  leading: 12,
  weight: "regular",
  color: "#1a1a1a",
  align: "left",
  borderWidth: 0,
  padding: 0,
  leftIndent: 0,
  rightIndent: 0,
  spaceBefore: 0,
  spaceAfter: 6,
  keepWithNext: false,
};

function style(overrides: Partial<BlockStyle>): BlockStyle {
  return { ...BASE, ...overrides };
}

/**
 * Build the style registry for a brand.
 */
export function createStyleRegistry(brand: ManualBrand): StyleRegistry {
  const c = brand.colors;

  const listItem = style({ color: c.text, spaceAfter: 4, leftIndent: 24 });
  const callout = {
    weight: "bold" as const,
    borderWidth: 2,
    padding: 10,
    leftIndent: 12,
    rightIndent: 12,
    spaceBefore: 10,
    spaceAfter: 10,
  };

  return {
    brand,
    blocks: {
      "major-section-header": style({
        fontSize: 14,
        leading: 16.8,
        weight: "bold",
        color: c.onDark,
        backgroundColor: c.dark,
        padding: 8,
        leftIndent: 12,
        rightIndent: 12,
        spaceBefore: 14,
        spaceAfter: 12,
        keepWithNext: true,
      }),
      "subsection-header": style({
        fontSize: 11,
        leading: 13.2,
        weight: "bold",
        color: c.primary,
        spaceBefore: 14,
        spaceAfter: 8,
        keepWithNext: true,
      }),
      "problem-header": style({ fontSize: 10, leading: 12, weight: "bold", color: c.text, spaceBefore: 12, spaceAfter: 4 }),
      warning: style({ ...callout, color: c.danger, backgroundColor: c.dangerTint, borderColor: c.danger }),
      note: style({ ...callout, color: c.primary, backgroundColor: c.infoTint, borderColor: c.primary }),
      "checklist-item": { ...listItem, prefix: "• " },
      bullet: listItem,
      "numbered-item": listItem,
      paragraph: style({ color: c.text }),
    },
    cover: {
      brand: style({ fontSize: 32, leading: 38.4, weight: "bold", color: c.primary, align: "center", spaceAfter: 6 }),
      title: style({ fontSize: 24, leading: 28.8, weight: "bold", color: c.text, align: "center", spaceAfter: 12 }),
      model: style({ fontSize: 18, leading: 21.6, weight: "bold", color: c.primary, align: "center", spaceAfter: 30 }),
      subtitle: style({ fontSize: 16, leading: 19.2, color: c.muted, align: "center", spaceAfter: 6 }),
      notice: style({ ...callout, color: c.danger, backgroundColor: c.dangerTint, borderColor: c.danger }),
    },
    chrome: {
      fontSize: 9,
      copyrightSize: 8,
      color: c.muted,
      ruleColor: c.primary,
      ruleWidth: 0.5,
    },
  };
}
