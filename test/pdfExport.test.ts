// ─────────────────────────────────────────────────────────────
// PDF Export — Layout traces and a real render
// ─────────────────────────────────────────────────────────────

import { strict as assert } from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { describe, it } from "node:test";
import { PDFDocument } from "pdf-lib";
import { exportManualPdf, hexToRgb, paginateManual, renderManualPdf, toEncodable, wrapText } from "../export/pdfExport";
import type { PageGeometry, TextMeasurer } from "../export/pdfExport";
import { parseManual } from "../parser/blockAggregator";
import type { BlockKind, ManualBlock } from "../schema/manualSchema";
import { ACME_BRAND } from "../styles/brandConfig";
import { createStyleRegistry } from "../styles/styleRegistry";
import type { BlockStyle, StyleRegistry } from "../styles/styleRegistry";

// ── Fixtures ─────────────────────────────────────────────────

/** 200 × 200 page, 180 × 160 content box */
const SMALL: PageGeometry = { width: 200, height: 200, marginTop: 20, marginBottom: 20, marginLeft: 10, marginRight: 10 };

/** Every character is 10 units wide */
const fixedWidth: TextMeasurer = {
  widthOf: (text) => text.length * 10,
  encodable: (text) => text,
};

const plain: BlockStyle = {
  fontSize: 10,
  leading: 18,
  weight: "regular",
  color: "#000000",
  align: "left",
  borderWidth: 0,
  padding: 0,
  leftIndent: 0,
  rightIndent: 0,
  spaceBefore: 0,
  spaceAfter: 0,
  keepWithNext: false,
};

function flatRegistry(overrides: Partial<Record<BlockKind, BlockStyle>> = {}): StyleRegistry {
  const base = createStyleRegistry(ACME_BRAND);
  const blocks: Record<BlockKind, BlockStyle> = {
    "major-section-header": plain,
    "subsection-header": plain,
    "problem-header": plain,
    warning: plain,
    note: plain,
    "checklist-item": plain,
    bullet: plain,
    "numbered-item": plain,
    paragraph: plain,
    ...overrides,
  };
  return { ...base, blocks };
}

function paragraphs(count: number, text = (i: number) => `p${i}`): ManualBlock[] {
  return Array.from({ length: count }, (_, i) => ({ kind: "paragraph" as const, text: text(i) }));
}

// ── wrapText ─────────────────────────────────────────────────

describe("wrapText", () => {
  const measure = (s: string) => s.length * 10;

  it("fills lines greedily", () => {
    assert.deepEqual(wrapText("aaaa bbbb cccc dddd eeee", 140, measure), ["aaaa bbbb cccc", "dddd eeee"]);
  });

  it("breaks an over-long word by character", () => {
    assert.deepEqual(wrapText("abcdefghij", 40, measure), ["abcd", "efgh", "ij"]);
  });

  it("returns one empty line for empty text", () => {
    assert.deepEqual(wrapText("   ", 40, measure), [""]);
  });
});

// ── paginateManual ───────────────────────────────────────────

describe("paginateManual", () => {
  it("starts a new page when a block does not fit", () => {
    const pages = paginateManual(paragraphs(10), flatRegistry(), fixedWidth, SMALL);
    assert.deepEqual(pages.map((p) => p.blocks.length), [8, 2]);
    assert.equal(pages[0].blocks[1].top, 162);
    assert.equal(pages[1].blocks[0].top, 180);
  });

  it("moves a keep-with-next header to the page of its body", () => {
    const registry = flatRegistry({ "subsection-header": { ...plain, keepWithNext: true } });
    const blocks: ManualBlock[] = [
      ...paragraphs(7),
      { kind: "subsection-header", title: "Care" },
      { kind: "paragraph", text: "body" },
    ];
    const pages = paginateManual(blocks, registry, fixedWidth, SMALL);
    assert.deepEqual(pages.map((p) => p.blocks.length), [7, 2]);
    assert.equal(pages[1].blocks[0].block.kind, "subsection-header");
    assert.equal(pages[1].blocks[0].top, 180);
  });

  it("keeps the header in place without keep-with-next", () => {
    const blocks: ManualBlock[] = [
      ...paragraphs(7),
      { kind: "subsection-header", title: "Care" },
      { kind: "paragraph", text: "body" },
    ];
    const pages = paginateManual(blocks, flatRegistry(), fixedWidth, SMALL);
    assert.deepEqual(pages.map((p) => p.blocks.length), [8, 1]);
  });

  it("splits a block taller than a page", () => {
    const text = Array.from({ length: 10 }, (_, i) => String(i).padStart(16, "w")).join(" ");
    const pages = paginateManual([{ kind: "paragraph", text }], flatRegistry(), fixedWidth, SMALL);
    assert.equal(pages.length, 2);
    assert.equal(pages[0].blocks[0].lines.length, 8);
    assert.equal(pages[0].blocks[0].height, 144);
    assert.equal(pages[0].blocks[0].continued, false);
    assert.equal(pages[1].blocks[0].lines.length, 2);
    assert.equal(pages[1].blocks[0].continued, true);
    assert.equal(pages[1].blocks[0].top, 180);
  });

  it("drops space before at the top of a page", () => {
    const registry = flatRegistry({ paragraph: { ...plain, spaceBefore: 10 } });
    const pages = paginateManual(paragraphs(2), registry, fixedWidth, SMALL);
    assert.equal(pages[0].blocks[0].top, 180);
    assert.equal(pages[0].blocks[1].top, 152);
  });
});

// ── Glyphs & colours ─────────────────────────────────────────

describe("toEncodable", () => {
  it("substitutes known glyphs and drops the rest", () => {
    const charset = new Set(Array.from("ABC (!)•", (c) => c.codePointAt(0) ?? 0));
    assert.equal(toEncodable("⚠ A□B✓Z", charset), "(!) A•B•");
  });
});

describe("hexToRgb", () => {
  it("parses long and short forms", () => {
    const red = hexToRgb("#ff0000");
    assert.deepEqual([red.red, red.green, red.blue], [1, 0, 0]);
    const green = hexToRgb("0f0");
    assert.deepEqual([green.red, green.green, green.blue], [0, 1, 0]);
  });

  it("rejects malformed colours", () => {
    assert.throws(() => hexToRgb("#zz"), /Invalid colour: #zz/);
  });
});

// ── Rendering ────────────────────────────────────────────────

describe("renderManualPdf", () => {
  const registry = createStyleRegistry(ACME_BRAND);
  const meta = { model: "AT1001", title: "18V Cordless Drill", year: 2026 };

  it("renders a cover plus one content page for a short manual", async () => {
    const blocks = parseManual(
      "Battery Care\n------------\n⚠WARNING: Do not short the terminals.\n□ Charge before use.\n• Store dry.\n"
    );
    const doc = await PDFDocument.load(await renderManualPdf(blocks, meta, registry));
    assert.equal(doc.getPageCount(), 2);
    assert.equal(doc.getTitle(), "ACME Tools AT1001 — 18V Cordless Drill");
  });

  it("renders only the cover for an empty block stream", async () => {
    const doc = await PDFDocument.load(await renderManualPdf([], meta, registry));
    assert.equal(doc.getPageCount(), 1);
  });

  it("writes the file and reports its page count", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "manual-pdf-"));
    try {
      const out = path.join(dir, "nested", "manual.pdf");
      const result = await exportManualPdf(paragraphs(3, (i) => `Paragraph ${i}.`), meta, registry, out);
      assert.deepEqual(result, { pdfPath: out, pageCount: 2 });
      assert.equal(fs.readFileSync(out).subarray(0, 5).toString("latin1"), "%PDF-");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
