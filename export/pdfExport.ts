// ─────────────────────────────────────────────────────────────
// PDF Export — Paginate a block stream and draw it with pdf-lib
// ─────────────────────────────────────────────────────────────
//
// Two passes: paginateManual() places wrapped lines on pages using
// only text widths, then renderManualPdf() draws the cover, the
// placed blocks, and finally the running header / "Page X of Y"
// footer once the page total is known.
//
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFPage } from "pdf-lib";
import { blockText, type ManualBlock } from "../schema/manualSchema";
import type { BlockStyle, FontWeight, StyleRegistry } from "../styles/styleRegistry";
import { COVER_NOTICE, type ManualMeta } from "./htmlExport";

// ── Geometry ─────────────────────────────────────────────────

export interface PageGeometry {
  width: number;
  height: number;
  marginTop: number;
  marginBottom: number;
  marginLeft: number;
  marginRight: number;
}

const INCH = 72;

/** US Letter with room above and below for the running header/footer */
export const LETTER: PageGeometry = {
  width: 8.5 * INCH,
  height: 11 * INCH,
  marginTop: 0.75 * INCH,
  marginBottom: 0.75 * INCH,
  marginLeft: 0.6 * INCH,
  marginRight: 0.6 * INCH,
};

/** Text measurement, plus the font's view of which characters it can draw */
export interface TextMeasurer {
  widthOf(text: string, weight: FontWeight, size: number): number;
  encodable(text: string): string;
}

export interface PlacedBlock {
  block: ManualBlock;
  style: BlockStyle;
  lines: string[];
  top: number;               // y of the box's top edge
  height: number;
  continued: boolean;        // true for the second and later fragments of a split block
}

export interface LaidOutPage {
  blocks: PlacedBlock[];
}

// ── Layout ───────────────────────────────────────────────────

/**
 * Greedy word wrap. A single word wider than the line is broken by
 * character.
 */
export function wrapText(text: string, maxWidth: number, measure: (s: string) => number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length === 0) return [""];

  const lines: string[] = [];
  let current = "";

  const pushWord = (word: string) => {
    if (measure(word) <= maxWidth) {
      current = word;
      return;
    }
    let chunk = "";
    for (const char of word) {
      if (chunk && measure(chunk + char) > maxWidth) {
        lines.push(chunk);
        chunk = "";
      }
      chunk += char;
    }
    current = chunk;
  };

  for (const word of words) {
    if (!current) {
      pushWord(word);
      continue;
    }
    const candidate = `${current} ${word}`;
    if (measure(candidate) <= maxWidth) {
      current = candidate;
    } else {
      lines.push(current);
      pushWord(word);
    }
  }
  if (current) lines.push(current);
  return lines;
}

function boxHeight(lineCount: number, style: BlockStyle): number {
  return lineCount * style.leading + 2 * style.padding;
}

/**
 * Place every block on pages. Headers marked keep-with-next move to a
 * new page when the first line of the following block would not fit
 * beneath them; blocks taller than a whole page are split by line.
 */
export function paginateManual(
  blocks: ManualBlock[],
  registry: StyleRegistry,
  measurer: TextMeasurer,
  geometry: PageGeometry = LETTER
): LaidOutPage[] {
  const contentTop = geometry.height - geometry.marginTop;
  const contentBottom = geometry.marginBottom;
  const contentWidth = geometry.width - geometry.marginLeft - geometry.marginRight;

  const pages: LaidOutPage[] = [{ blocks: [] }];
  let page = pages[0];
  let cursor = contentTop;

  const newPage = () => {
    page = { blocks: [] };
    pages.push(page);
    cursor = contentTop;
  };

  blocks.forEach((block, index) => {
    const style = registry.blocks[block.kind];
    const text = measurer.encodable((style.prefix ?? "") + blockText(block));
    const maxWidth = contentWidth - style.leftIndent - style.rightIndent - 2 * style.padding;
    let lines = wrapText(text, maxWidth, (s) => measurer.widthOf(s, style.weight, style.fontSize));

    const spaceBefore = () => (page.blocks.length > 0 ? style.spaceBefore : 0);
    let needed = spaceBefore() + boxHeight(lines.length, style);

    const next = blocks[index + 1];
    if (style.keepWithNext && next) {
      const nextStyle = registry.blocks[next.kind];
      needed += style.spaceAfter + nextStyle.spaceBefore + nextStyle.leading + 2 * nextStyle.padding;
    }

    if (cursor - needed < contentBottom && page.blocks.length > 0) {
      newPage();
    }

    let continued = false;
    while (lines.length > 0) {
      const top = cursor - spaceBefore();
      const room = Math.floor((top - contentBottom - 2 * style.padding) / style.leading);
      if (room < 1 && page.blocks.length > 0) {
        newPage();
        continue;
      }

      const take = Math.max(1, Math.min(lines.length, room));
      const fragment = lines.slice(0, take);
      const height = boxHeight(fragment.length, style);
      page.blocks.push({ block, style, lines: fragment, top, height, continued });
      cursor = top - height - style.spaceAfter;

      lines = lines.slice(take);
      if (lines.length > 0) {
        continued = true;
        newPage();
      }
    }
  });

  return pages;
}

// ── Drawing ──────────────────────────────────────────────────

/** Stand-ins for glyphs the standard PDF fonts cannot encode */
const GLYPH_FALLBACKS: Record<string, string> = {
  "⚠": "(!)",
  "□": "•",
  "✓": "•",
  "\t": " ",
};

/** Replace or drop characters outside `charset` (Unicode code points) */
export function toEncodable(text: string, charset: ReadonlySet<number>): string {
  let out = "";
  for (const char of text) {
    const replacement = GLYPH_FALLBACKS[char] ?? char;
    for (const c of replacement) {
      const code = c.codePointAt(0);
      if (code !== undefined && charset.has(code)) out += c;
    }
  }
  return out;
}

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
}

function fontsMeasurer(fonts: Fonts): TextMeasurer {
  const charset = new Set(fonts.regular.getCharacterSet());
  return {
    widthOf: (text, weight, size) => fonts[weight].widthOfTextAtSize(text, size),
    encodable: (text) => toEncodable(text, charset),
  };
}

type RgbColor = ReturnType<typeof rgb>;

export function hexToRgb(hex: string): RgbColor {
  const value = hex.replace(/^#/, "");
  const full = value.length === 3 ? value.split("").map((c) => c + c).join("") : value;
  const n = parseInt(full, 16);
  if (full.length !== 6 || Number.isNaN(n)) {
    throw new Error(`Invalid colour: ${hex}`);
  }
  return rgb(((n >> 16) & 0xff) / 255, ((n >> 8) & 0xff) / 255, (n & 0xff) / 255);
}

function drawBox(page: PDFPage, x: number, top: number, width: number, height: number, style: BlockStyle): void {
  if (!style.backgroundColor && !style.borderWidth) return;
  page.drawRectangle({
    x,
    y: top - height,
    width,
    height,
    color: style.backgroundColor ? hexToRgb(style.backgroundColor) : undefined,
    borderColor: style.borderColor ? hexToRgb(style.borderColor) : undefined,
    borderWidth: style.borderColor ? style.borderWidth : 0,
  });
}

function drawLines(
  page: PDFPage,
  lines: string[],
  x: number,
  top: number,
  width: number,
  style: BlockStyle,
  fonts: Fonts
): void {
  const font = fonts[style.weight];
  const color = hexToRgb(style.color);
  lines.forEach((line, i) => {
    const lineWidth = font.widthOfTextAtSize(line, style.fontSize);
    const lineX = style.align === "center" ? x + (width - lineWidth) / 2 : x;
    const baseline = top - i * style.leading - style.fontSize;
    page.drawText(line, { x: lineX, y: baseline, size: style.fontSize, font, color });
  });
}

/** Draw a block: optional box, then its wrapped lines inside the padding */
function drawPlaced(page: PDFPage, placed: PlacedBlock, geometry: PageGeometry, fonts: Fonts): void {
  const { style } = placed;
  const x = geometry.marginLeft + style.leftIndent;
  const width = geometry.width - geometry.marginLeft - geometry.marginRight - style.leftIndent - style.rightIndent;
  drawBox(page, x, placed.top, width, placed.height, style);
  drawLines(page, placed.lines, x + style.padding, placed.top - style.padding, width - 2 * style.padding, style, fonts);
}

function drawCover(page: PDFPage, meta: ManualMeta, registry: StyleRegistry, measurer: TextMeasurer, fonts: Fonts): void {
  const { cover, brand } = registry;
  const geometry = LETTER;
  const x = geometry.marginLeft;
  const width = geometry.width - geometry.marginLeft - geometry.marginRight;
  let top = geometry.height - 1.8 * INCH;

  const entries: Array<[string, BlockStyle, number]> = [
    [brand.name, cover.brand, 0.1 * INCH],
    [meta.title, cover.title, 0.3 * INCH],
    [`MODEL ${meta.model}`, cover.model, 0.6 * INCH],
    [meta.subtitle ?? "INSTRUCTION MANUAL", cover.subtitle, 1.2 * INCH],
  ];

  for (const [text, style, gap] of entries) {
    const lines = wrapText(measurer.encodable(text), width, (s) => measurer.widthOf(s, style.weight, style.fontSize));
    drawLines(page, lines, x, top, width, style, fonts);
    top -= lines.length * style.leading + style.spaceAfter + gap;
  }

  const notice = cover.notice;
  const boxX = x + notice.leftIndent;
  const boxWidth = width - notice.leftIndent - notice.rightIndent;
  const noticeLines = wrapText(
    measurer.encodable(`⚠ ${COVER_NOTICE}`),
    boxWidth - 2 * notice.padding,
    (s) => measurer.widthOf(s, notice.weight, notice.fontSize)
  );
  const height = boxHeight(noticeLines.length, notice);
  drawBox(page, boxX, top, boxWidth, height, notice);
  drawLines(page, noticeLines, boxX + notice.padding, top - notice.padding, boxWidth - 2 * notice.padding, notice, fonts);
}

/** Running header and footer on every page except the cover */
function drawDecorations(pages: PDFPage[], meta: ManualMeta, registry: StyleRegistry, measurer: TextMeasurer, fonts: Fonts): void {
  const { chrome, brand } = registry;
  const geometry = LETTER;
  const left = 0.75 * INCH;
  const right = geometry.width - 0.75 * INCH;
  const color = hexToRgb(chrome.color);
  const ruleColor = hexToRgb(chrome.ruleColor);
  const year = meta.year ?? new Date().getFullYear();
  const font = fonts.regular;

  const headerLeft = measurer.encodable(`${brand.name} ${brand.productLine}  |  ${meta.model}`);
  const headerRight = measurer.encodable(meta.title);
  const copyright = measurer.encodable(`© ${year} ${brand.displayName}`);

  pages.forEach((page, index) => {
    if (index === 0) return;
    const headerY = geometry.height - 0.5 * INCH;
    const ruleY = geometry.height - 0.55 * INCH;

    page.drawText(headerLeft, { x: left, y: headerY, size: chrome.fontSize, font, color });
    const titleWidth = font.widthOfTextAtSize(headerRight, chrome.fontSize);
    page.drawText(headerRight, { x: right - titleWidth, y: headerY, size: chrome.fontSize, font, color });

    page.drawLine({ start: { x: left, y: ruleY }, end: { x: right, y: ruleY }, thickness: chrome.ruleWidth, color: ruleColor });
    page.drawLine({ start: { x: left, y: 0.65 * INCH }, end: { x: right, y: 0.65 * INCH }, thickness: chrome.ruleWidth, color: ruleColor });

    const pageText = `Page ${index + 1} of ${pages.length}`;
    const pageTextWidth = font.widthOfTextAtSize(pageText, chrome.fontSize);
    page.drawText(pageText, { x: (geometry.width - pageTextWidth) / 2, y: 0.5 * INCH, size: chrome.fontSize, font, color });
    page.drawText(copyright, { x: left, y: 0.5 * INCH, size: chrome.copyrightSize, font, color });
  });
}

/**
 * Render a manual to PDF bytes: cover page, then the paginated blocks.
 */
export async function renderManualPdf(blocks: ManualBlock[], meta: ManualMeta, registry: StyleRegistry): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle(`${registry.brand.displayName} ${meta.model} — ${meta.title}`);
  doc.setAuthor(registry.brand.displayName);
  doc.setCreator("manual-pipeline");

  const [regular, bold] = await Promise.all([
    doc.embedFont(StandardFonts.Helvetica),
    doc.embedFont(StandardFonts.HelveticaBold),
  ]);
  const fonts: Fonts = { regular, bold };
  const measurer = fontsMeasurer(fonts);

  drawCover(doc.addPage([LETTER.width, LETTER.height]), meta, registry, measurer, fonts);

  const laidOut = paginateManual(blocks, registry, measurer, LETTER);
  for (const laid of laidOut) {
    if (laid.blocks.length === 0) continue;
    const page = doc.addPage([LETTER.width, LETTER.height]);
    for (const placed of laid.blocks) {
      drawPlaced(page, placed, LETTER, fonts);
    }
  }

  drawDecorations(doc.getPages(), meta, registry, measurer, fonts);
  return doc.save();
}

/**
 * Render and write a manual PDF, creating the output directory.
 */
export async function exportManualPdf(
  blocks: ManualBlock[],
  meta: ManualMeta,
  registry: StyleRegistry,
  outputPath: string
): Promise<{ pdfPath: string; pageCount: number }> {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const bytes = await renderManualPdf(blocks, meta, registry);
  fs.writeFileSync(outputPath, bytes);

  const pageCount = (await PDFDocument.load(bytes)).getPageCount();
  console.log(`[EXPORT] PDF → ${outputPath} (${pageCount} pages)`);
  return { pdfPath: outputPath, pageCount };
}
