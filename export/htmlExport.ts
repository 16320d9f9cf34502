// ─────────────────────────────────────────────────────────────
// HTML Export — Render a block stream as a printable HTML manual
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import type { ManualBlock } from "../schema/manualSchema";
import type { BlockStyle, StyleRegistry } from "../styles/styleRegistry";

/** What the cover and running header say about the manual */
export interface ManualMeta {
  model: string;
  title: string;
  subtitle?: string;
  year?: number;
}

export const COVER_NOTICE =
  "IMPORTANT: Please read this manual carefully before using your tool. " +
  "Keep it in a safe place for future reference. Failure to follow instructions " +
  "may result in serious injury.";

/** Element and class each block kind maps to */
const BLOCK_ELEMENTS: Record<ManualBlock["kind"], { tag: string; className: string }> = {
  "major-section-header": { tag: "h1", className: "major-section" },
  "subsection-header": { tag: "h2", className: "subsection" },
  "problem-header": { tag: "h3", className: "problem" },
  warning: { tag: "div", className: "warning-box" },
  note: { tag: "div", className: "note-box" },
  "checklist-item": { tag: "p", className: "list-item checklist" },
  bullet: { tag: "p", className: "list-item" },
  "numbered-item": { tag: "p", className: "numbered-item" },
  paragraph: { tag: "p", className: "body-text" },
};

/** Convert a block style to an inline CSS declaration list */
export function blockStyleToCSS(style: BlockStyle): string {
  const rules = [
    `font-size: ${style.fontSize}pt`,
    `line-height: ${style.leading}pt`,
    `font-weight: ${style.weight === "bold" ? 700 : 400}`,
    `color: ${style.color}`,
    `text-align: ${style.align}`,
    `margin: ${style.spaceBefore}pt ${style.rightIndent}pt ${style.spaceAfter}pt ${style.leftIndent}pt`,
  ];
  if (style.padding) rules.push(`padding: ${style.padding}pt`);
  if (style.backgroundColor) rules.push(`background-color: ${style.backgroundColor}`);
  if (style.borderWidth && style.borderColor) rules.push(`border: ${style.borderWidth}pt solid ${style.borderColor}`);
  if (style.keepWithNext) rules.push("break-after: avoid");
  return rules.join("; ");
}

/** Render one block as a single HTML element */
export function renderBlock(block: ManualBlock, registry: StyleRegistry): string {
  const { tag, className } = BLOCK_ELEMENTS[block.kind];
  const style = registry.blocks[block.kind];
  const body = block.kind === "major-section-header" || block.kind === "subsection-header" ? block.title : block.text;
  return `<${tag} class="${className}" style="${blockStyleToCSS(style)}">${escapeHtml((style.prefix ?? "") + body)}</${tag}>`;
}

/**
 * Render a complete HTML manual: cover page, then every block in order.
 * Print CSS supplies the running header and "Page X of Y" footer.
 */
export function renderManualHtml(blocks: ManualBlock[], meta: ManualMeta, registry: StyleRegistry): string {
  const { brand, cover, chrome } = registry;
  const year = meta.year ?? new Date().getFullYear();
  const runningHeader = `${brand.name} ${brand.productLine}  |  ${meta.model}`;
  const body = blocks.map((b) => `      ${renderBlock(b, registry)}`).join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="generator" content="manual-pipeline">
  <title>${escapeHtml(`${brand.displayName} ${meta.model} — ${meta.title}`)}</title>
  <style>
    @page {
      size: letter;
      margin: 0.75in 0.6in;
      @top-left { content: "${escapeCSSString(runningHeader)}"; font-size: ${chrome.fontSize}pt; color: ${chrome.color}; }
      @top-right { content: "${escapeCSSString(meta.title)}"; font-size: ${chrome.fontSize}pt; color: ${chrome.color}; }
      @bottom-left { content: "© ${year} ${escapeCSSString(brand.displayName)}"; font-size: ${chrome.copyrightSize}pt; color: ${chrome.color}; }
      @bottom-center { content: "Page " counter(page) " of " counter(pages); font-size: ${chrome.fontSize}pt; color: ${chrome.color}; }
    }
    @page :first {
      @top-left { content: none; }
      @top-right { content: none; }
      @bottom-left { content: none; }
      @bottom-center { content: none; }
    }
    body { font-family: Helvetica, Arial, sans-serif; margin: 0; }
    .cover { break-after: page; padding-top: 1.8in; }
    .warning-box, .note-box { break-inside: avoid; }
  </style>
</head>
<body>
  <section class="cover">
    <div class="cover-brand" style="${blockStyleToCSS(cover.brand)}">${escapeHtml(brand.name)}</div>
    <div class="cover-title" style="${blockStyleToCSS(cover.title)}">${escapeHtml(meta.title)}</div>
    <div class="cover-model" style="${blockStyleToCSS(cover.model)}">MODEL ${escapeHtml(meta.model)}</div>
    <div class="cover-subtitle" style="${blockStyleToCSS(cover.subtitle)}">${escapeHtml(meta.subtitle ?? "INSTRUCTION MANUAL")}</div>
    <div class="cover-notice" style="${blockStyleToCSS(cover.notice)}">⚠ ${escapeHtml(COVER_NOTICE)}</div>
  </section>
  <main class="manual-body">
${body}
  </main>
</body>
</html>
`;
}

/**
 * Write the rendered manual to `outputPath`, creating directories.
 */
export function exportManualHtml(
  blocks: ManualBlock[],
  meta: ManualMeta,
  registry: StyleRegistry,
  outputPath: string
): string {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  fs.writeFileSync(outputPath, renderManualHtml(blocks, meta, registry), "utf-8");
  console.log(`[EXPORT] HTML → ${outputPath}`);
  return outputPath;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function escapeCSSString(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}
