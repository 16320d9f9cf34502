// ─────────────────────────────────────────────────────────────
// HTML Export — Rendered structure of a manual
// ─────────────────────────────────────────────────────────────

import { strict as assert } from "assert";
import * as cheerio from "cheerio";
import { describe, it } from "node:test";
import { blockStyleToCSS, escapeHtml, renderBlock, renderManualHtml } from "../export/htmlExport";
import type { ManualBlock } from "../schema/manualSchema";
import { ACME_BRAND } from "../styles/brandConfig";
import { createStyleRegistry } from "../styles/styleRegistry";

const registry = createStyleRegistry(ACME_BRAND);

const BLOCKS: ManualBlock[] = [
  { kind: "major-section-header", title: "SAFETY" },
  { kind: "subsection-header", title: "Work Area" },
  { kind: "warning", text: "⚠ WARNING: Keep <children> away." },
  { kind: "checklist-item", text: "Check the chuck." },
  { kind: "paragraph", text: "Tom & Jerry's drill." },
];

describe("renderBlock", () => {
  it("escapes text and applies the checklist prefix", () => {
    const $ = cheerio.load(renderBlock(BLOCKS[3], registry));
    const p = $("p.checklist");
    assert.equal(p.text(), "• Check the chuck.");
    assert.equal(p.attr("class"), "list-item checklist");
  });

  it("styles major sections on the dark brand colour", () => {
    const html = renderBlock(BLOCKS[0], registry);
    assert.ok(html.startsWith('<h1 class="major-section" style="'));
    assert.ok(html.includes("background-color: #004a99"));
  });
});

describe("blockStyleToCSS", () => {
  it("writes a plain paragraph without box rules", () => {
    assert.equal(
      blockStyleToCSS(registry.blocks.paragraph),
      "font-size: 9pt; line-height: 12pt; font-weight: 400; color: #1a1a1a; text-align: left; margin: 0pt 0pt 6pt 0pt"
    );
  });

  it("adds padding, fill, border and keep-with-next", () => {
    const css = blockStyleToCSS(registry.blocks.warning);
    assert.ok(css.endsWith("; padding: 10pt; background-color: #fff5f5; border: 2pt solid #cc0000"));
    assert.ok(blockStyleToCSS(registry.blocks["subsection-header"]).endsWith("; break-after: avoid"));
  });
});

describe("renderManualHtml", () => {
  const html = renderManualHtml(BLOCKS, { model: "AT1001", title: "18V Cordless Drill", year: 2026 }, registry);
  const $ = cheerio.load(html);

  it("builds the cover", () => {
    assert.equal($(".cover-brand").text(), "ACME");
    assert.equal($(".cover-title").text(), "18V Cordless Drill");
    assert.equal($(".cover-model").text(), "MODEL AT1001");
    assert.equal($(".cover-subtitle").text(), "INSTRUCTION MANUAL");
    assert.ok($(".cover-notice").text().startsWith("⚠ IMPORTANT: Please read this manual carefully"));
  });

  it("renders every block in order", () => {
    const body = $("main.manual-body").children();
    assert.equal(body.length, 5);
    assert.deepEqual(
      body.toArray().map((el) => $(el).attr("class")),
      ["major-section", "subsection", "warning-box", "list-item checklist", "body-text"]
    );
    assert.equal($(".warning-box").text(), "⚠ WARNING: Keep <children> away.");
    assert.equal($(".body-text").text(), "Tom & Jerry's drill.");
  });

  it("puts the running header and copyright in the page rules", () => {
    assert.ok(html.includes('@top-left { content: "ACME TOOLS  |  AT1001";'));
    assert.ok(html.includes('@bottom-left { content: "© 2026 ACME Tools";'));
    assert.equal($("title").text(), "ACME Tools AT1001 — 18V Cordless Drill");
  });
});

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    assert.equal(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`), "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;");
  });
});
