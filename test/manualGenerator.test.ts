// ─────────────────────────────────────────────────────────────
// Manual Generator & Batch — End-to-end runs in a temp directory
// ─────────────────────────────────────────────────────────────

import { strict as assert } from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { after, before, describe, it } from "node:test";
import { processBatch } from "../batch/batchProcessor";
import type { ManualJob } from "../config/manualConfig";
import type { BlockStreamDocument } from "../export/jsonExport";
import { defaultOutputName, generateManual, generateManuals } from "../pipeline/manualGenerator";
import { ACME_BRAND } from "../styles/brandConfig";
import { createStyleRegistry } from "../styles/styleRegistry";

const MANUAL = [
  "==========",
  "SAFETY",
  "==========",
  "• KEEP GUARDS ON",
  "WARNING: Sharp bit.",
  "",
].join("\n");

function job(model: string, title: string, source: string): ManualJob {
  return { model, title, source };
}

describe("processBatch", () => {
  it("records failures and carries on when asked", async () => {
    const seen: string[] = [];
    const result = await processBatch(
      [job("A", "a", "a.txt"), job("B", "b", "b.txt"), job("C", "c", "c.txt")],
      async (j) => {
        seen.push(j.model);
        if (j.model === "B") throw new Error("no source");
      },
      { continueOnError: true }
    );
    assert.deepEqual(seen, ["A", "B", "C"]);
    assert.equal(result.total, 3);
    assert.equal(result.succeeded, 2);
    assert.equal(result.failed, 1);
    assert.deepEqual(
      result.results.map((r) => [r.model, r.status, r.error]),
      [["A", "success", undefined], ["B", "failed", "no source"], ["C", "success", undefined]]
    );
  });

  it("aborts on the first failure by default", async () => {
    const seen: string[] = [];
    await assert.rejects(
      processBatch([job("A", "a", "a.txt"), job("B", "b", "b.txt")], async (j) => {
        seen.push(j.model);
        throw new Error("boom");
      }),
      { message: "Batch aborted at A: boom" }
    );
    assert.deepEqual(seen, ["A"]);
  });

  it("handles an empty job list", async () => {
    const result = await processBatch([], async () => undefined);
    assert.deepEqual(result, { total: 0, succeeded: 0, failed: 0, results: [] });
  });
});

describe("defaultOutputName", () => {
  it("slugs the title", () => {
    assert.equal(defaultOutputName(job("AT1001", "18V Cordless Drill", "x")), "AT1001_18V_Cordless_Drill_Manual.pdf");
    assert.equal(defaultOutputName(job("AT2", "Drill / Driver (Kit)", "x")), "AT2_Drill_Driver_Kit_Manual.pdf");
  });
});

describe("generateManual", () => {
  const registry = createStyleRegistry(ACME_BRAND);
  let dir = "";

  before(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "manual-gen-"));
    fs.writeFileSync(path.join(dir, "drill.txt"), MANUAL);
  });

  after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes PDF, HTML and JSON beside each other", async () => {
    const outputDir = path.join(dir, "out");
    const result = await generateManual(job("AT1001", "Drill", path.join(dir, "drill.txt")), {
      registry,
      outputDir,
      html: true,
      json: true,
      year: 2026,
    });

    assert.equal(result.pdfPath, path.join(outputDir, "AT1001_Drill_Manual.pdf"));
    assert.equal(result.htmlPath, path.join(outputDir, "AT1001_Drill_Manual.html"));
    assert.equal(result.jsonPath, path.join(outputDir, "AT1001_Drill_Manual.blocks.json"));
    assert.equal(result.pageCount, 2);
    assert.ok(fs.existsSync(result.pdfPath));
    assert.ok(fs.existsSync(path.join(outputDir, "AT1001_Drill_Manual.html")));

    const parsed: BlockStreamDocument = JSON.parse(fs.readFileSync(path.join(outputDir, "AT1001_Drill_Manual.blocks.json"), "utf-8"));
    assert.equal(parsed.model, "AT1001");
    assert.equal(parsed.lineCount, 6);
    assert.deepEqual(parsed.blocks, [
      { kind: "major-section-header", title: "SAFETY" },
      { kind: "subsection-header", title: "• KEEP GUARDS ON" },
      { kind: "warning", text: "WARNING: Sharp bit." },
    ]);
    assert.deepEqual(parsed.diagnostics, [
      { lineNumber: 4, message: 'Upper-case line starting with "•" classified as subsection header: • KEEP GUARDS ON' },
    ]);
  });

  it("honours classifier overrides", async () => {
    const result = await generateManual(job("AT1002", "Drill", path.join(dir, "drill.txt")), {
      registry,
      outputDir: path.join(dir, "out"),
      classifier: { minDelimiterLength: 12 },
    });
    assert.equal(result.scan.blocks[0].kind, "paragraph");
    assert.equal(result.htmlPath, undefined);
  });

  it("reports failing manuals in the batch and renders the rest", async () => {
    const { batch, generated } = await generateManuals(
      {
        brand: "acme",
        manuals: [job("M1", "Missing", path.join(dir, "absent.txt")), job("M2", "Present", path.join(dir, "drill.txt"))],
      },
      { registry, outputDir: path.join(dir, "batch") }
    );
    assert.equal(batch.failed, 1);
    assert.equal(batch.results[0].error, `Manual text file not found: ${path.join(dir, "absent.txt")}`);
    assert.deepEqual(generated.map((g) => g.model), ["M2"]);
    assert.ok(fs.existsSync(path.join(dir, "batch", "M2_Present_Manual.pdf")));
  });
});
