#!/usr/bin/env node
// ─────────────────────────────────────────────────────────────
// Manual Pipeline — Main Application Controller
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   manual-pipeline <file.txt> --model <M> --title <T> [options]
//   manual-pipeline --parse <file.txt> [options]
//   manual-pipeline --batch [--config <path>] [options]
//   manual-pipeline --audit [--config <path>] [--keywords <path>]
//
// Examples:
//   manual-pipeline ./manuals/AT1001_Drill_Manual.txt --model AT1001 --title "18V Cordless Drill" --html
//   manual-pipeline --parse ./manuals/AT1001_Drill_Manual.txt --min-delimiter 8
//   manual-pipeline --batch --config ./config/manuals.json --json
//   manual-pipeline --audit
//
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { auditManuals, formatAuditReport } from "./audit/complianceAuditor";
import { printBatchSummary } from "./batch/batchProcessor";
import { defaultKeywordsPath, loadKeywords, loadManualConfig, resolveConfigPath } from "./config/manualConfig";
import { readManualText } from "./ingest";
import { countBlocks, scanManual } from "./parser/blockAggregator";
import { generateManual, generateManuals } from "./pipeline/manualGenerator";
import type { GenerateOptions } from "./pipeline/manualGenerator";
import { blockText } from "./schema/manualSchema";
import type { ClassifierOptions } from "./schema/manualSchema";
import { classifierOptionsFor, getBrand, listBrands } from "./styles/brandConfig";
import { createStyleRegistry } from "./styles/styleRegistry";

// ── CLI Argument Parsing ─────────────────────────────────────

interface CLIOptions {
  filePath: string;
  model: string | null;
  title: string | null;
  parse: string | null;
  batch: boolean;
  audit: boolean;
  config: string | null;
  keywords: string | null;
  outputDir: string;
  brand: string | null;
  minDelimiter: number | null;
  html: boolean;
  json: boolean;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const getFlag = (flag: string): string | null => {
    const idx = args.indexOf(flag);
    return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : null;
  };

  // Determine the file path: skip flags and their values
  let filePath = "";
  const flagsWithValues = new Set([
    "--model", "--title", "--parse", "--config", "--keywords",
    "--output", "--brand", "--min-delimiter",
  ]);
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (flagsWithValues.has(arg)) i++; // skip the value too
      continue;
    }
    filePath = arg;
    break;
  }

  const minDelimiterFlag = getFlag("--min-delimiter");

  return {
    filePath,
    model: getFlag("--model"),
    title: getFlag("--title"),
    parse: getFlag("--parse"),
    batch: args.includes("--batch"),
    audit: args.includes("--audit"),
    config: getFlag("--config"),
    keywords: getFlag("--keywords"),
    outputDir: getFlag("--output") || process.env.MANUAL_OUTPUT_DIR || "./output",
    brand: getFlag("--brand") || process.env.MANUAL_BRAND || null,
    minDelimiter: minDelimiterFlag === null ? null : parsePositiveInt(minDelimiterFlag, "--min-delimiter"),
    html: args.includes("--html"),
    json: args.includes("--json"),
  };
}

function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    console.error(`[ERROR] ${flag} expects a positive integer, got "${value}"`);
    process.exit(1);
  }
  return n;
}

function printHelp(): void {
  console.log(`
Manual Pipeline — plain-text manuals to branded PDF, plus compliance audit

USAGE:
  manual-pipeline <file.txt> --model <M> --title <T> [options]
  manual-pipeline --parse <file.txt> [options]
  manual-pipeline --batch [options]
  manual-pipeline --audit [options]

MODES:
  <file.txt>          Render one manual (requires --model and --title)
  --parse <file>      Print the classified block stream and diagnostics
  --batch             Render every manual listed in the config
  --audit             Check each original/rewrite pair for dropped keywords

OPTIONS:
  --model <M>         Model number shown on the cover and running header
  --title <T>         Manual title
  --html              Also write an HTML rendition
  --json              Also write the block stream as JSON
  --config <path>     Manual config (default: $MANUAL_CONFIG or ./config/manuals.json)
  --keywords <path>   Keyword list (default: keywords.json beside the config)
  --output <dir>      Output directory (default: $MANUAL_OUTPUT_DIR or ./output)
  --brand <key>       Brand: ${listBrands().join(" | ")} (default: $MANUAL_BRAND or config)
  --min-delimiter <n> Shortest "=" run treated as a section delimiter (default: 10)
  --help, -h          Show this help message
`);
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseArgs();
  const classifier: Partial<ClassifierOptions> =
    options.minDelimiter === null ? {} : { minDelimiterLength: options.minDelimiter };

  console.log("");
  console.log("═══════════════════════════════════════════════════════");
  console.log("  MANUAL PIPELINE");
  console.log("═══════════════════════════════════════════════════════");
  console.log("");

  // ── Audit mode ─────────────────────────────────────────────
  if (options.audit) {
    const configPath = resolveConfigPath(options.config);
    const config = loadManualConfig(configPath);
    const keywords = loadKeywords(options.keywords ? path.resolve(options.keywords) : defaultKeywordsPath(configPath));
    console.log(`[AUDIT] ${keywords.length} keyword(s)`);
    console.log("");

    const reports = await auditManuals(config.manuals, keywords);
    for (const report of reports) {
      console.log(formatAuditReport(report));
    }
    console.log("=".repeat(72));

    if (reports.some((r) => r.status === "failed")) {
      process.exit(1);
    }
    return;
  }

  // ── Batch mode ─────────────────────────────────────────────
  if (options.batch) {
    const config = loadManualConfig(resolveConfigPath(options.config));
    const brand = getBrand(options.brand || config.brand);
    const { batch } = await generateManuals(config, generateOptions(options, brand.key, classifier));
    printBatchSummary(batch);
    if (batch.failed > 0) {
      process.exit(1);
    }
    return;
  }

  // ── Parse-only mode ────────────────────────────────────────
  if (options.parse) {
    const brand = getBrand(options.brand || "acme");
    const scan = scanManual(readManualText(path.resolve(options.parse)), classifierOptionsFor(brand, classifier));

    for (const block of scan.blocks) {
      console.log(`${block.kind.padEnd(22)} ${blockText(block)}`);
    }
    console.log("");
    for (const d of scan.diagnostics) {
      console.warn(`[PARSE] ⚠ line ${d.lineNumber}: ${d.message}`);
    }
    const counts = Object.entries(countBlocks(scan.blocks)).map(([k, n]) => `${k}=${n}`).join(" ");
    console.log(`[PARSE] ${scan.lineCount} lines → ${scan.blocks.length} blocks (${counts})`);
    return;
  }

  // ── Single manual ──────────────────────────────────────────
  if (!options.filePath) {
    console.error("[ERROR] No file specified. Use --help for usage.");
    process.exit(1);
  }
  if (!options.model || !options.title) {
    console.error("[ERROR] --model and --title are required when rendering a single manual.");
    process.exit(1);
  }

  const absolutePath = path.resolve(options.filePath);
  if (!fs.existsSync(absolutePath)) {
    console.error(`[ERROR] File not found: ${absolutePath}`);
    process.exit(1);
  }

  const brand = getBrand(options.brand || "acme");
  const result = await generateManual(
    { model: options.model, title: options.title, source: absolutePath },
    generateOptions(options, brand.key, classifier)
  );

  console.log("");
  console.log(`[DONE] ${result.model}: ${result.pageCount} page(s) → ${result.pdfPath}`);
}

function generateOptions(options: CLIOptions, brandKey: string, classifier: Partial<ClassifierOptions>): GenerateOptions {
  return {
    registry: createStyleRegistry(getBrand(brandKey)),
    outputDir: path.resolve(options.outputDir),
    html: options.html,
    json: options.json,
    classifier,
  };
}

// ── Run ──────────────────────────────────────────────────────

main().catch((err: unknown) => {
  console.error("\n[FATAL ERROR]", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
