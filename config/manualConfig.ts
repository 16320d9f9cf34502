// ─────────────────────────────────────────────────────────────
// Manual Config — Job list and keyword list, validated on load
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { z } from "zod";

export class ManualConfigError extends Error {
  constructor(message: string, public readonly source: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ManualConfigError";
  }
}

const manualJobSchema = z.object({
  model: z.string().min(1),
  title: z.string().min(1),
  source: z.string().min(1),
  output: z.string().min(1).optional(),
  originalDocument: z.string().min(1).optional(),
  rewrittenText: z.string().min(1).optional(),
});

const manualConfigSchema = z.object({
  brand: z.string().min(1).default("acme"),
  manuals: z.array(manualJobSchema).min(1),
});

const keywordListSchema = z.array(z.string().trim().min(1)).min(1);

export type ManualJob = z.infer<typeof manualJobSchema>;
export type ManualConfig = z.infer<typeof manualConfigSchema>;

/** Config lookup order: explicit path, MANUAL_CONFIG, ./config/manuals.json */
export function resolveConfigPath(explicit?: string | null): string {
  return path.resolve(explicit || process.env.MANUAL_CONFIG || path.join("config", "manuals.json"));
}

export function defaultKeywordsPath(configPath: string): string {
  return path.join(path.dirname(configPath), "keywords.json");
}

function readJSON(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ManualConfigError(`Config file not found: ${filePath}`, filePath);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ManualConfigError(`Invalid JSON in ${filePath}: ${reason}`, filePath);
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Parse a manuals config object. Relative paths are resolved against
 * `baseDir` (the directory holding the config file).
 */
export function parseManualConfig(data: unknown, baseDir: string, source = "<inline>"): ManualConfig {
  const result = manualConfigSchema.safeParse(data);
  if (!result.success) {
    throw new ManualConfigError(`Invalid manual config in ${source}`, source, formatIssues(result.error));
  }

  const resolve = (p: string | undefined) => (p === undefined ? undefined : path.resolve(baseDir, p));
  return {
    brand: result.data.brand,
    manuals: result.data.manuals.map((job) => ({
      ...job,
      source: path.resolve(baseDir, job.source),
      output: resolve(job.output),
      originalDocument: resolve(job.originalDocument),
      rewrittenText: resolve(job.rewrittenText),
    })),
  };
}

export function loadManualConfig(configPath: string): ManualConfig {
  const config = parseManualConfig(readJSON(configPath), path.dirname(configPath), configPath);
  console.log(`[CONFIG] ${config.manuals.length} manual(s) from ${path.basename(configPath)}`);
  return config;
}

export function parseKeywords(data: unknown, source = "<inline>"): string[] {
  const result = keywordListSchema.safeParse(data);
  if (!result.success) {
    throw new ManualConfigError(`Invalid keyword list in ${source}`, source, formatIssues(result.error));
  }
  return result.data;
}

export function loadKeywords(keywordsPath: string): string[] {
  return parseKeywords(readJSON(keywordsPath), keywordsPath);
}
