// ─────────────────────────────────────────────────────────────
// Brand Configuration — Identity used on covers, headers, footers
// ─────────────────────────────────────────────────────────────

import type { ClassifierOptions } from "../schema/manualSchema";
import { DEFAULT_CLASSIFIER_OPTIONS } from "../schema/manualSchema";

/** Brand identity for a family of manuals */
export interface ManualBrand {
  key: string;
  name: string;               // banner word on covers, e.g. "ACME"
  productLine: string;        // second banner word, e.g. "TOOLS"
  displayName: string;        // used in footers and copyright
  tagline?: string;
  colors: {
    primary: string;
    dark: string;
    text: string;
    muted: string;
    danger: string;
    dangerTint: string;
    infoTint: string;
    onDark: string;
  };
}

/**
 * ACME — default brand for the sample manuals.
 */
export const ACME_BRAND: ManualBrand = {
  key: "acme",
  name: "ACME",
  productLine: "TOOLS",
  displayName: "ACME Tools",
  tagline: "Built for the Job",
  colors: {
    primary: "#0066cc",
    dark: "#004a99",
    text: "#1a1a1a",
    muted: "#666666",
    danger: "#cc0000",
    dangerTint: "#fff5f5",
    infoTint: "#f0f8ff",
    onDark: "#ffffff",
  },
};

/**
 * Monochrome brand — for print runs without spot colour.
 */
export const MONO_BRAND: ManualBrand = {
  key: "mono",
  name: "ACME",
  productLine: "TOOLS",
  displayName: "ACME Tools",
  colors: {
    primary: "#111111",
    dark: "#333333",
    text: "#111111",
    muted: "#555555",
    danger: "#111111",
    dangerTint: "#eeeeee",
    infoTint: "#f6f6f6",
    onDark: "#ffffff",
  },
};

const BRANDS: Record<string, ManualBrand> = {
  acme: ACME_BRAND,
  mono: MONO_BRAND,
};

/**
 * Get brand configuration by key; unknown keys fall back to ACME.
 */
export function getBrand(key: string): ManualBrand {
  return BRANDS[key.toLowerCase()] || ACME_BRAND;
}

export function listBrands(): string[] {
  return Object.keys(BRANDS);
}

/** Classifier options whose banner detection matches this brand */
export function classifierOptionsFor(brand: ManualBrand, overrides: Partial<ClassifierOptions> = {}): ClassifierOptions {
  return {
    ...DEFAULT_CLASSIFIER_OPTIONS,
    brandName: brand.name,
    productLine: brand.productLine,
    ...overrides,
  };
}
