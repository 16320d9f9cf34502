// ─────────────────────────────────────────────────────────────
// Line Rules — Predicates the classifier is built from
// ─────────────────────────────────────────────────────────────

import { strict as assert } from "assert";
import { describe, it } from "node:test";
import {
  endsWithColon,
  isBrandBanner,
  isBulletStart,
  isCalloutTerminator,
  isDecorativeLine,
  isDelimiterLine,
  isUnderlineLine,
  isUpperCaseLine,
  normalizeWarningGlyphs,
  stripHeaderColon,
  toManualLines,
} from "../parser/lineRules";
import { DEFAULT_CLASSIFIER_OPTIONS } from "../schema/manualSchema";

const opts = DEFAULT_CLASSIFIER_OPTIONS;

describe("toManualLines", () => {
  it("keeps the raw line and trims the text", () => {
    assert.deepEqual(toManualLines("  a \n\tb\n"), [
      { raw: "  a ", text: "a", index: 0 },
      { raw: "\tb", text: "b", index: 1 },
      { raw: "", text: "", index: 2 },
    ]);
  });
});

describe("isUpperCaseLine", () => {
  it("needs a cased character and no lower case", () => {
    assert.equal(isUpperCaseLine("SAFETY RULES"), true);
    assert.equal(isUpperCaseLine("1. CHECK"), true);
    assert.equal(isUpperCaseLine("Battery Care"), false);
    assert.equal(isUpperCaseLine("=========="), false);
    assert.equal(isUpperCaseLine("12."), false);
    assert.equal(isUpperCaseLine(""), false);
  });
});

describe("delimiter and underline runs", () => {
  it("requires the configured minimum length", () => {
    assert.equal(isDelimiterLine("=".repeat(10), opts), true);
    assert.equal(isDelimiterLine("=".repeat(9), opts), false);
    assert.equal(isDelimiterLine("=".repeat(8), { ...opts, minDelimiterLength: 8 }), true);
    assert.equal(isUnderlineLine("-----", opts), true);
    assert.equal(isUnderlineLine("----", opts), false);
  });

  it("rejects mixed characters", () => {
    assert.equal(isDelimiterLine("==========x", opts), false);
    assert.equal(isUnderlineLine("--- ---", opts), false);
  });
});

describe("isDecorativeLine", () => {
  it("matches cover furniture", () => {
    assert.equal(isDecorativeLine("", opts), true);
    assert.equal(isDecorativeLine("ACME POWER TOOLS", opts), true);
    assert.equal(isDecorativeLine("MODEL: AT1001", opts), true);
    assert.equal(isDecorativeLine("INSTRUCTION MANUAL", opts), true);
  });

  it("leaves ordinary text alone", () => {
    assert.equal(isDecorativeLine("Instruction manual", opts), false);
    assert.equal(isDecorativeLine("ACME CORDLESS RANGE", opts), false);
  });

  it("follows the configured brand", () => {
    const other = { ...opts, brandName: "ZENITH", productLine: "GARDEN" };
    assert.equal(isDecorativeLine("ZENITH GARDEN", other), true);
    assert.equal(isDecorativeLine("ACME POWER TOOLS", other), false);
  });
});

describe("isBrandBanner", () => {
  it("matches titles that open with the brand word", () => {
    assert.equal(isBrandBanner("ACME CORDLESS RANGE", opts), true);
    assert.equal(isBrandBanner("ACMEX", opts), false);
  });
});

describe("isBulletStart", () => {
  it("accepts • and '- ' prefixes only", () => {
    assert.equal(isBulletStart("• Keep clean."), true);
    assert.equal(isBulletStart("- Keep clean."), true);
    assert.equal(isBulletStart("-"), false);
    assert.equal(isBulletStart("-x"), false);
    assert.equal(isBulletStart("-- "), false);
  });
});

describe("colon headers", () => {
  it("has a length ceiling", () => {
    assert.equal(endsWithColon("Before each use:", opts), true);
    assert.equal(endsWithColon(`${"x".repeat(79)}:`, opts), false);
  });

  it("strips trailing colons, then dashes", () => {
    assert.equal(stripHeaderColon("Work Area Safety:"), "Work Area Safety");
    assert.equal(stripHeaderColon("Setup --:"), "Setup");
    assert.equal(stripHeaderColon("Specs::"), "Specs");
  });
});

describe("isCalloutTerminator", () => {
  it("stops on structure", () => {
    assert.equal(isCalloutTerminator("", opts), true);
    assert.equal(isCalloutTerminator("- dash item", opts), true);
    assert.equal(isCalloutTerminator("3. Third step", opts), true);
    assert.equal(isCalloutTerminator("Next section:", opts), true);
    assert.equal(isCalloutTerminator("PROBLEM: Motor hums.", opts), true);
    assert.equal(isCalloutTerminator("CAUTION: Hot.", opts), true);
    assert.equal(isCalloutTerminator("MAINTENANCE", opts), true);
    assert.equal(isCalloutTerminator("□ Gloves", opts), true);
  });

  it("continues through prose", () => {
    assert.equal(isCalloutTerminator("Keep away from water.", opts), false);
  });
});

describe("normalizeWarningGlyphs", () => {
  it("puts exactly one space after the glyph", () => {
    assert.equal(normalizeWarningGlyphs("⚠WARNING: Hot"), "⚠ WARNING: Hot");
    assert.equal(normalizeWarningGlyphs("⚠   WARNING"), "⚠ WARNING");
    assert.equal(normalizeWarningGlyphs("WARNING: Hot ⚠"), "WARNING: Hot ⚠");
  });
});
