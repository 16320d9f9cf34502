// ─────────────────────────────────────────────────────────────
// Manual Schema — Block stream produced from plain-text manuals
// ─────────────────────────────────────────────────────────────

/** A single source line, read once from the manual text */
export interface ManualLine {
  raw: string;
  text: string;            // trimmed form used by every rule
  index: number;           // 0-based position in the source
}

/** Block kinds the renderer knows how to draw */
export type BlockKind =
  | "major-section-header"
  | "subsection-header"
  | "problem-header"
  | "warning"
  | "note"
  | "checklist-item"
  | "bullet"
  | "numbered-item"
  | "paragraph";

export interface MajorSectionHeaderBlock {
  readonly kind: "major-section-header";
  readonly title: string;
}

export interface SubsectionHeaderBlock {
  readonly kind: "subsection-header";
  readonly title: string;
}

/** Blocks whose payload is a body of text */
export interface TextBlock<K extends BlockKind> {
  readonly kind: K;
  readonly text: string;
}

/** One classified, typed unit of manual content */
export type ManualBlock =
  | MajorSectionHeaderBlock
  | SubsectionHeaderBlock
  | TextBlock<"problem-header">
  | TextBlock<"warning">
  | TextBlock<"note">
  | TextBlock<"checklist-item">
  | TextBlock<"bullet">
  | TextBlock<"numbered-item">
  | TextBlock<"paragraph">;

/** Names of the classification rules, in evaluation order */
export type RuleName =
  | "major-section"
  | "cover-banner"
  | "stray-delimiter"
  | "trailing-delimiter"
  | "decorative"
  | "underline"
  | "underlined-subsection"
  | "uppercase-subsection"
  | "problem"
  | "colon-subsection"
  | "warning"
  | "note"
  | "checklist"
  | "bullet"
  | "numbered"
  | "paragraph";

/** Half-open line range [start, end) */
export interface LineSpan {
  start: number;
  end: number;
}

/** The outcome of one classification step at a cursor */
export interface Decision {
  rule: RuleName;
  span: LineSpan;
  block?: ManualBlock;       // absent for structural noise
}

/** Something the scanner noticed but did not reinterpret */
export interface ScanDiagnostic {
  lineNumber: number;        // 1-based, for humans
  message: string;
}

export interface ScanResult {
  blocks: ManualBlock[];
  decisions: Decision[];
  diagnostics: ScanDiagnostic[];
  lineCount: number;
}

/** Tunables for the classifier; brand names drive banner detection */
export interface ClassifierOptions {
  brandName: string;
  productLine: string;
  minDelimiterLength: number;
  minUnderlineLength: number;
  maxColonHeaderLength: number;
}

export const DEFAULT_CLASSIFIER_OPTIONS: ClassifierOptions = {
  brandName: "ACME",
  productLine: "TOOLS",
  minDelimiterLength: 10,
  minUnderlineLength: 5,
  maxColonHeaderLength: 80,
};

/** Display text of any block, whichever payload field it carries */
export function blockText(block: ManualBlock): string {
  switch (block.kind) {
    case "major-section-header":
    case "subsection-header":
      return block.title;
    default:
      return block.text;
  }
}

// ── Ingest ─────────────────────────────────────────────────

/** Document formats text can be extracted from */
export type InputFormat = "pdf" | "docx" | "html" | "txt" | "md";

/** Plain text pulled out of a source document */
export interface ExtractedText {
  text: string;
  format: InputFormat;
  pageCount: number;
  failedPages: number[];     // 1-based pages that contributed ""
}
