import type { ContentKind, DocumentCategory } from "../entities/document";

export type ArchiveExtension = "pdf" | "ppt" | "doc";

export type ArchiveNameInput = {
  symbol: string;
  periodLabel: string | null;
  /** Fiscal year of the period key; annual reports are named after it. */
  fiscalYear?: number | null;
  category: DocumentCategory | null;
  extension: ArchiveExtension;
  /** Anchor text, used to infer a category when none was assigned. */
  title?: string;
  /** 1-based position of the document within its company run. */
  index: number;
};

const PATH_HOSTILE = /[<>:"/\\|?*]/g;

const FILE_CATEGORY_NAMES: Record<DocumentCategory, string> = {
  transcript: "transcript",
  presentation: "presentation",
  recording: "recording",
  concall_generic: "concall",
  annual_report: "annual_report",
};

export const sanitizePathSegment = (value: string): string =>
  value.replace(PATH_HOSTILE, "_");

const inferCategoryFromTitle = (title: string): DocumentCategory | null => {
  const lowered = title.toLowerCase();
  if (lowered.includes("annual") || lowered.includes("financial year")) {
    return "annual_report";
  }
  if (lowered.includes("transcript")) {
    return "transcript";
  }
  if (lowered.includes("presentation")) {
    return "presentation";
  }
  return null;
};

const annualReportPeriod = (
  period: string,
  fiscalYear: number | null,
  index: number,
): string => {
  if (fiscalYear !== null) {
    return `FY${fiscalYear}`;
  }
  if (period.toUpperCase().startsWith("FY")) {
    return period;
  }

  const year = /\d{4}/.exec(period)?.[0];
  return year ? `FY${year}` : `FY-undated-${index}`;
};

/**
 * Picks the archive extension from the resolved URL's path, then from the detected content kind.
 */
export const extensionFromUrl = (
  url: string,
  contentKind: ContentKind = "unknown",
): ArchiveExtension => {
  let path = url.toLowerCase();
  try {
    path = new URL(url).pathname.toLowerCase();
  } catch {
    // Not an absolute URL; match against the raw string.
  }

  if (/\.pdf$/.test(path)) {
    return "pdf";
  }
  if (/\.pptx?$/.test(path)) {
    return "ppt";
  }
  if (/\.docx?$/.test(path)) {
    return "doc";
  }

  return contentKind === "unknown" ? "pdf" : contentKind;
};

/**
 * Builds "{symbol}_{period}_{category}.{ext}". Total and pure: missing parts fall back to
 * placeholders and path-hostile characters are replaced with "_".
 */
export const archiveFileName = (input: ArchiveNameInput): string => {
  const category =
    input.category ??
    (input.title ? inferCategoryFromTitle(input.title) : null);

  let period = (input.periodLabel ?? "").trim().replace(/[/\s]+/g, "-");
  if (!period) {
    period = `doc-${input.index}`;
  }
  if (category === "annual_report") {
    period = annualReportPeriod(period, input.fiscalYear ?? null, input.index);
  }

  const categoryName = category ? FILE_CATEGORY_NAMES[category] : "document";
  const symbol = input.symbol.trim() || "UNKNOWN";

  return `${sanitizePathSegment(symbol)}_${sanitizePathSegment(period)}_${categoryName}.${input.extension}`;
};

/**
 * Returns `fileName`, or the first free "-2", "-3", ... variant of it, and records the choice in
 * `used`. Names are compared case-insensitively.
 */
export const claimFileName = (fileName: string, used: Set<string>): string => {
  const dot = fileName.lastIndexOf(".");
  const stem = dot > 0 ? fileName.slice(0, dot) : fileName;
  const extension = dot > 0 ? fileName.slice(dot) : "";

  let claimed = fileName;
  for (let suffix = 2; used.has(claimed.toLowerCase()); suffix += 1) {
    claimed = `${stem}-${suffix}${extension}`;
  }

  used.add(claimed.toLowerCase());
  return claimed;
};
