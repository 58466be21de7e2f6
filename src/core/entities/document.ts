import type { PeriodKey } from "./period";

export const concallCategories = [
  "transcript",
  "presentation",
  "recording",
  "concall_generic",
] as const;

export type ConcallCategory = (typeof concallCategories)[number];

export type DocumentCategory = ConcallCategory | "annual_report";

export const isConcallCategory = (
  category: DocumentCategory,
): category is ConcallCategory => category !== "annual_report";

export type DocumentCandidate = {
  readonly title: string;
  readonly url: string;
  readonly category: DocumentCategory;
  readonly period: PeriodKey;
  readonly source: "structured" | "generic";
};

export type ContentKind = "pdf" | "ppt" | "doc" | "unknown";

export type ResolvedResource = {
  finalUrl: string;
  contentKind: ContentKind;
  verified: boolean;
  strategy: string;
};

/**
 * A verified resource together with the bytes fetched while verifying it.
 */
export type ResolvedDocument = {
  resource: ResolvedResource;
  body: Uint8Array;
};

export type SelectedDocument = {
  candidate: DocumentCandidate;
  resolved: ResolvedDocument;
};

export type UnavailableDocument = {
  label: string | null;
  category: DocumentCategory;
  url: string;
  reason: string;
};

export type CompanyProfile = {
  displayName: string;
  symbol: string;
  profileUrl: string;
  concalls: SelectedDocument[];
  annualReports: SelectedDocument[];
};

/**
 * A file already present in a company's archive directory.
 */
export type ArchivedFile = {
  name: string;
  sizeBytes: number;
  modifiedAt: Date;
};
