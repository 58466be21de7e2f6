/**
 * Running totals owned by the caller of an archive run.
 */
export type ArchiveProgress = {
  companiesProcessed: number;
  companiesFailed: number;
  documentsDownloaded: number;
  documentsFailed: number;
};

export type ProgressEventKind = "status" | "success" | "error" | "warning";

export type ProgressEvent = {
  kind: ProgressEventKind;
  message: string;
  symbol?: string;
  totals: ArchiveProgress;
};

export const emptyProgress = (): ArchiveProgress => ({
  companiesProcessed: 0,
  companiesFailed: 0,
  documentsDownloaded: 0,
  documentsFailed: 0,
});
