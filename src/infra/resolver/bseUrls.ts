import { isSecondaryFilingHost } from "../../core/domain/linkClassifier";

export type AttachmentFolder = "AttachHis" | "AttachLive";

// Viewer pages such as /stockinfo/AnnPdfOpen.aspx?Pname=... carry the file path here.
const EMBEDDED_PATH_PARAM = "pname";

export const hostOf = (baseUrl: string): string =>
  new URL(baseUrl).hostname.replace(/^www\./i, "").toLowerCase();

/**
 * Pulls the file path out of a BSE viewer URL, dropping backslashes in raw or %5C form.
 * Returns null for any URL that is not a BSE viewer link.
 */
export const extractEmbeddedPath = (
  url: string,
  bseBaseUrl: string,
): string | null => {
  if (!isSecondaryFilingHost(url, hostOf(bseBaseUrl))) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  for (const [key, value] of parsed.searchParams) {
    if (key.toLowerCase() !== EMBEDDED_PATH_PARAM) {
      continue;
    }

    const cleaned = value
      .replace(/%5c/gi, "")
      .replace(/\\/g, "")
      .replace(/^\/+/, "")
      .trim();
    return cleaned || null;
  }

  return null;
};

export const directFileUrl = (
  bseBaseUrl: string,
  embeddedPath: string,
  folder: AttachmentFolder,
): string => {
  const base = bseBaseUrl.replace(/\/+$/, "");
  const path = embeddedPath
    .split("/")
    .filter(Boolean)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
  return `${base}/xml-data/corpfiling/${folder}/${path}`;
};
