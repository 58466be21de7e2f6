import type { ContentKind } from "../../core/entities/document";

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46];
// Legacy Office compound file (.ppt, .doc).
const OLE_MAGIC = [0xd0, 0xcf, 0x11, 0xe0];
// Zip container (.pptx, .docx).
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];

const startsWith = (body: Uint8Array, magic: number[]): boolean =>
  body.length >= magic.length && magic.every((byte, index) => body[index] === byte);

export const kindFromSignature = (body: Uint8Array): ContentKind => {
  if (startsWith(body, PDF_MAGIC)) {
    return "pdf";
  }
  // Office containers do not say which application wrote them.
  if (startsWith(body, OLE_MAGIC) || startsWith(body, ZIP_MAGIC)) {
    return "doc";
  }
  return "unknown";
};

const signatureMatches = (body: Uint8Array, expected: ContentKind): boolean => {
  switch (expected) {
    case "pdf":
      return startsWith(body, PDF_MAGIC);
    case "ppt":
    case "doc":
      return startsWith(body, OLE_MAGIC) || startsWith(body, ZIP_MAGIC);
    case "unknown":
      return kindFromSignature(body) !== "unknown";
  }
};

export const kindFromContentType = (contentType: string): ContentKind => {
  const lowered = contentType.toLowerCase();
  if (lowered.includes("pdf")) {
    return "pdf";
  }
  if (lowered.includes("powerpoint") || lowered.includes("presentationml")) {
    return "ppt";
  }
  if (lowered.includes("msword") || lowered.includes("wordprocessingml")) {
    return "doc";
  }
  return "unknown";
};

export const expectedKindFromUrl = (url: string): ContentKind => {
  let path = url.toLowerCase();
  try {
    path = new URL(url).pathname.toLowerCase();
  } catch {
    // Relative or malformed; the raw string still carries any suffix.
  }

  if (path.endsWith(".pdf")) {
    return "pdf";
  }
  if (/\.pptx?$/.test(path)) {
    return "ppt";
  }
  if (/\.docx?$/.test(path)) {
    return "doc";
  }
  return "unknown";
};

export type ContentVerdict = {
  verified: boolean;
  contentKind: ContentKind;
};

// Markup sniffing only needs the first few bytes.
const MARKUP_PROBE_BYTES = 64;

export const looksLikeMarkup = (body: Uint8Array): boolean =>
  new TextDecoder()
    .decode(body.subarray(0, MARKUP_PROBE_BYTES))
    .trimStart()
    .startsWith("<");

/**
 * A fetched payload counts as the document only on HTTP 200 with a non-markup body that either
 * declares the expected document type or opens with the expected file signature. A generic
 * binary type such as application/octet-stream proves nothing on its own.
 */
export const verifyContent = (
  status: number,
  contentType: string,
  body: Uint8Array,
  expected: ContentKind,
): ContentVerdict => {
  const sniffed = kindFromSignature(body);
  const rejected: ContentVerdict = { verified: false, contentKind: sniffed };

  if (status !== 200 || looksLikeMarkup(body)) {
    return rejected;
  }

  const declared = kindFromContentType(contentType);
  if (declared !== "unknown" && (expected === "unknown" || declared === expected)) {
    return { verified: true, contentKind: declared };
  }

  if (expected === "unknown") {
    return sniffed === "unknown" ? rejected : { verified: true, contentKind: sniffed };
  }

  return signatureMatches(body, expected)
    ? { verified: true, contentKind: expected }
    : rejected;
};
