import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import type { DocumentCandidate, DocumentCategory } from "../entities/document";
import { parsePeriod } from "./temporalParser";

const MIN_ANCHOR_TEXT_LENGTH = 5;

const SELECTORS = {
  concalls: ".documents.concalls, #concalls",
  annualReports: ".documents.annual-reports, #annual-reports",
  entry: "li",
  companyName: "h1",
} as const;

const ANNUAL_REPORT_PHRASES = [
  "annual report",
  "yearly report",
  "financial statements",
  "annual accounts",
  "audited financial results",
];

const CONCALL_PHRASES = ["concall", "earnings call", "investor call"];

const FISCAL_YEAR_PHRASE = /financial\s+year|\bfy\s*'?\d{2,4}\b/i;

const REPORT_WORD = /\b(reports?|statements?|accounts|results)\b/i;

const ANNUAL_REPORT_EXCLUSIONS = [
  "announcement",
  "regulation 30",
  "credit rating",
  "disclosure",
  "board",
  "esg",
  "intimation",
  "newspaper",
  "outcome",
  "postal ballot",
  "shareholding",
];

const PRESENTATION_PATTERN = /ppt|presentation/i;

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

/**
 * Resolves an href against the page URL; anything that is not an http(s) document link yields null.
 */
export const toAbsoluteUrl = (href: string, baseUrl: string): string | null => {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  try {
    const url = new URL(trimmed, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
};

/**
 * Keyword classification of generic anchor text. Order matters: the first rule that fires wins.
 */
export const classifyAnchorText = (text: string): DocumentCategory | null => {
  const lowered = text.toLowerCase();

  if (lowered.includes("transcript")) {
    return "transcript";
  }

  if (PRESENTATION_PATTERN.test(lowered)) {
    return "presentation";
  }

  if (ANNUAL_REPORT_PHRASES.some((phrase) => lowered.includes(phrase))) {
    return "annual_report";
  }

  if (
    FISCAL_YEAR_PHRASE.test(lowered) &&
    REPORT_WORD.test(lowered) &&
    !ANNUAL_REPORT_EXCLUSIONS.some((term) => lowered.includes(term))
  ) {
    return "annual_report";
  }

  if (CONCALL_PHRASES.some((phrase) => lowered.includes(phrase))) {
    return "concall_generic";
  }

  return null;
};

/**
 * Maps the short tags of a structured concall entry ("Transcript", "PPT", "REC") to categories.
 */
export const classifyConcallTag = (tag: string): DocumentCategory => {
  const lowered = tag.trim().toLowerCase();
  if (lowered.includes("transcript")) {
    return "transcript";
  }
  if (PRESENTATION_PATTERN.test(lowered)) {
    return "presentation";
  }
  if (lowered === "rec" || lowered.includes("recording")) {
    return "recording";
  }
  return "concall_generic";
};

export const isSecondaryFilingHost = (
  url: string,
  secondaryHost: string,
): boolean => {
  try {
    const hostname = new URL(url).hostname.toLowerCase();
    const expected = secondaryHost.toLowerCase();
    return hostname === expected || hostname.endsWith(`.${expected}`);
  } catch {
    return false;
  }
};

export type ClassifyOptions = {
  baseUrl: string;
  /** Bare hostname of the regulatory filing host, e.g. "bseindia.com". */
  secondaryHost: string;
};

const extractStructuredConcalls = (
  $: CheerioAPI,
  baseUrl: string,
): DocumentCandidate[] => {
  const candidates: DocumentCandidate[] = [];

  $(SELECTORS.concalls)
    .find(SELECTORS.entry)
    .each((_, entry) => {
      const item = $(entry);
      // The entry's own date text is whatever is not inside its links.
      const label = collapseWhitespace(
        item.clone().find("a").remove().end().text(),
      );
      const period = parsePeriod(label);

      item.find("a[href]").each((_, anchor) => {
        const link = $(anchor);
        const url = toAbsoluteUrl(link.attr("href") ?? "", baseUrl);
        if (!url) {
          return;
        }

        const tag = collapseWhitespace(link.text());
        candidates.push({
          title: collapseWhitespace(`${label} ${tag}`),
          url,
          category: classifyConcallTag(tag),
          period,
          source: "structured",
        });
      });
    });

  return candidates;
};

const extractStructuredAnnualReports = (
  $: CheerioAPI,
  options: ClassifyOptions,
): DocumentCandidate[] => {
  const candidates: DocumentCandidate[] = [];

  $(SELECTORS.annualReports)
    .find("a[href]")
    .each((_, anchor) => {
      const link = $(anchor);
      const url = toAbsoluteUrl(link.attr("href") ?? "", options.baseUrl);
      if (!url || !isSecondaryFilingHost(url, options.secondaryHost)) {
        return;
      }

      const title = collapseWhitespace(link.text());
      candidates.push({
        title,
        url,
        category: "annual_report",
        period: parsePeriod(title),
        source: "structured",
      });
    });

  return candidates;
};

const extractGeneric = (
  $: CheerioAPI,
  baseUrl: string,
): DocumentCandidate[] => {
  const candidates: DocumentCandidate[] = [];
  const structuredContainers = `${SELECTORS.concalls}, ${SELECTORS.annualReports}`;

  $("a[href]").each((_, anchor) => {
    const link = $(anchor);
    if (link.closest(structuredContainers).length > 0) {
      return;
    }

    const title = collapseWhitespace(link.text());
    if (title.length < MIN_ANCHOR_TEXT_LENGTH) {
      return;
    }

    const category = classifyAnchorText(title);
    const url = toAbsoluteUrl(link.attr("href") ?? "", baseUrl);
    if (!category || !url) {
      return;
    }

    candidates.push({
      title,
      url,
      category,
      period: parsePeriod(title),
      source: "generic",
    });
  });

  return candidates;
};

/**
 * Finds disclosure links on a company page. Structured sections and a generic anchor scan
 * both run; results are merged by absolute URL with structured entries kept on collisions.
 * Candidates come back in discovery order, unsorted.
 */
export const classifyPage = (
  html: string,
  options: ClassifyOptions,
): DocumentCandidate[] => {
  const $ = cheerio.load(html);
  const merged = new Map<string, DocumentCandidate>();

  const ordered = [
    ...extractStructuredConcalls($, options.baseUrl),
    ...extractStructuredAnnualReports($, options),
    ...extractGeneric($, options.baseUrl),
  ];

  for (const candidate of ordered) {
    if (!merged.has(candidate.url)) {
      merged.set(candidate.url, candidate);
    }
  }

  return [...merged.values()];
};

export type PageIdentity = {
  displayName: string;
  symbol: string;
};

/**
 * Reads the company name and exchange symbol from a profile page and its URL.
 */
export const extractPageIdentity = (
  html: string,
  profileUrl: string,
): PageIdentity => {
  const $ = cheerio.load(html);
  const symbol = symbolFromProfileUrl(profileUrl);
  const displayName = collapseWhitespace($(SELECTORS.companyName).first().text());

  return {
    displayName: displayName || symbol,
    symbol,
  };
};

export const symbolFromProfileUrl = (profileUrl: string): string => {
  const segment = /\/company\/([^/?#]+)/i.exec(profileUrl)?.[1];
  if (!segment) {
    return "";
  }

  try {
    return decodeURIComponent(segment).toUpperCase();
  } catch {
    return segment.toUpperCase();
  }
};
