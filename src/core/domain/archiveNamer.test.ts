import { describe, expect, it } from "vitest";
import { monthPeriod } from "./temporalParser";
import {
  archiveFileName,
  claimFileName,
  extensionFromUrl,
  sanitizePathSegment,
} from "./archiveNamer";

describe("archiveFileName", () => {
  it("joins symbol, period and category", () => {
    expect(
      archiveFileName({
        symbol: "TCS",
        periodLabel: "Q1 FY2024",
        category: "transcript",
        extension: "pdf",
        index: 1,
      }),
    ).toBe("TCS_Q1-FY2024_transcript.pdf");
  });

  it("writes generic concall documents as concall", () => {
    expect(
      archiveFileName({
        symbol: "INFY",
        periodLabel: "Jul-2024",
        category: "concall_generic",
        extension: "ppt",
        index: 2,
      }),
    ).toBe("INFY_Jul-2024_concall.ppt");
  });

  it("uses a positional placeholder when the period is missing", () => {
    expect(
      archiveFileName({
        symbol: "TCS",
        periodLabel: null,
        category: "presentation",
        extension: "pdf",
        index: 4,
      }),
    ).toBe("TCS_doc-4_presentation.pdf");
  });

  it("prefixes annual report periods with FY", () => {
    const base = {
      symbol: "TCS",
      category: "annual_report" as const,
      extension: "pdf" as const,
      index: 7,
    };

    expect(archiveFileName({ ...base, periodLabel: "FY2023" })).toBe(
      "TCS_FY2023_annual_report.pdf",
    );
    expect(archiveFileName({ ...base, periodLabel: "Mar 2022" })).toBe(
      "TCS_FY2022_annual_report.pdf",
    );
    expect(archiveFileName({ ...base, periodLabel: "Q1 FY2024", fiscalYear: 2024 })).toBe(
      "TCS_FY2024_annual_report.pdf",
    );
    expect(archiveFileName({ ...base, periodLabel: null })).toBe(
      "TCS_FY-undated-7_annual_report.pdf",
    );
  });

  it("names month-dated annual reports after their fiscal year", () => {
    const june = monthPeriod(2024, 6);

    expect(
      archiveFileName({
        symbol: "TCS",
        periodLabel: june.label,
        fiscalYear: june.fiscalYear,
        category: "annual_report",
        extension: "pdf",
        index: 1,
      }),
    ).toBe("TCS_FY2025_annual_report.pdf");
  });

  it("infers the category from the title when none was assigned", () => {
    expect(
      archiveFileName({
        symbol: "TCS",
        periodLabel: "FY2021",
        category: null,
        extension: "pdf",
        title: "Annual Report 2021",
        index: 1,
      }),
    ).toBe("TCS_FY2021_annual_report.pdf");
    expect(
      archiveFileName({
        symbol: "TCS",
        periodLabel: "FY2021",
        category: null,
        extension: "pdf",
        index: 1,
      }),
    ).toBe("TCS_FY2021_document.pdf");
  });

  it("replaces path-hostile characters and fills a missing symbol", () => {
    expect(
      archiveFileName({
        symbol: " ",
        periodLabel: "Q2 FY25 <draft>",
        category: "recording",
        extension: "pdf",
        index: 1,
      }),
    ).toBe("UNKNOWN_Q2-FY25-_draft__recording.pdf");
    expect(sanitizePathSegment('M&M: "A|B"?*')).toBe("M&M_ _A_B___");
  });
});

describe("claimFileName", () => {
  it("suffixes names already used in the run", () => {
    const used = new Set<string>();

    expect(claimFileName("TCS_FY2024_annual_report.pdf", used)).toBe(
      "TCS_FY2024_annual_report.pdf",
    );
    expect(claimFileName("TCS_FY2024_annual_report.pdf", used)).toBe(
      "TCS_FY2024_annual_report-2.pdf",
    );
    expect(claimFileName("tcs_fy2024_annual_report.PDF", used)).toBe(
      "tcs_fy2024_annual_report-3.PDF",
    );
    expect(claimFileName("README", used)).toBe("README");
    expect(claimFileName("README", used)).toBe("README-2");
  });
});

describe("extensionFromUrl", () => {
  it("prefers the URL path suffix", () => {
    expect(extensionFromUrl("https://files.example.test/deck.PPTX?dl=1")).toBe("ppt");
    expect(extensionFromUrl("https://files.example.test/notes.doc", "pdf")).toBe("doc");
    expect(extensionFromUrl("https://files.example.test/a.pdf#page=2")).toBe("pdf");
  });

  it("falls back to the content kind and then pdf", () => {
    expect(extensionFromUrl("https://files.example.test/download?id=9", "ppt")).toBe("ppt");
    expect(extensionFromUrl("https://files.example.test/download?id=9")).toBe("pdf");
    expect(extensionFromUrl("not a url.docx")).toBe("doc");
  });
});
