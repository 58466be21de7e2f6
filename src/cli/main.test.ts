import { describe, expect, it } from "vitest";
import type { DocumentCandidate } from "../core/entities/document";
import {
  fiscalYearPeriod,
  monthPeriod,
  quarterPeriod,
} from "../core/domain/temporalParser";
import { buildCli, formatArchiveListing, formatInspectionReport } from "./main";

const transcript: DocumentCandidate = {
  title: "Oct 2024 Transcript",
  url: "https://docs.example.test/oct.pdf",
  category: "transcript",
  period: monthPeriod(2024, 10),
  source: "structured",
};

const quarterDeck: DocumentCandidate = {
  title: "Q1 FY25 Investor Presentation",
  url: "https://docs.example.test/q1.pdf",
  category: "presentation",
  period: quarterPeriod(1, 2025),
  source: "generic",
};

const annual: DocumentCandidate = {
  title: "Financial Year 2024",
  url: "https://www.bseindia.com/ar.pdf",
  category: "annual_report",
  period: fiscalYearPeriod(2024),
  source: "structured",
};

describe("formatInspectionReport", () => {
  it("lists periods and annual reports newest first", () => {
    const report = formatInspectionReport({
      displayName: "Tata Consultancy Services Ltd",
      symbol: "TCS",
      profileUrl: "https://www.screener.in/company/TCS/",
      candidates: [transcript, quarterDeck, annual],
      concallPeriods: [
        { label: "Oct-2024", representative: transcript.period, members: [transcript] },
        { label: "Q1 FY2025", representative: quarterDeck.period, members: [quarterDeck] },
      ],
      annualReports: [annual],
    });

    expect(report.split("\n")).toEqual([
      "Tata Consultancy Services Ltd (TCS)",
      "https://www.screener.in/company/TCS/",
      "Document links: 3",
      "",
      "Concall periods (newest first):",
      "- Oct-2024 [2024-10-01]",
      "    transcript: https://docs.example.test/oct.pdf",
      "- Q1 FY2025 [undated]",
      "    presentation: https://docs.example.test/q1.pdf",
      "",
      "Annual reports (newest first):",
      "- FY2024: https://www.bseindia.com/ar.pdf",
    ]);
  });

  it("marks empty sections", () => {
    const report = formatInspectionReport({
      displayName: "Empty Co",
      symbol: "EMPTY",
      profileUrl: "https://www.screener.in/company/EMPTY/",
      candidates: [],
      concallPeriods: [],
      annualReports: [],
    });

    expect(report).toContain("Concall periods (newest first):\n- none");
    expect(report.endsWith("Annual reports (newest first):\n- none")).toBe(true);
  });
});

describe("formatArchiveListing", () => {
  it("prints one tab-separated line per file", () => {
    const listing = formatArchiveListing("TCS", [
      {
        name: "TCS_FY2024_annual_report.pdf",
        sizeBytes: 2048,
        modifiedAt: new Date(Date.UTC(2025, 0, 2, 10, 30)),
      },
      {
        name: "TCS_Oct-2024_transcript.pdf",
        sizeBytes: 512,
        modifiedAt: new Date(Date.UTC(2024, 10, 5)),
      },
    ]);

    expect(listing.split("\n")).toEqual([
      "TCS: 2 archived file(s)",
      "TCS_FY2024_annual_report.pdf\t2048\t2025-01-02",
      "TCS_Oct-2024_transcript.pdf\t512\t2024-11-05",
    ]);
  });

  it("says when nothing is archived", () => {
    expect(formatArchiveListing("INFY", [])).toBe("INFY: no archived files");
  });
});

describe("buildCli", () => {
  it("registers every command", () => {
    expect(buildCli().commands.map((command) => command.name())).toEqual([
      "archive",
      "inspect",
      "search",
      "list",
      "clear",
      "status",
    ]);
  });
});
