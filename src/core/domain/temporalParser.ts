import {
  NO_PERIOD,
  type FiscalYearPeriod,
  type MonthPeriod,
  type PeriodKey,
  type Quarter,
  type QuarterPeriod,
} from "../entities/period";

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

const QUARTER_PATTERN = /\bq\s*([1-4])\s*fy\s*'?(\d{4}|\d{2})(?!\d)/i;

// Candidate month words; validated against MONTH_NAMES so "Declaration 2024" is not December.
const MONTH_YEAR_PATTERN = /\b([a-z]{3,9})\.?\s*'?(\d{4}|\d{2})(?!\d)/gi;

const FOUR_DIGIT_FISCAL_PATTERNS: RegExp[] = [
  /financial\s+year\s*(\d{4})(?!\d)/i,
  /\bfy\s+(\d{4})(?!\d)/i,
  /\bfy(\d{4})(?!\d)/i,
  /\byear\s*(\d{4})(?!\d)/i,
  /\b(20\d{2})\b/,
];

const TWO_DIGIT_FISCAL_PATTERN = /(?:\bfy|financial\s+year)\s*'?(\d{2})(?!\d)/i;

const utcDate = (year: number, month: number, day: number): Date =>
  new Date(Date.UTC(year, month - 1, day));

const expandShortYear = (raw: string): number => {
  const year = Number.parseInt(raw, 10);
  return year < 100 ? 2000 + year : year;
};

const monthNumberOf = (word: string): number | null => {
  const lowered = word.toLowerCase();
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(lowered));
  return index === -1 ? null : index + 1;
};

const toQuarter = (value: number): Quarter | null => {
  switch (value) {
    case 1:
    case 2:
    case 3:
    case 4:
      return value;
    default:
      return null;
  }
};

export const quarterPeriod = (
  quarter: Quarter,
  fiscalYear: number,
): QuarterPeriod => ({
  kind: "quarter",
  label: `Q${quarter} FY${fiscalYear}`,
  exactDate: null,
  quarter,
  fiscalYear,
});

/**
 * Builds a month period; the fiscal year follows the April to March convention of Indian issuers.
 */
export const monthPeriod = (year: number, month: number): MonthPeriod => {
  const name = MONTH_NAMES[month - 1] ?? "unknown";
  const shortName = `${name.charAt(0).toUpperCase()}${name.slice(1, 3)}`;
  return {
    kind: "month",
    label: `${shortName}-${year}`,
    exactDate: utcDate(year, month, 1),
    quarter: null,
    fiscalYear: month >= 4 ? year + 1 : year,
  };
};

export const fiscalYearPeriod = (fiscalYear: number): FiscalYearPeriod => ({
  kind: "fiscal_year",
  label: `FY${fiscalYear}`,
  exactDate: utcDate(fiscalYear, 3, 31),
  quarter: null,
  fiscalYear,
});

const matchQuarter = (text: string): QuarterPeriod | null => {
  const match = QUARTER_PATTERN.exec(text);
  const quarter = toQuarter(Number(match?.[1]));
  if (!match?.[2] || quarter === null) {
    return null;
  }

  return quarterPeriod(quarter, expandShortYear(match[2]));
};

const matchMonthYear = (text: string): MonthPeriod | null => {
  for (const match of text.matchAll(MONTH_YEAR_PATTERN)) {
    const month = match[1] ? monthNumberOf(match[1]) : null;
    if (month === null || !match[2]) {
      continue;
    }

    return monthPeriod(expandShortYear(match[2]), month);
  }

  return null;
};

const matchFiscalYear = (text: string): FiscalYearPeriod | null => {
  for (const pattern of FOUR_DIGIT_FISCAL_PATTERNS) {
    const year = pattern.exec(text)?.[1];
    if (year) {
      return fiscalYearPeriod(Number.parseInt(year, 10));
    }
  }

  const shortYear = TWO_DIGIT_FISCAL_PATTERN.exec(text)?.[1];
  if (shortYear) {
    const value = Number.parseInt(shortYear, 10);
    return fiscalYearPeriod(value >= 90 ? 1900 + value : 2000 + value);
  }

  return null;
};

/**
 * Reads a reporting period out of free text. Pattern families are tried in a fixed order:
 * quarter with fiscal year, month with year, then fiscal year alone.
 * Text without any period yields NO_PERIOD rather than an error.
 */
export const parsePeriod = (text: string): PeriodKey =>
  matchQuarter(text) ??
  matchMonthYear(text) ??
  matchFiscalYear(text) ??
  NO_PERIOD;

export const isMatchedPeriod = (period: PeriodKey): boolean =>
  period.kind !== "none";

const periodTime = (period: PeriodKey): number =>
  period.exactDate?.getTime() ?? Number.NEGATIVE_INFINITY;

/**
 * Orders periods newest first; periods without an exact date sort as the oldest.
 */
export const comparePeriodsDesc = (left: PeriodKey, right: PeriodKey): number => {
  const leftTime = periodTime(left);
  const rightTime = periodTime(right);
  if (leftTime === rightTime) {
    return 0;
  }

  return leftTime > rightTime ? -1 : 1;
};

/**
 * Stable newest-first sort that leaves the input untouched.
 */
export const sortByPeriodDesc = <T>(
  items: readonly T[],
  periodOf: (item: T) => PeriodKey,
): T[] =>
  [...items].sort((left, right) =>
    comparePeriodsDesc(periodOf(left), periodOf(right)),
  );
