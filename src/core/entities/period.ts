export type Quarter = 1 | 2 | 3 | 4;

export type QuarterPeriod = {
  kind: "quarter";
  label: string;
  exactDate: null;
  quarter: Quarter;
  fiscalYear: number;
};

export type MonthPeriod = {
  kind: "month";
  label: string;
  exactDate: Date;
  quarter: null;
  fiscalYear: number;
};

export type FiscalYearPeriod = {
  kind: "fiscal_year";
  label: string;
  exactDate: Date;
  quarter: null;
  fiscalYear: number;
};

export type NoPeriod = {
  kind: "none";
  label: null;
  exactDate: null;
  quarter: null;
  fiscalYear: null;
};

/**
 * Canonical temporal identity of a disclosure document.
 */
export type PeriodKey = QuarterPeriod | MonthPeriod | FiscalYearPeriod | NoPeriod;

export const NO_PERIOD: NoPeriod = Object.freeze({
  kind: "none",
  label: null,
  exactDate: null,
  quarter: null,
  fiscalYear: null,
});
