import {
  isConcallCategory,
  type ConcallCategory,
  type DocumentCandidate,
} from "../entities/document";
import type { PeriodKey } from "../entities/period";
import { comparePeriodsDesc, sortByPeriodDesc } from "./temporalParser";

export const CONCALL_PRIORITY: Record<ConcallCategory, number> = {
  transcript: 1,
  presentation: 2,
  recording: 3,
  concall_generic: 4,
};

export type PeriodGroup = {
  label: string | null;
  /** Member with the newest exact date; stands in for the whole group when ordering. */
  representative: PeriodKey;
  /** Members in resolution order: priority first, discovery order on ties. */
  members: DocumentCandidate[];
};

const priorityOf = (candidate: DocumentCandidate): number =>
  isConcallCategory(candidate.category)
    ? CONCALL_PRIORITY[candidate.category]
    : Number.MAX_SAFE_INTEGER;

const assertPositiveLimit = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, received ${value}.`);
  }
};

/**
 * Groups concall documents by period label and keeps the newest `maxPeriods` groups.
 */
export const groupConcallPeriods = (
  candidates: readonly DocumentCandidate[],
  maxPeriods: number,
): PeriodGroup[] => {
  assertPositiveLimit("maxPeriods", maxPeriods);

  const groups = new Map<string | null, PeriodGroup>();

  for (const candidate of candidates) {
    if (!isConcallCategory(candidate.category)) {
      continue;
    }

    const label = candidate.period.label;
    const existing = groups.get(label);
    if (!existing) {
      groups.set(label, {
        label,
        representative: candidate.period,
        members: [candidate],
      });
      continue;
    }

    existing.members.push(candidate);
    if (comparePeriodsDesc(candidate.period, existing.representative) < 0) {
      existing.representative = candidate.period;
    }
  }

  return sortByPeriodDesc([...groups.values()], (group) => group.representative)
    .slice(0, maxPeriods)
    .map((group) => ({
      ...group,
      members: [...group.members].sort(
        (left, right) => priorityOf(left) - priorityOf(right),
      ),
    }));
};

/**
 * Newest-first annual reports, one per URL, capped at `maxReports`.
 */
export const rankAnnualReports = (
  candidates: readonly DocumentCandidate[],
  maxReports: number,
): DocumentCandidate[] => {
  assertPositiveLimit("maxReports", maxReports);

  const seen = new Set<string>();
  const reports = candidates.filter((candidate) => {
    if (candidate.category !== "annual_report" || seen.has(candidate.url)) {
      return false;
    }
    seen.add(candidate.url);
    return true;
  });

  return sortByPeriodDesc(reports, (report) => report.period).slice(
    0,
    maxReports,
  );
};
