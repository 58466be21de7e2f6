import type {
  DocumentCandidate,
  SelectedDocument,
  UnavailableDocument,
} from "../../core/entities/document";
import type { DocumentResolverPort } from "../../core/ports/outboundPorts";
import {
  groupConcallPeriods,
  rankAnnualReports,
} from "../../core/domain/periodSelection";
import { logger } from "../../shared/logger/logger";

export type SelectionOptions = {
  maxConcallPeriods: number;
  maxAnnualReports: number;
  includeConcalls: boolean;
  includeAnnualReports: boolean;
  /** Checked before every resolution attempt; returning false stops selection. */
  isRunning: () => boolean;
};

export type SelectionResult = {
  concalls: SelectedDocument[];
  annualReports: SelectedDocument[];
  unavailable: UnavailableDocument[];
  cancelled: boolean;
};

/**
 * Picks one document per recent concall period and the most recent annual reports,
 * resolving candidates one at a time so each outcome can steer the next attempt.
 */
export class DocumentSelectionService {
  constructor(private readonly resolver: DocumentResolverPort) {}

  async select(
    candidates: readonly DocumentCandidate[],
    options: SelectionOptions,
  ): Promise<SelectionResult> {
    const result: SelectionResult = {
      concalls: [],
      annualReports: [],
      unavailable: [],
      cancelled: false,
    };

    if (options.includeConcalls) {
      await this.selectConcalls(candidates, options, result);
    }

    if (options.includeAnnualReports && !result.cancelled) {
      await this.selectAnnualReports(candidates, options, result);
    }

    return result;
  }

  /**
   * Walks each period's members in priority order. A failed presentation ends the period:
   * lower tiers are never tried after it.
   */
  private async selectConcalls(
    candidates: readonly DocumentCandidate[],
    options: SelectionOptions,
    result: SelectionResult,
  ): Promise<void> {
    const groups = groupConcallPeriods(candidates, options.maxConcallPeriods);

    for (const group of groups) {
      let lastFailure: UnavailableDocument | null = null;
      let selected = false;

      for (const member of group.members) {
        if (!options.isRunning()) {
          result.cancelled = true;
          return;
        }

        const resolution = await this.resolver.resolve(member.url);
        if (resolution.isOk()) {
          result.concalls.push({ candidate: member, resolved: resolution.value });
          selected = true;
          break;
        }

        lastFailure = {
          label: group.label,
          category: member.category,
          url: member.url,
          reason: resolution.error.message,
        };

        if (member.category === "presentation") {
          logger.warn(
            { period: group.label, url: member.url },
            "Presentation unavailable; not falling back to lower-priority documents",
          );
          break;
        }
      }

      if (!selected && lastFailure) {
        result.unavailable.push(lastFailure);
      }
    }
  }

  private async selectAnnualReports(
    candidates: readonly DocumentCandidate[],
    options: SelectionOptions,
    result: SelectionResult,
  ): Promise<void> {
    for (const report of rankAnnualReports(candidates, options.maxAnnualReports)) {
      if (!options.isRunning()) {
        result.cancelled = true;
        return;
      }

      const resolution = await this.resolver.resolve(report.url);
      if (resolution.isOk()) {
        result.annualReports.push({ candidate: report, resolved: resolution.value });
        continue;
      }

      result.unavailable.push({
        label: report.period.label,
        category: report.category,
        url: report.url,
        reason: resolution.error.message,
      });
    }
  }
}
