import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  CompanyProfile,
  DocumentCandidate,
  SelectedDocument,
} from "../../core/entities/document";
import {
  emptyProgress,
  type ArchiveProgress,
  type ProgressEventKind,
} from "../../core/entities/progress";
import type { CompanyLocatorPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  DocumentStorePort,
  IdGeneratorPort,
  ProgressSinkPort,
} from "../../core/ports/outboundPorts";
import {
  archiveFileName,
  claimFileName,
  extensionFromUrl,
  sanitizePathSegment,
} from "../../core/domain/archiveNamer";
import {
  classifyPage,
  extractPageIdentity,
  type ClassifyOptions,
} from "../../core/domain/linkClassifier";
import {
  groupConcallPeriods,
  rankAnnualReports,
  type PeriodGroup,
} from "../../core/domain/periodSelection";
import { logger } from "../../shared/logger/logger";
import type {
  DocumentSelectionService,
  SelectionOptions,
} from "./documentSelectionService";

export type ArchiveRunSummary = {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
  progress: ArchiveProgress;
  profiles: CompanyProfile[];
};

type Publish = (
  kind: ProgressEventKind,
  message: string,
  symbol?: string,
) => void;

export type CompanyInspection = {
  displayName: string;
  symbol: string;
  profileUrl: string;
  candidates: DocumentCandidate[];
  concallPeriods: PeriodGroup[];
  annualReports: DocumentCandidate[];
};

/**
 * Runs the archive pipeline company by company: locate, classify, select, name, persist.
 * Per-company and per-document failures are reported through the sink and never stop the batch.
 */
export class ArchiveService {
  constructor(
    private readonly locator: CompanyLocatorPort,
    private readonly selection: DocumentSelectionService,
    private readonly store: DocumentStorePort,
    private readonly classifyOptions: ClassifyOptions,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
  ) {}

  /**
   * Classifies one company page without resolving or downloading anything.
   */
  async inspectCompany(
    symbol: string,
    maxConcallPeriods: number,
    maxAnnualReports: number,
  ): Promise<Result<CompanyInspection, AppBoundaryError>> {
    const located = await this.locator.locate(symbol);
    if (located.isErr()) {
      return err(located.error);
    }

    const { profileUrl, html } = located.value;
    const identity = extractPageIdentity(html, profileUrl);
    const candidates = classifyPage(html, this.classifyOptions);

    return ok({
      displayName: identity.displayName,
      symbol: identity.symbol || symbol.toUpperCase(),
      profileUrl,
      candidates,
      concallPeriods: groupConcallPeriods(candidates, maxConcallPeriods),
      annualReports: rankAnnualReports(candidates, maxAnnualReports),
    });
  }

  /**
   * Processes companies strictly one after another. `progress` is the caller's accumulator and is
   * updated in place; `options.isRunning` is checked before each company and each document.
   */
  async archiveCompanies(
    symbols: readonly string[],
    options: SelectionOptions,
    sink: ProgressSinkPort,
    progress: ArchiveProgress = emptyProgress(),
  ): Promise<ArchiveRunSummary> {
    if (symbols.length === 0) {
      throw new Error("archiveCompanies requires at least one symbol.");
    }

    const runId = this.ids.next();
    const startedAt = this.clock.now();
    const profiles: CompanyProfile[] = [];
    let cancelled = false;

    const publish: Publish = (kind, message, symbol) => {
      sink.publish({ kind, message, symbol, totals: { ...progress } });
    };

    logger.info({ runId, symbols }, "Archive run started");

    for (const [position, symbol] of symbols.entries()) {
      if (!options.isRunning()) {
        cancelled = true;
        break;
      }

      publish(
        "status",
        `Processing ${symbol} (${position + 1}/${symbols.length})`,
        symbol,
      );

      const profile = await this.archiveCompany(symbol, options, progress, publish);
      if (!profile) {
        continue;
      }

      profiles.push(profile);
      if (!options.isRunning()) {
        cancelled = true;
        break;
      }
    }

    const finishedAt = this.clock.now();
    publish(
      cancelled ? "warning" : "status",
      `${cancelled ? "Archive run stopped" : "Archive run complete"}: ${progress.documentsDownloaded} document(s) from ${progress.companiesProcessed} compan${progress.companiesProcessed === 1 ? "y" : "ies"}`,
    );
    logger.info({ runId, progress, cancelled }, "Archive run finished");

    return {
      runId,
      startedAt,
      finishedAt,
      cancelled,
      progress: { ...progress },
      profiles,
    };
  }

  private async archiveCompany(
    symbol: string,
    options: SelectionOptions,
    progress: ArchiveProgress,
    publish: Publish,
  ): Promise<CompanyProfile | null> {
    const located = await this.locator.locate(symbol);
    if (located.isErr()) {
      progress.companiesFailed += 1;
      logger.error(
        { symbol, code: located.error.code, reason: located.error.message },
        "Company skipped",
      );
      publish("error", `Could not load company page for ${symbol}: ${located.error.message}`, symbol);
      return null;
    }

    const { profileUrl, html } = located.value;
    const identity = extractPageIdentity(html, profileUrl);
    const archiveSymbol = identity.symbol || symbol.trim().toUpperCase();
    const candidates = classifyPage(html, this.classifyOptions);

    publish(
      "success",
      `Found ${identity.displayName}: ${candidates.length} document link(s)`,
      archiveSymbol,
    );

    const selection = await this.selection.select(candidates, options);

    for (const missing of selection.unavailable) {
      progress.documentsFailed += 1;
      logger.warn(
        { symbol: archiveSymbol, period: missing.label, category: missing.category, reason: missing.reason },
        "Document unavailable",
      );
      publish(
        "warning",
        `No downloadable ${missing.category} for ${missing.label ?? "undated period"}`,
        archiveSymbol,
      );
    }

    const usedNames = new Set<string>();
    const concalls = await this.persistAll(
      archiveSymbol,
      selection.concalls,
      1,
      usedNames,
      progress,
      publish,
    );
    const annualReports = await this.persistAll(
      archiveSymbol,
      selection.annualReports,
      selection.concalls.length + 1,
      usedNames,
      progress,
      publish,
    );

    progress.companiesProcessed += 1;
    publish(
      "success",
      `${archiveSymbol}: ${concalls.length + annualReports.length} file(s) archived`,
      archiveSymbol,
    );

    return {
      displayName: identity.displayName,
      symbol: archiveSymbol,
      profileUrl,
      concalls,
      annualReports,
    };
  }

  private async persistAll(
    symbol: string,
    documents: SelectedDocument[],
    firstIndex: number,
    usedNames: Set<string>,
    progress: ArchiveProgress,
    publish: Publish,
  ): Promise<SelectedDocument[]> {
    const persisted: SelectedDocument[] = [];

    // Bytes were fetched during selection; persisting them is not cancellable.
    for (const [offset, document] of documents.entries()) {
      const { candidate, resolved } = document;
      const fileName = claimFileName(
        archiveFileName({
          symbol,
          periodLabel: candidate.period.label,
          fiscalYear: candidate.period.fiscalYear,
          category: candidate.category,
          extension: extensionFromUrl(
            resolved.resource.finalUrl,
            resolved.resource.contentKind,
          ),
          title: candidate.title,
          index: firstIndex + offset,
        }),
        usedNames,
      );

      const saved = await this.store.save(
        `${sanitizePathSegment(symbol)}/${fileName}`,
        resolved.body,
      );
      if (saved.isErr()) {
        progress.documentsFailed += 1;
        publish("error", `Failed to save ${fileName}: ${saved.error.message}`, symbol);
        continue;
      }

      progress.documentsDownloaded += 1;
      persisted.push(document);
      publish("success", `Downloaded ${fileName}`, symbol);
    }

    return persisted;
  }
}
