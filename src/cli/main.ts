import { Command, InvalidArgumentError } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { CompanyInspection } from "../application/services/archiveService";
import { sanitizePathSegment } from "../core/domain/archiveNamer";
import type { ArchivedFile } from "../core/entities/document";
import { LoggerProgressSink } from "../infra/progress/loggerProgressSink";
import { appSymbols, env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

const formatDate = (value: Date | null): string =>
  value ? value.toISOString().slice(0, 10) : "undated";

/**
 * Formats a classification pass into a compact terminal report for manual inspection.
 */
export const formatInspectionReport = (inspection: CompanyInspection): string => {
  const lines: string[] = [];

  lines.push(`${inspection.displayName} (${inspection.symbol})`);
  lines.push(inspection.profileUrl);
  lines.push(`Document links: ${inspection.candidates.length}`);
  lines.push("");

  lines.push("Concall periods (newest first):");
  if (inspection.concallPeriods.length === 0) {
    lines.push("- none");
  } else {
    inspection.concallPeriods.forEach((group) => {
      lines.push(
        `- ${group.label ?? "(no period)"} [${formatDate(group.representative.exactDate)}]`,
      );
      group.members.forEach((member) => {
        lines.push(`    ${member.category}: ${member.url}`);
      });
    });
  }

  lines.push("");
  lines.push("Annual reports (newest first):");
  if (inspection.annualReports.length === 0) {
    lines.push("- none");
  } else {
    inspection.annualReports.forEach((report) => {
      lines.push(`- ${report.period.label ?? "(no period)"}: ${report.url}`);
    });
  }

  return lines.join("\n");
};

const archiveDirectory = (symbol: string): string =>
  sanitizePathSegment(symbol.trim().toUpperCase());

export const formatArchiveListing = (
  symbol: string,
  files: readonly ArchivedFile[],
): string => {
  if (files.length === 0) {
    return `${symbol}: no archived files`;
  }

  return [
    `${symbol}: ${files.length} archived file(s)`,
    ...files.map(
      (file) =>
        `${file.name}\t${file.sizeBytes}\t${file.modifiedAt.toISOString().slice(0, 10)}`,
    ),
  ].join("\n");
};

/**
 * Defines a single command surface so every operation uses the same wiring and policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("concall-archiver")
    .description("Archive concall documents and annual reports of Indian-listed companies");

  cli
    .command("archive")
    .description("Download the most recent concall documents and annual reports")
    .option("--symbol <symbols...>", "Exchange symbols (defaults to APP_SYMBOLS)")
    .option("--out <dir>", "Archive root directory", env.DOWNLOAD_DIR)
    .option("--no-concalls", "Skip concall documents")
    .option("--no-annual-reports", "Skip annual reports")
    .option(
      "--max-periods <n>",
      "Concall periods to keep",
      parsePositiveInt,
      env.MAX_CONCALL_PERIODS,
    )
    .option(
      "--max-annual <n>",
      "Annual reports to keep",
      parsePositiveInt,
      env.MAX_ANNUAL_REPORTS,
    )
    .action(
      async (opts: {
        symbol?: string[];
        out: string;
        concalls: boolean;
        annualReports: boolean;
        maxPeriods: number;
        maxAnnual: number;
      }) => {
        const runtime = createRuntime({ downloadDir: opts.out });
        const symbols = opts.symbol?.length
          ? Array.from(
              new Set(
                opts.symbol
                  .flatMap((value) => value.split(","))
                  .map((symbol) => symbol.trim().toUpperCase())
                  .filter(Boolean),
              ),
            )
          : appSymbols();

        let running = true;
        const stop = () => {
          if (running) {
            logger.warn("Stop requested; finishing the current download");
          }
          running = false;
        };
        process.once("SIGINT", stop);

        const summary = await runtime.archiveService.archiveCompanies(
          symbols,
          {
            maxConcallPeriods: opts.maxPeriods,
            maxAnnualReports: opts.maxAnnual,
            includeConcalls: opts.concalls,
            includeAnnualReports: opts.annualReports,
            isRunning: () => running,
          },
          new LoggerProgressSink(logger),
        );

        process.removeListener("SIGINT", stop);
        logger.info(
          {
            runId: summary.runId,
            durationMs:
              summary.finishedAt.getTime() - summary.startedAt.getTime(),
            progress: summary.progress,
            cancelled: summary.cancelled,
          },
          "Archive summary",
        );
      },
    );

  cli
    .command("inspect")
    .description("Classify one company page without downloading anything")
    .requiredOption("--symbol <symbol>", "Exchange symbol")
    .action(async (opts: { symbol: string }) => {
      const runtime = createRuntime();
      const inspection = await runtime.archiveService.inspectCompany(
        opts.symbol,
        env.MAX_CONCALL_PERIODS,
        env.MAX_ANNUAL_REPORTS,
      );

      if (inspection.isErr()) {
        logger.error(
          { symbol: opts.symbol, error: inspection.error },
          "Inspection failed",
        );
        process.exitCode = 1;
        return;
      }

      console.log(formatInspectionReport(inspection.value));
    });

  cli
    .command("search")
    .description("List company pages matching a name or symbol")
    .argument("<query>", "Company name or symbol")
    .action(async (query: string) => {
      const runtime = createRuntime();
      const hits = await runtime.locator.search(query);

      if (hits.isErr()) {
        logger.error({ query, error: hits.error }, "Search failed");
        process.exitCode = 1;
        return;
      }

      if (hits.value.length === 0) {
        logger.info({ query }, "No companies found");
        return;
      }

      hits.value.forEach((hit) => console.log(`${hit.name}\t${hit.profileUrl}`));
    });

  cli
    .command("list")
    .description("List the archived files of one company")
    .requiredOption("--symbol <symbol>", "Exchange symbol")
    .option("--out <dir>", "Archive root directory", env.DOWNLOAD_DIR)
    .action(async (opts: { symbol: string; out: string }) => {
      const runtime = createRuntime({ downloadDir: opts.out });
      const directory = archiveDirectory(opts.symbol);
      const files = await runtime.inventory.list(directory);

      if (files.isErr()) {
        logger.error({ symbol: directory, error: files.error }, "Listing failed");
        process.exitCode = 1;
        return;
      }

      console.log(formatArchiveListing(directory, files.value));
    });

  cli
    .command("clear")
    .description("Delete the archived files of one company")
    .requiredOption("--symbol <symbol>", "Exchange symbol")
    .option("--out <dir>", "Archive root directory", env.DOWNLOAD_DIR)
    .option("--yes", "Delete without a dry run", false)
    .action(async (opts: { symbol: string; out: string; yes: boolean }) => {
      const runtime = createRuntime({ downloadDir: opts.out });
      const directory = archiveDirectory(opts.symbol);

      if (!opts.yes) {
        const files = await runtime.inventory.list(directory);
        if (files.isErr()) {
          logger.error({ symbol: directory, error: files.error }, "Listing failed");
          process.exitCode = 1;
          return;
        }
        logger.warn(
          { symbol: directory, files: files.value.length },
          "Dry run; pass --yes to delete these files",
        );
        return;
      }

      const removed = await runtime.inventory.clear(directory);
      if (removed.isErr()) {
        logger.error({ symbol: directory, error: removed.error }, "Clear failed");
        process.exitCode = 1;
        return;
      }

      logger.info({ symbol: directory, removed: removed.value }, "Archived files removed");
    });

  cli
    .command("status")
    .description("Report effective configuration")
    .action(() => {
      logger.info(
        {
          symbols: appSymbols(),
          screenerBaseUrl: env.SCREENER_BASE_URL,
          bseBaseUrl: env.BSE_BASE_URL,
          requestDelayMs: env.REQUEST_DELAY_MS,
          httpTimeoutMs: env.HTTP_TIMEOUT_MS,
          downloadDir: env.DOWNLOAD_DIR,
          maxConcallPeriods: env.MAX_CONCALL_PERIODS,
          maxAnnualReports: env.MAX_ANNUAL_REPORTS,
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
