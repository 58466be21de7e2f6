import * as cheerio from "cheerio";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  CompanyLocatorPort,
  CompanySearchHit,
  LocatedCompany,
} from "../../../core/ports/inboundPorts";
import type { PageFetcherPort } from "../../../core/ports/outboundPorts";
import { toAbsoluteUrl } from "../../../core/domain/linkClassifier";
import { logger } from "../../../shared/logger/logger";

const PROVIDER = "screener-locator";

const SYMBOL_PATTERN = /^[A-Z0-9&.\-]{1,20}$/i;

/**
 * Finds a company's Screener profile page. Known URL shapes are tried first, then the site search.
 */
export class ScreenerCompanyLocator implements CompanyLocatorPort {
  constructor(
    private readonly baseUrl: string,
    private readonly pages: PageFetcherPort,
  ) {}

  /**
   * Returns the first profile URL that answers, together with its HTML so callers need not fetch it again.
   */
  async locate(
    symbol: string,
  ): Promise<Result<LocatedCompany, AppBoundaryError>> {
    const trimmed = symbol.trim();
    if (!trimmed) {
      return err({
        source: "locator",
        code: "validation_error",
        provider: PROVIDER,
        message: "Company lookup requires a non-empty symbol.",
        retryable: false,
      });
    }

    if (SYMBOL_PATTERN.test(trimmed)) {
      for (const profileUrl of this.profileUrlCandidates(trimmed)) {
        const page = await this.pages.fetchPage(profileUrl);
        if (page.isOk()) {
          return ok({ profileUrl, html: page.value });
        }

        logger.debug(
          { symbol: trimmed, profileUrl, code: page.error.code },
          "Profile URL did not answer",
        );
      }
    }

    const hits = await this.search(trimmed);
    if (hits.isErr()) {
      return err(hits.error);
    }

    const first = hits.value.at(0);
    if (!first) {
      return err({
        source: "locator",
        code: "not_found",
        provider: PROVIDER,
        message: `No Screener company page found for '${trimmed}'.`,
        retryable: false,
      });
    }

    const page = await this.pages.fetchPage(first.profileUrl);
    if (page.isErr()) {
      return err(page.error);
    }

    return ok({ profileUrl: first.profileUrl, html: page.value });
  }

  /**
   * Lists company pages linked from the site search results, in page order.
   */
  async search(
    query: string,
  ): Promise<Result<CompanySearchHit[], AppBoundaryError>> {
    const searchUrl = new URL("/search/", this.baseUrl);
    searchUrl.searchParams.set("q", query.trim());

    const page = await this.pages.fetchPage(searchUrl.toString());
    if (page.isErr()) {
      return err(page.error);
    }

    const $ = cheerio.load(page.value);
    const seen = new Set<string>();
    const hits: CompanySearchHit[] = [];

    $("a[href]").each((_, anchor) => {
      const link = $(anchor);
      const href = link.attr("href") ?? "";
      if (!href.includes("/company/")) {
        return;
      }

      const profileUrl = toAbsoluteUrl(href, this.baseUrl);
      if (!profileUrl || seen.has(profileUrl)) {
        return;
      }

      seen.add(profileUrl);
      hits.push({
        name: link.text().replace(/\s+/g, " ").trim() || profileUrl,
        profileUrl,
      });
    });

    return ok(hits);
  }

  private profileUrlCandidates(symbol: string): string[] {
    const variants = Array.from(
      new Set([symbol, symbol.toUpperCase(), symbol.toLowerCase()]),
    );

    return [
      ...variants.map((variant) =>
        new URL(`/company/${encodeURIComponent(variant)}/`, this.baseUrl).toString(),
      ),
      new URL(
        `/company/${encodeURIComponent(symbol.toUpperCase())}/consolidated/`,
        this.baseUrl,
      ).toString(),
    ];
  }
}
