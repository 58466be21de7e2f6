import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { ContentKind, ResolvedDocument } from "../../core/entities/document";
import type { DocumentResolverPort } from "../../core/ports/outboundPorts";
import { isSecondaryFilingHost } from "../../core/domain/linkClassifier";
import { logger } from "../../shared/logger/logger";
import { toBoundaryError } from "../http/boundaryErrors";
import { HttpClient } from "../http/httpClient";
import { directFileUrl, extractEmbeddedPath, hostOf } from "./bseUrls";
import { expectedKindFromUrl, verifyContent } from "./contentSniffer";

const PROVIDER = "document-resolver";

export const MAX_RESOLUTION_ATTEMPTS = 5;

// Category page visited while warming a BSE session.
const BSE_WARMUP_PATH = "/corporates/ann.html";

export type DocumentResolverConfig = {
  bseBaseUrl: string;
  userAgent: string;
  alternateUserAgent: string;
  timeoutMs: number;
};

type ResolutionTarget = {
  /** URL after the BSE viewer rewrite; the requested URL for everything else. */
  url: string;
  embeddedPath: string | null;
  secondaryHost: boolean;
  expectedKind: ContentKind;
};

type ResolverStrategy = {
  name: string;
  appliesTo(target: ResolutionTarget): boolean;
  attempt(
    target: ResolutionTarget,
  ): Promise<Result<ResolvedDocument, AppBoundaryError>>;
};

const browserHeaders = (
  userAgent: string,
  extra: Record<string, string> = {},
): Record<string, string> => ({
  "User-Agent": userAgent,
  Accept:
    "application/pdf,application/vnd.ms-powerpoint,application/msword,text/html;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
  "Cache-Control": "no-cache",
  ...extra,
});

const sessionCookies = (headers: Headers): string[] =>
  headers
    .getSetCookie()
    .map((cookie) => cookie.split(";")[0]?.trim() ?? "")
    .filter(Boolean);

/**
 * Turns candidate document links into verified binary payloads. Strategies form an explicit,
 * ordered list; each runs at most once and the first verified payload wins.
 */
export class DocumentResolver implements DocumentResolverPort {
  private readonly strategies: ResolverStrategy[];
  private readonly bseHost: string;

  constructor(
    private readonly config: DocumentResolverConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    this.bseHost = hostOf(config.bseBaseUrl);
    this.strategies = [
      {
        name: "direct",
        appliesTo: () => true,
        attempt: (target) =>
          this.fetchVerified(
            "direct",
            target,
            target.url,
            browserHeaders(this.config.userAgent),
          ),
      },
      {
        name: "alternate-template",
        appliesTo: (target) => target.embeddedPath !== null,
        attempt: (target) =>
          this.fetchVerified(
            "alternate-template",
            target,
            directFileUrl(
              this.config.bseBaseUrl,
              target.embeddedPath ?? "",
              "AttachLive",
            ),
            browserHeaders(this.config.userAgent),
          ),
      },
      {
        name: "alternate-agent",
        appliesTo: (target) => target.secondaryHost,
        attempt: (target) =>
          this.fetchVerified(
            "alternate-agent",
            target,
            target.url,
            browserHeaders(this.config.alternateUserAgent, {
              Referer: `${this.config.bseBaseUrl.replace(/\/+$/, "")}/`,
            }),
          ),
      },
      {
        name: "warm-session",
        appliesTo: (target) => target.secondaryHost,
        attempt: (target) => this.warmSessionAttempt(target),
      },
    ];
  }

  async resolve(
    url: string,
  ): Promise<Result<ResolvedDocument, AppBoundaryError>> {
    const target = this.toTarget(url);
    const plan = this.strategies
      .filter((strategy) => strategy.appliesTo(target))
      .slice(0, MAX_RESOLUTION_ATTEMPTS);

    const failures: AppBoundaryError[] = [];

    for (const strategy of plan) {
      const result = await strategy.attempt(target);
      if (result.isOk()) {
        logger.debug(
          { url, finalUrl: result.value.resource.finalUrl, strategy: strategy.name },
          "Document resolved",
        );
        return result;
      }

      failures.push(result.error);
      logger.debug(
        { url, strategy: strategy.name, code: result.error.code, reason: result.error.message },
        "Resolver strategy failed",
      );
    }

    const last = failures.at(-1);
    return err({
      source: "resolver",
      code: last?.code ?? "provider_error",
      provider: PROVIDER,
      message: `Unable to resolve ${url} after ${failures.length} attempt(s): ${failures
        .map((failure) => failure.message)
        .join("; ")}`,
      retryable: false,
      httpStatus: last?.httpStatus,
    });
  }

  private toTarget(url: string): ResolutionTarget {
    const embeddedPath = extractEmbeddedPath(url, this.config.bseBaseUrl);
    const rewritten = embeddedPath
      ? directFileUrl(this.config.bseBaseUrl, embeddedPath, "AttachHis")
      : url;

    return {
      url: rewritten,
      embeddedPath,
      secondaryHost: isSecondaryFilingHost(url, this.bseHost),
      expectedKind: expectedKindFromUrl(rewritten),
    };
  }

  /**
   * Visits the BSE home page and an announcements page first so the target request carries
   * the session cookies the anti-automation layer hands out.
   */
  private async warmSessionAttempt(
    target: ResolutionTarget,
  ): Promise<Result<ResolvedDocument, AppBoundaryError>> {
    const base = this.config.bseBaseUrl.replace(/\/+$/, "");
    const cookies = new Map<string, string>();
    let referer = `${base}/`;

    for (const warmupUrl of [`${base}/`, `${base}${BSE_WARMUP_PATH}`]) {
      const response = await this.httpClient.request({
        url: warmupUrl,
        headers: browserHeaders(this.config.userAgent, {
          ...(cookies.size > 0
            ? { Cookie: [...cookies.values()].join("; ") }
            : {}),
        }),
        timeoutMs: this.config.timeoutMs,
        retries: 0,
        retryDelayMs: 0,
      });

      if (response.isErr()) {
        logger.debug(
          { warmupUrl, reason: response.error.message },
          "Session warm-up request failed; continuing",
        );
        continue;
      }

      for (const cookie of sessionCookies(response.value.headers)) {
        const name = cookie.split("=")[0] ?? cookie;
        cookies.set(name, cookie);
      }
      referer = warmupUrl;
    }

    return this.fetchVerified(
      "warm-session",
      target,
      target.url,
      browserHeaders(this.config.userAgent, {
        Referer: referer,
        ...(cookies.size > 0 ? { Cookie: [...cookies.values()].join("; ") } : {}),
      }),
    );
  }

  private async fetchVerified(
    strategy: string,
    target: ResolutionTarget,
    url: string,
    headers: Record<string, string>,
  ): Promise<Result<ResolvedDocument, AppBoundaryError>> {
    const response = await this.httpClient.request({
      url,
      headers,
      timeoutMs: this.config.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err(toBoundaryError("resolver", PROVIDER, response.error));
    }

    const { status, headers: responseHeaders, body } = response.value;
    const contentType = responseHeaders.get("content-type") ?? "";
    const verdict = verifyContent(
      status,
      contentType,
      body,
      target.expectedKind,
    );

    if (!verdict.verified) {
      return err({
        source: "resolver",
        code: "unverified_content",
        provider: PROVIDER,
        message: `${url} returned ${contentType || "an untyped body"} instead of a document.`,
        retryable: false,
        httpStatus: status,
      });
    }

    return ok({
      resource: {
        finalUrl: url,
        contentKind: verdict.contentKind,
        verified: true,
        strategy,
      },
      body,
    });
  }
}
