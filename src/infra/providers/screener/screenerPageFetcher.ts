import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { PageFetcherPort } from "../../../core/ports/outboundPorts";
import { toBoundaryError } from "../../http/boundaryErrors";
import { HttpClient } from "../../http/httpClient";

const PROVIDER = "screener";

/**
 * Fetches Screener HTML pages with a browser identity and the shared retry policy.
 */
export class ScreenerPageFetcher implements PageFetcherPort {
  constructor(
    private readonly userAgent: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.userAgent.trim()) {
      throw new Error("BROWSER_USER_AGENT is required to fetch Screener pages.");
    }
  }

  async fetchPage(url: string): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestText({
      url,
      timeoutMs: this.timeoutMs,
      retries: 1,
      retryDelayMs: 1_000,
      headers: {
        "User-Agent": this.userAgent,
        Accept: "text/html,application/xhtml+xml",
        "Accept-Language": "en-US,en;q=0.9",
      },
    });

    if (response.isErr()) {
      return err(toBoundaryError("page", PROVIDER, response.error));
    }

    return ok(response.value);
  }
}
