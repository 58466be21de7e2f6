import { err, ok, type Result } from "neverthrow";

export type HttpRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpResponse = {
  status: number;
  /** URL after redirects. */
  url: string;
  headers: Headers;
  body: Uint8Array;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes HTTP IO so adapters share one timeout/retry/politeness policy.
 * Every network call is followed by `politenessDelayMs` before the next one may start.
 */
export class HttpClient {
  constructor(private readonly politenessDelayMs = 0) {}

  /**
   * Executes GET requests with bounded retries; the body is buffered so callers can sniff it.
   */
  async request(
    request: HttpRequest,
  ): Promise<Result<HttpResponse, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request);
      await this.delay(this.politenessDelayMs);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  /**
   * Convenience wrapper for HTML and other text payloads.
   */
  async requestText(
    request: HttpRequest,
  ): Promise<Result<string, HttpClientError>> {
    const response = await this.request(request);
    return response.map((value) => new TextDecoder().decode(value.body));
  }

  private async performRequest(
    request: HttpRequest,
  ): Promise<Result<HttpResponse, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        redirect: "follow",
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      const body = new Uint8Array(await response.arrayBuffer());
      return ok({
        status: response.status,
        url: response.url || request.url,
        headers: response.headers,
        body,
      });
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }

    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
