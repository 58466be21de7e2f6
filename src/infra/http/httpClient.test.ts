import { afterEach, describe, expect, it } from "vitest";
import { HttpClient } from "./httpClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("HttpClient", () => {
  it("retries retryable failures up to configured attempts", async () => {
    let attempts = 0;

    setFetch(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw new Error("socket reset");
      }

      return new Response("<html>ok</html>", { status: 200 });
    });

    const client = new HttpClient();
    const result = await client.requestText({
      url: "https://example.test/retry",
      timeoutMs: 500,
      retries: 2,
      retryDelayMs: 1,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toBe("<html>ok</html>");
    expect(attempts).toBe(3);
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          if (signal.aborted) {
            reject(new DOMException("Aborted", "AbortError"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const client = new HttpClient();
    const result = await client.request({
      url: "https://example.test/timeout",
      timeoutMs: 5,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.retryable).toBe(true);
  });

  it("maps non-success statuses with retryability metadata", async () => {
    setFetch(async () => new Response("forbidden", { status: 403 }));

    const client = new HttpClient();
    const result = await client.request({
      url: "https://example.test/status",
      timeoutMs: 500,
      retries: 2,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.code).toBe("non_success_status");
    expect(result.error.httpStatus).toBe(403);
    expect(result.error.retryable).toBe(false);
  });

  it("returns raw bytes, headers and the request URL when fetch reports none", async () => {
    setFetch(
      async () =>
        new Response("%PDF", {
          status: 200,
          headers: { "content-type": "application/pdf" },
        }),
    );

    const client = new HttpClient();
    const result = await client.request({
      url: "https://example.test/doc.pdf",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(Array.from(result.value.body)).toEqual([0x25, 0x50, 0x44, 0x46]);
    expect(result.value.headers.get("content-type")).toBe("application/pdf");
    expect(result.value.url).toBe("https://example.test/doc.pdf");
    expect(result.value.status).toBe(200);
  });

  it("waits the politeness delay after every call", async () => {
    const startedAt: number[] = [];
    setFetch(async () => {
      startedAt.push(Date.now());
      return new Response("ok", { status: 200 });
    });

    const client = new HttpClient(40);
    await client.request({
      url: "https://example.test/a",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });
    await client.request({
      url: "https://example.test/b",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(startedAt).toHaveLength(2);
    expect((startedAt[1] ?? 0) - (startedAt[0] ?? 0)).toBeGreaterThanOrEqual(35);
  });
});
