import { describe, it, expect, vi } from "vitest";
import { Response, FetchError, type RequestInit } from "node-fetch";
import { buildHeaders, createHttpPageSource, type FetchFn } from "./http-page-source.js";
import { CLIError } from "../errors/types.js";

async function rejection(promise: Promise<unknown>): Promise<CLIError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof CLIError) return error;
    throw error;
  }
  throw new Error("expected a CLIError");
}

describe("http-page-source", () => {
  it("returns the body bytes of a 200 response", async () => {
    const body = Buffer.from([0x3c, 0x68, 0x31, 0x3e, 0x83, 0x77, 0x83, 0x8b, 0x83, 0x76]);
    const fetchImpl: FetchFn = vi.fn(async () => new Response(body, { status: 200 }));
    const source = createHttpPageSource({ timeoutMs: 1000, fetchImpl });

    const result = await source.fetch("https://help.example.test/a.html");

    expect(Buffer.from(result).equals(body)).toBe(true);
  });

  it("sends a single GET with the configured headers and a signal", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) => new Response("ok"));
    const source = createHttpPageSource({
      timeoutMs: 1000,
      userAgent: "test-agent",
      acceptLanguage: "ja-JP",
      fetchImpl,
    });

    await source.fetch("https://help.example.test/a.html");

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("https://help.example.test/a.html");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "user-agent": "test-agent",
      "accept-language": "ja-JP",
    });
    expect(init?.signal).toBeDefined();
  });

  it("rejects with HTTP_STATUS for a non-2xx response", async () => {
    const fetchImpl: FetchFn = vi.fn(async () =>
      new Response("boom", { status: 503, statusText: "Service Unavailable" })
    );
    const source = createHttpPageSource({ timeoutMs: 1000, fetchImpl });

    const error = await rejection(source.fetch("https://help.example.test/b.html"));

    expect(error.code).toBe("HTTP_STATUS");
    expect(error.message).toBe("Server answered 503 Service Unavailable");
    expect(error.details).toBe("https://help.example.test/b.html");
  });

  it("rejects with NETWORK_UNREACHABLE for a connection error", async () => {
    const fetchImpl: FetchFn = vi.fn(async () => {
      throw new FetchError("request to https://help.example.test/ failed", "system", {
        code: "ECONNREFUSED",
      });
    });
    const source = createHttpPageSource({ timeoutMs: 1000, fetchImpl });

    const error = await rejection(source.fetch("https://help.example.test/"));

    expect(error.code).toBe("NETWORK_UNREACHABLE");
    expect(error.message).toBe(
      "Request failed: ECONNREFUSED (request to https://help.example.test/ failed)"
    );
  });

  it("aborts and rejects with NETWORK_TIMEOUT when the server hangs", async () => {
    const fetchImpl: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          const abort = new Error("The operation was aborted.");
          abort.name = "AbortError";
          reject(abort);
        });
      });
    const source = createHttpPageSource({ timeoutMs: 20, fetchImpl });

    const error = await rejection(source.fetch("https://help.example.test/slow"));

    expect(error.code).toBe("NETWORK_TIMEOUT");
    expect(error.message).toBe("Request timed out after 20ms");
  });

  describe("buildHeaders", () => {
    it("omits headers that aren't configured", () => {
      expect(buildHeaders({ timeoutMs: 1 })).toEqual({
        accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      });
    });
  });
});
