import fetch, { type RequestInit, type Response } from "node-fetch";
import { fromFetchFailure, httpStatus } from "../errors/catalog.js";
import type { PageSource } from "../ports/page-source.js";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpPageSourceOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs: number;
  userAgent?: string;
  acceptLanguage?: string;
  fetchImpl?: FetchFn;
}

/**
 * Build the request headers sent with every page request.
 */
export function buildHeaders(options: HttpPageSourceOptions): Record<string, string> {
  const headers: Record<string, string> = {
    accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  };
  if (options.userAgent) headers["user-agent"] = options.userAgent;
  if (options.acceptLanguage) headers["accept-language"] = options.acceptLanguage;
  return headers;
}

/**
 * Create a page source that issues one GET per call using node-fetch.
 * The timeout covers the whole exchange, body included.
 */
export function createHttpPageSource(options: HttpPageSourceOptions): PageSource {
  const fetchImpl = options.fetchImpl ?? fetch;
  const headers = buildHeaders(options);

  return {
    async fetch(url: string): Promise<Uint8Array> {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), options.timeoutMs);

      try {
        const response = await fetchImpl(url, {
          method: "GET",
          headers,
          redirect: "follow",
          signal: controller.signal,
        });

        if (!response.ok) {
          // Drain so the socket is released before the next request
          await response.arrayBuffer().catch(() => undefined);
          throw httpStatus(url, response.status, response.statusText);
        }

        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw fromFetchFailure(url, error, options.timeoutMs);
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
