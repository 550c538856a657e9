import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import type { SearchPage } from "../types/contracts.js";
import { createChildLogger } from "../utils/logger.js";
import { isRecord } from "../utils/normalize.js";

export class SnapklikClientError extends Error {
  constructor(
    message: string,
    readonly code: "network_error" | "timeout" | "http_error" | "invalid_payload"
  ) {
    super(message);
    this.name = "SnapklikClientError";
  }
}

type FetchLike = typeof fetch;

export type SearchOptions = {
  apiURL: string;
  searchTerm: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

export type FetchAllOptions = SearchOptions & {
  pageDelayMs: number;
  maxPages: number;
  sleep?: (ms: number) => Promise<unknown>;
};

export type FetchAllResult = {
  status: "complete" | "partial" | "failed";
  pages: number;
  hits: unknown[];
  error?: SnapklikClientError;
};

const DEFAULT_TIMEOUT_MS = 10_000;

const REQUEST_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "en-US,en;q=0.9",
  Origin: "https://snapklik.com",
  Referer: "https://snapklik.com/"
};

const searchResponseSchema = z.object({
  data: z
    .object({
      hits: z.array(z.unknown()).nullish(),
      isFinished: z.boolean().nullish()
    })
    .nullish()
});

const log = createChildLogger({ module: "snapklikClient" });

export function buildSearchURL(apiURL: string, page: number, searchTerm: string): string {
  const url = new URL(apiURL);
  url.searchParams.set("p", String(page));
  url.searchParams.set("s", searchTerm);
  return url.toString();
}

/** One page of search hits, or null when the response carries no data block. */
export async function fetchSearchPage(page: number, options: SearchOptions): Promise<SearchPage | null> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const url = buildSearchURL(options.apiURL, page, options.searchTerm);

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let payload: unknown;
  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: REQUEST_HEADERS,
      signal: controller.signal
    });

    if (!response.ok) {
      throw new SnapklikClientError(`Search request failed with status ${response.status}`, "http_error");
    }

    payload = await response.json();
  } catch (error) {
    if (error instanceof SnapklikClientError) {
      throw error;
    }

    if (isAbortError(error)) {
      throw new SnapklikClientError("Search request timed out", "timeout");
    }

    if (error instanceof SyntaxError) {
      throw new SnapklikClientError("Search response is not JSON", "invalid_payload");
    }

    throw new SnapklikClientError("Failed to reach search API", "network_error");
  } finally {
    clearTimeout(timeout);
  }

  const parsed = searchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SnapklikClientError("Unexpected search response shape", "invalid_payload");
  }

  const data = parsed.data.data;
  if (!data) {
    return null;
  }

  return {
    hits: data.hits ?? [],
    isFinished: data.isFinished ?? true
  };
}

/**
 * Walks the search result pages until the API reports the last one. A failure
 * after the first page keeps what was already collected.
 */
export async function fetchAllProducts(options: FetchAllOptions): Promise<FetchAllResult> {
  const sleep: (ms: number) => Promise<unknown> = options.sleep ?? delay;
  const hits: unknown[] = [];
  let pages = 0;

  for (let page = 0; page < options.maxPages; page += 1) {
    let result: SearchPage | null;
    try {
      log.info({ msg: "Fetching search page", page });
      result = await fetchSearchPage(page, options);
    } catch (error) {
      if (!(error instanceof SnapklikClientError)) {
        throw error;
      }
      log.warn({ msg: "Search page failed", page, code: error.code, error: error.message });
      return { status: pages === 0 ? "failed" : "partial", pages, hits, error };
    }

    if (!result) {
      break;
    }

    pages += 1;
    hits.push(...result.hits);

    if (result.isFinished) {
      break;
    }

    if (page + 1 < options.maxPages) {
      await sleep(options.pageDelayMs);
    }
  }

  return { status: pages === 0 ? "failed" : "complete", pages, hits };
}

function isAbortError(error: unknown): boolean {
  return (
    isRecord(error) &&
    typeof error.name === "string" &&
    error.name.toLowerCase() === "aborterror"
  );
}
