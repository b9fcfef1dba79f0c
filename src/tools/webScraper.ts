import { fetch as undiciFetch } from "undici";
import { TextDecoder } from "node:util";
import { z } from "zod";

import { describeError, HttpStatusError, NetworkError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { DEFAULT_MAX_CHARS, extractText } from "./textExtractor";
import { defineTool, type ToolDefinition } from "./types";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";
export const DEFAULT_TIMEOUT_MS = 10_000;

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export interface HttpRequestInit {
  headers: Record<string, string>;
  signal: AbortSignal;
  redirect: "follow";
}

/** The slice of `fetch` the scraper relies on; undici and the global fetch both fit. */
export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface WebScraperOptions {
  fetch?: HttpFetch;
  timeoutMs?: number;
  userAgent?: string;
  maxChars?: number;
  logger?: Logger;
}

// AbortSignal.timeout() rejects with a DOMException, which is not always an Error.
function isTimeout(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) {
    return false;
  }
  return error.name === "TimeoutError" || error.name === "AbortError";
}

// undici reports "fetch failed" and keeps the useful part in `cause`.
function networkMessage(error: unknown): string {
  const message = describeError(error);
  if (error instanceof Error && error.cause instanceof Error) {
    return `${message} (${error.cause.message})`;
  }
  return message;
}

export function charsetOf(contentType: string | null): string {
  const match = contentType?.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return match?.[1]?.toLowerCase() ?? "utf-8";
}

/** Decodes the body with the charset the server declared, falling back to UTF-8 for unknown labels. */
export async function readBody(response: HttpResponse): Promise<string> {
  const bytes = await response.arrayBuffer();
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charsetOf(response.headers.get("content-type")));
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
}

interface FetchedPage {
  body: string;
  status: number;
}

async function fetchPage(url: string, options: WebScraperOptions): Promise<FetchedPage> {
  const fetchFn: HttpFetch = options.fetch ?? undiciFetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: HttpResponse;
  try {
    response = await fetchFn(url, {
      headers: { "User-Agent": options.userAgent ?? BROWSER_USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
      redirect: "follow",
    });
  } catch (error) {
    if (isTimeout(error)) {
      throw new NetworkError(`Request timed out after ${timeoutMs}ms`, { cause: error });
    }
    throw new NetworkError(networkMessage(error), { cause: error });
  }

  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText, url);
  }

  try {
    return { body: await readBody(response), status: response.status };
  } catch (error) {
    throw new NetworkError(isTimeout(error) ? `Request timed out after ${timeoutMs}ms` : networkMessage(error), {
      cause: error,
    });
  }
}

/**
 * Fetches `url` and returns its cleaned text, formatted for the agent. Failures of
 * any kind come back as an `Error scraping ...` string; this never rejects.
 */
export async function scrapeUrl(url: string, options: WebScraperOptions = {}): Promise<string> {
  const logger = options.logger ?? silentLogger;
  try {
    const page = await fetchPage(url, options);
    const text = extractText(page.body, { maxChars: options.maxChars ?? DEFAULT_MAX_CHARS });
    logger.debug(
      { url, status: page.status, htmlLength: page.body.length, textLength: text.length },
      "Scraped page",
    );
    return `Content from ${url}:\n\n${text}`;
  } catch (error) {
    logger.warn({ url, err: error }, "Scraping failed");
    return `Error scraping ${url}:${describeError(error)}`;
  }
}

const WebScraperInput = z.object({
  // Checked but not trimmed: the URL is echoed back exactly as given.
  url: z.string().refine((url) => url.trim().length > 0, "url is required"),
});

export function createWebScraperTool(options: WebScraperOptions = {}): ToolDefinition {
  return defineTool({
    name: "WebScraper",
    description: "Useful for scraping content from a specific website. Input should be a URL",
    schema: WebScraperInput,
    inputSchema: {
      type: "object",
      properties: {
        url: {
          type: "string",
          description: "Absolute HTTP or HTTPS URL of the page to scrape",
        },
      },
      required: ["url"],
    },
    call: ({ url }) => scrapeUrl(url, options),
  });
}
