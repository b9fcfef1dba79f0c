import { load } from "cheerio";
import { fetch as undiciFetch } from "undici";
import { z } from "zod";

import { describeError, HttpStatusError } from "../errors";
import { silentLogger, type Logger } from "../logger";
import { defineTool, type ToolDefinition } from "./types";
import { BROWSER_USER_AGENT, DEFAULT_TIMEOUT_MS, readBody, type HttpFetch } from "./webScraper";

export const SEARCH_ENDPOINT = "https://html.duckduckgo.com/html/";
export const NO_RESULTS = "No good DuckDuckGo Search Result was found";

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchOptions {
  fetch?: HttpFetch;
  maxResults?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export function parseResults(html: string, limit: number): SearchResult[] {
  const $ = load(html);
  const items: SearchResult[] = [];
  $(".result__body").each((_idx, el) => {
    if (items.length >= limit) {
      return false;
    }
    const title = $(el).find(".result__a").text().trim();
    const url = $(el).find(".result__a").attr("href") || "";
    const snippet = $(el).find(".result__snippet").text().trim();
    if (title && url) {
      items.push({ title, url, snippet });
    }
    return undefined;
  });
  return items;
}

/** Snippets joined into one paragraph, the shape the agent reads search output in. */
export function formatResults(results: SearchResult[]): string {
  const snippets = results.map((result) => result.snippet).filter(Boolean);
  return snippets.length ? snippets.join(" ") : NO_RESULTS;
}

export async function searchWeb(query: string, options: WebSearchOptions = {}): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const limit = Math.max(1, Math.min(options.maxResults ?? 6, 10));
  const endpoint = new URL(SEARCH_ENDPOINT);
  endpoint.searchParams.set("q", query);
  endpoint.searchParams.set("kl", "wt-wt");
  try {
    const fetchFn: HttpFetch = options.fetch ?? undiciFetch;
    const response = await fetchFn(endpoint.toString(), {
      headers: { "User-Agent": BROWSER_USER_AGENT },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      redirect: "follow",
    });
    if (!response.ok) {
      throw new HttpStatusError(response.status, response.statusText, endpoint.toString());
    }
    const results = parseResults(await readBody(response), limit);
    logger.debug({ query, results: results.length }, "Search completed");
    return formatResults(results);
  } catch (error) {
    logger.warn({ query, err: error }, "Search failed");
    return `Error searching ${query}:${describeError(error)}`;
  }
}

const WebSearchInput = z.object({
  query: z.string().trim().min(1, "query is required"),
});

export function createWebSearchTool(options: WebSearchOptions = {}): ToolDefinition {
  return defineTool({
    name: "Search",
    description: "Useful for searching the web for information. Input should be a search query",
    schema: WebSearchInput,
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Search keywords or a natural-language question",
        },
      },
      required: ["query"],
    },
    call: ({ query }) => searchWeb(query, options),
  });
}
