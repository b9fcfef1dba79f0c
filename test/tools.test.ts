import test from "node:test";
import assert from "node:assert/strict";
import pino from "pino";
import { Response } from "undici";

import {
  BROWSER_USER_AGENT,
  createWebScraperTool,
  createWebSearchTool,
  NO_RESULTS,
  scrapeUrl,
  searchWeb,
  ToolRegistry,
  TRUNCATION_MARKER,
  type HttpFetch,
  type HttpRequestInit,
} from "../src/tools";

function respondWith(
  body: string | Buffer,
  init: { status?: number; statusText?: string; contentType?: string } = {},
) {
  const calls: Array<{ url: string; init: HttpRequestInit }> = [];
  const fetch: HttpFetch = async (url, requestInit) => {
    calls.push({ url, init: requestInit });
    return new Response(body, {
      status: init.status ?? 200,
      statusText: init.statusText,
      headers: init.contentType ? { "content-type": init.contentType } : undefined,
    });
  };
  return { fetch, calls };
}

// Never answers; settles only when the request signal aborts.
const hangingFetch: HttpFetch = (_url, init) =>
  new Promise((_resolve, reject) => {
    const keepAlive = setTimeout(() => reject(new Error("request was never aborted")), 5_000);
    init.signal.addEventListener(
      "abort",
      () => {
        clearTimeout(keepAlive);
        reject(init.signal.reason);
      },
      { once: true },
    );
  });

const SEARCH_HTML = `
  <div class="result__body">
    <a class="result__a" href="https://example.com/first">First title</a>
    <div class="result__snippet">First snippet.</div>
  </div>
  <div class="result__body">
    <a class="result__a" href="https://example.com/second">Second title</a>
    <div class="result__snippet">Second snippet.</div>
  </div>`;

test("WebScraper returns formatted content for a short page", async () => {
  const { fetch, calls } = respondWith("<html><body><h1>Hello</h1><p>Short article.</p></body></html>");

  const result = await scrapeUrl("https://example.test/article", { fetch });

  assert.equal(result, "Content from https://example.test/article:\n\nHello\nShort\narticle.");
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, "https://example.test/article");
  assert.equal(calls[0].init.headers["User-Agent"], BROWSER_USER_AGENT);
  assert.equal(calls[0].init.redirect, "follow");
});

test("WebScraper decodes the body with the declared charset", async () => {
  const { fetch } = respondWith(Buffer.from("<p>Café crème</p>", "latin1"), {
    contentType: "text/html; charset=ISO-8859-1",
  });

  const result = await scrapeUrl("https://latin1.test/", { fetch });

  assert.equal(result, "Content from https://latin1.test/:\n\nCafé\ncrème");
});

test("WebScraper falls back to UTF-8 for unknown charsets", async () => {
  const { fetch } = respondWith(Buffer.from("<p>naïve</p>", "utf8"), {
    contentType: 'text/html; charset="no-such-charset"',
  });

  assert.equal(await scrapeUrl("https://odd.test/", { fetch }), "Content from https://odd.test/:\n\nnaïve");
});

test("WebScraper feeds any content type to the parser", async () => {
  const plain = respondWith("just plain text", { contentType: "text/plain" });
  const json = respondWith('{"name": "value"}', { contentType: "application/json" });

  assert.equal(
    await scrapeUrl("https://example.test/notes.txt", { fetch: plain.fetch }),
    "Content from https://example.test/notes.txt:\n\njust\nplain\ntext",
  );
  assert.equal(
    await scrapeUrl("https://example.test/data.json", { fetch: json.fetch }),
    'Content from https://example.test/data.json:\n\n{"name":\n"value"}',
  );
});

test("WebScraper echoes the URL exactly as given", async () => {
  const { fetch, calls } = respondWith("<p>Spaced</p>");
  const registry = new ToolRegistry([createWebScraperTool({ fetch })]);

  const result = await registry.execute("WebScraper", { url: " https://example.test/spaced " });

  assert.equal(result, "Content from  https://example.test/spaced :\n\nSpaced");
  assert.equal(calls[0].url, " https://example.test/spaced ");
});

test("WebScraper logs the url and status of each page at debug level", async () => {
  const lines: string[] = [];
  const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
  const { fetch } = respondWith("<p>Logged page</p>", { status: 203, statusText: "Non-Authoritative Information" });

  await scrapeUrl("https://example.test/logged", { fetch, logger });

  assert.equal(lines.length, 1);
  assert.match(lines[0], /^\{"level":20,/);
  assert.ok(
    lines[0].endsWith(
      '"url":"https://example.test/logged","status":203,"htmlLength":18,"textLength":11,"msg":"Scraped page"}\n',
    ),
  );
});

test("WebScraper truncates a long page to 4000 characters plus the marker", async () => {
  const { fetch } = respondWith(`<p>${"b".repeat(10_000)}</p>`);

  const result = await scrapeUrl("https://example.test/long", { fetch });

  assert.equal(result, `Content from https://example.test/long:\n\n${"b".repeat(4000)}${TRUNCATION_MARKER}`);
});

test("WebScraper reports HTTP errors as text", async () => {
  const { fetch } = respondWith("missing", { status: 404, statusText: "Not Found" });

  const result = await scrapeUrl("https://example.test/missing", { fetch });

  assert.equal(
    result,
    "Error scraping https://example.test/missing:404 Client Error: Not Found for url: https://example.test/missing",
  );
});

test("WebScraper labels 5xx responses as server errors", async () => {
  const { fetch } = respondWith("oops", { status: 503, statusText: "Service Unavailable" });

  const result = await scrapeUrl("https://example.test/down", { fetch });

  assert.equal(
    result,
    "Error scraping https://example.test/down:503 Server Error: Service Unavailable for url: https://example.test/down",
  );
});

test("WebScraper turns a timeout into an error string", async () => {
  const result = await scrapeUrl("https://slow.test/", { fetch: hangingFetch, timeoutMs: 20 });

  assert.ok(result.startsWith("Error scraping https://slow.test/:"));
  assert.equal(result, "Error scraping https://slow.test/:Request timed out after 20ms");
});

test("WebScraper includes the cause of connection failures", async () => {
  const fetch: HttpFetch = async () => {
    throw new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND nowhere.test") });
  };

  const result = await scrapeUrl("https://nowhere.test/", { fetch });

  assert.equal(result, "Error scraping https://nowhere.test/:fetch failed (getaddrinfo ENOTFOUND nowhere.test)");
});

test("WebScraper tool validates its input and delegates to the scraper", async () => {
  const { fetch } = respondWith("<p>From the tool</p>");
  const registry = new ToolRegistry([createWebScraperTool({ fetch })]);

  const result = await registry.execute("WebScraper", { url: "https://example.test/tool" });

  assert.equal(result, "Content from https://example.test/tool:\n\nFrom\nthe\ntool");
});

test("Search joins result snippets and sends the query", async () => {
  const { fetch, calls } = respondWith(SEARCH_HTML);

  const result = await searchWeb("typescript agents", { fetch });

  assert.equal(result, "First snippet. Second snippet.");
  const requested = new URL(calls[0].url);
  assert.equal(requested.origin + requested.pathname, "https://html.duckduckgo.com/html/");
  assert.equal(requested.searchParams.get("q"), "typescript agents");
});

test("Search honours maxResults", async () => {
  const { fetch } = respondWith(SEARCH_HTML);

  const registry = new ToolRegistry([createWebSearchTool({ fetch, maxResults: 1 })]);
  const result = await registry.execute("Search", { query: "first only" });

  assert.equal(result, "First snippet.");
});

test("Search reports when nothing was found", async () => {
  const { fetch } = respondWith("<html><body><p>No results.</p></body></html>");

  assert.equal(await searchWeb("nothing", { fetch }), NO_RESULTS);
});

test("Search failures come back as text", async () => {
  const { fetch } = respondWith("busy", { status: 503, statusText: "Service Unavailable" });

  const result = await searchWeb("test", { fetch });

  assert.equal(
    result,
    "Error searching test:503 Server Error: Service Unavailable for url: https://html.duckduckgo.com/html/?q=test&kl=wt-wt",
  );
});
