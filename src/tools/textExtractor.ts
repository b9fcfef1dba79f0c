import { load } from "cheerio";
import type { CheerioAPI } from "cheerio";

export const DEFAULT_MAX_CHARS = 4000;
export const TRUNCATION_MARKER = "...\n[Content truncated due to length]";

const NON_CONTENT_SELECTOR = "script, style, footer, nav, aside";
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;
const TEXT_NODE = 3;
const ELEMENT_NODE = 1;

export interface ExtractOptions {
  maxChars?: number;
}

type NodeSelection = ReturnType<ReturnType<CheerioAPI["root"]>["contents"]>;

function collectTextNodes($: CheerioAPI, nodes: NodeSelection, out: string[]): void {
  nodes.each((_index, node) => {
    if (node.nodeType === TEXT_NODE) {
      const text = $(node).text().trim();
      if (text) {
        out.push(text);
      }
    } else if (node.nodeType === ELEMENT_NODE) {
      collectTextNodes($, $(node).contents(), out);
    }
  });
}

/**
 * Flattens text into one phrase per line: every line is trimmed, split on single
 * spaces, and only non-empty phrases survive. Original line and word boundaries
 * are not preserved.
 */
export function normalizeText(text: string): string {
  const phrases: string[] = [];
  for (const line of text.split(LINE_BREAK)) {
    for (const phrase of line.trim().split(" ")) {
      const trimmed = phrase.trim();
      if (trimmed) {
        phrases.push(trimmed);
      }
    }
  }
  return phrases.join("\n");
}

/** Lengths are counted in code points so surrogate pairs are never split. */
export function truncateText(text: string, maxChars = DEFAULT_MAX_CHARS): string {
  const chars = Array.from(text);
  if (chars.length <= maxChars) {
    return text;
  }
  return chars.slice(0, maxChars).join("") + TRUNCATION_MARKER;
}

export function extractText(markup: string, options: ExtractOptions = {}): string {
  // With scripting off, <noscript> children parse as elements rather than raw text.
  const $ = load(markup, { scriptingEnabled: false });
  $(NON_CONTENT_SELECTOR).remove();

  const texts: string[] = [];
  collectTextNodes($, $.root().contents(), texts);

  return truncateText(normalizeText(texts.join("\n")), options.maxChars ?? DEFAULT_MAX_CHARS);
}
