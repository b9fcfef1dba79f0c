import type { Logger } from "../logger";
import type { ToolDefinition } from "./types";
import { createWebScraperTool } from "./webScraper";
import { createWebSearchTool } from "./webSearch";

export * from "./types";
export * from "./registry";
export * from "./textExtractor";
export * from "./webScraper";
export * from "./webSearch";

export function createDefaultTools(logger?: Logger): ToolDefinition[] {
  return [createWebSearchTool({ logger }), createWebScraperTool({ logger })];
}
