import type { ChatCompletionTool } from "openai/resources/chat/completions";

import { ToolInputError, UnknownToolError } from "../errors";
import type { ToolDefinition } from "./types";

export class ToolRegistry {
  readonly specs: ChatCompletionTool[];
  private readonly tools: Map<string, ToolDefinition>;

  constructor(toolDefinitions: ToolDefinition[]) {
    if (!toolDefinitions.length) {
      throw new Error("At least one tool must be provided");
    }
    this.tools = new Map();
    for (const tool of toolDefinitions) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
    this.specs = toolDefinitions.map((tool) => ({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.inputSchema,
      },
    }));
  }

  get names(): string[] {
    return Array.from(this.tools.keys());
  }

  describe(name: string): string | undefined {
    return this.tools.get(name)?.description;
  }

  async execute(name: string, input: unknown): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    const prepared = tool.prepare(input ?? {});
    if (!prepared.success) {
      throw new ToolInputError(name, prepared.issues);
    }
    return prepared.run();
  }
}
