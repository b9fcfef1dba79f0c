import type { AgentStreamEvent, AgentStreamObserver } from "./agent";
import { stdout as outputStream } from "node:process";

function formatArguments(args: unknown): string {
  if (typeof args === "string") {
    return args;
  }
  try {
    return JSON.stringify(args);
  } catch {
    return String(args);
  }
}

export function summarizeToolPreview(content: string, limit = 600): string {
  if (content.length <= limit) {
    return content;
  }
  return `${content.slice(0, limit)}\n... (${content.length - limit} more characters)`;
}

export interface TextWriter {
  write(chunk: string): unknown;
}

export interface ConsoleStreamOptions {
  writer?: TextWriter;
  /** Echo the model's intermediate text as it streams. */
  showThoughts?: boolean;
  previewLimit?: number;
}

export function createConsoleStreamObserver(options: ConsoleStreamOptions = {}): AgentStreamObserver {
  const writer: TextWriter = options.writer ?? outputStream;
  const showThoughts = options.showThoughts ?? false;

  return (event: AgentStreamEvent) => {
    switch (event.type) {
      case "step_started": {
        writer.write(`\n=== Step ${event.step} ===\n`);
        break;
      }
      case "message_chunk": {
        if (showThoughts) {
          writer.write(event.chunk);
        }
        break;
      }
      case "message_completed": {
        if (showThoughts && event.content && !event.content.endsWith("\n")) {
          writer.write("\n");
        }
        break;
      }
      case "tool_call": {
        const activity = event.call.name === "Search" ? "Searching the web" : `Calling ${event.call.name}`;
        writer.write(`→ ${activity} with ${formatArguments(event.call.arguments)}\n`);
        break;
      }
      case "tool_result": {
        const heading = event.isError ? "⚠️ Tool error" : "← Tool result";
        writer.write(
          `${heading} (${event.call.name}):\n${summarizeToolPreview(event.result, options.previewLimit)}\n`,
        );
        break;
      }
      case "iterations_exhausted": {
        writer.write(`\nReached ${event.maxIterations} iterations, asking for a final answer.\n`);
        break;
      }
      case "run_completed": {
        writer.write("\n✔️ Run complete.\n");
        break;
      }
    }
  };
}
