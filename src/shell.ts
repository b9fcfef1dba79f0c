import { MaxIterationsSchema, MODEL_CHOICES, ModelSchema, TemperatureSchema } from "./config";
import type { AgentOverrides, AgentSettings } from "./config";
import type { ConversationState } from "./conversation";

export type ShellCommand =
  | { kind: "question"; text: string }
  | { kind: "empty" }
  | { kind: "help" }
  | { kind: "settings" }
  | { kind: "history" }
  | { kind: "clear" }
  | { kind: "exit" }
  | { kind: "set"; overrides: AgentOverrides }
  | { kind: "invalid"; message: string };

export const HELP_TEXT = `Ask any question to search the web, or use a command:
  /settings             show the current model settings
  /model <name>         switch model (${MODEL_CHOICES.join(", ")})
  /temperature <0-1>    set the sampling temperature
  /iterations <1-10>    set the maximum number of agent iterations
  /history              print the conversation so far
  /clear                start a new conversation
  /help                 show this message
  /exit                 quit`;

function parseSetting(command: string, value: string): ShellCommand {
  switch (command) {
    case "/model": {
      const parsed = ModelSchema.safeParse(value);
      return parsed.success
        ? { kind: "set", overrides: { model: parsed.data } }
        : { kind: "invalid", message: `Unknown model "${value}". Choose one of: ${MODEL_CHOICES.join(", ")}` };
    }
    case "/temperature": {
      const parsed = TemperatureSchema.safeParse(value);
      return parsed.success
        ? { kind: "set", overrides: { temperature: parsed.data } }
        : { kind: "invalid", message: "Temperature must be a number between 0 and 1" };
    }
    default: {
      const parsed = MaxIterationsSchema.safeParse(value);
      return parsed.success
        ? { kind: "set", overrides: { maxIterations: parsed.data } }
        : { kind: "invalid", message: "Max iterations must be a whole number between 1 and 10" };
    }
  }
}

export function parseShellInput(line: string): ShellCommand {
  const text = line.trim();
  if (!text) {
    return { kind: "empty" };
  }
  if (!text.startsWith("/")) {
    return { kind: "question", text };
  }

  const [command = "", ...rest] = text.split(/\s+/);
  const value = rest.join(" ");
  switch (command.toLowerCase()) {
    case "/help":
      return { kind: "help" };
    case "/settings":
      return { kind: "settings" };
    case "/history":
      return { kind: "history" };
    case "/clear":
      return { kind: "clear" };
    case "/exit":
    case "/quit":
      return { kind: "exit" };
    case "/model":
    case "/temperature":
    case "/iterations":
      if (!value) {
        return { kind: "invalid", message: `${command} needs a value` };
      }
      return parseSetting(command.toLowerCase(), value);
    default:
      return { kind: "invalid", message: `Unknown command ${command}. Type /help for the list.` };
  }
}

export function applyOverrides(settings: AgentSettings, overrides: AgentOverrides): AgentSettings {
  return {
    model: overrides.model ?? settings.model,
    temperature: overrides.temperature ?? settings.temperature,
    maxIterations: overrides.maxIterations ?? settings.maxIterations,
  };
}

export function formatSettings(settings: AgentSettings): string {
  return `model=${settings.model} temperature=${settings.temperature} maxIterations=${settings.maxIterations}`;
}

export function formatHistory(state: ConversationState): string {
  if (!state.messages.length) {
    return "(no messages yet)";
  }
  return state.messages
    .map((message) => `${message.role === "user" ? "You" : "Agent"}: ${message.content}`)
    .join("\n\n");
}
