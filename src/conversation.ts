import type { AgentRunner, AgentStreamObserver } from "./agent";
import { describeError } from "./errors";

export type Role = "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

/** Append-only chat history for one shell session. Every turn returns a new state. */
export interface ConversationState {
  readonly messages: readonly Message[];
}

export type TurnStatus = "running" | "complete" | "error";

export const STATUS_LABELS: Record<TurnStatus, string> = {
  running: "Working on it...",
  complete: "Search complete!",
  error: "Error",
};

export interface TurnHooks {
  onStatus?: (status: TurnStatus, label: string) => void;
  streamObserver?: AgentStreamObserver;
  debug?: boolean;
}

export interface TurnOutcome {
  state: ConversationState;
  status: Exclude<TurnStatus, "running">;
  reply: string;
  transcript?: string[];
}

export function createConversation(messages: readonly Message[] = []): ConversationState {
  return { messages: [...messages] };
}

export function appendMessage(state: ConversationState, message: Message): ConversationState {
  return { messages: [...state.messages, message] };
}

export function formatTurnError(error: unknown): string {
  return `An error occurred: ${describeError(error)}`;
}

/**
 * Runs one question through the agent. The agent sees the history as it was before
 * this turn; the returned state holds the question and the reply (or the error
 * message). Never rejects.
 */
export async function processTurn(
  state: ConversationState,
  question: string,
  agent: AgentRunner,
  hooks: TurnHooks = {},
): Promise<TurnOutcome> {
  const withQuestion = appendMessage(state, { role: "user", content: question });
  hooks.onStatus?.("running", STATUS_LABELS.running);
  try {
    const { answer, transcript } = await agent.run(question, {
      history: state.messages,
      streamObserver: hooks.streamObserver,
      debug: hooks.debug,
    });
    hooks.onStatus?.("complete", STATUS_LABELS.complete);
    return {
      state: appendMessage(withQuestion, { role: "assistant", content: answer }),
      status: "complete",
      reply: answer,
      transcript,
    };
  } catch (error) {
    hooks.onStatus?.("error", STATUS_LABELS.error);
    const reply = formatTurnError(error);
    return {
      state: appendMessage(withQuestion, { role: "assistant", content: reply }),
      status: "error",
      reply,
    };
  }
}
