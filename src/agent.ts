import OpenAI from "openai";
import type {
  ChatCompletionAssistantMessageParam,
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
} from "openai/resources/chat/completions";

import type { AgentConfig } from "./config";
import type { Message } from "./conversation";
import { ConfigurationError, describeError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { BASE_SYSTEM_PROMPT, FINAL_ANSWER_PROMPT, renderInitialUserPrompt } from "./prompts";
import { ToolRegistry, type ToolDefinition } from "./tools";

export interface ToolCall {
  id: string;
  name: string;
  arguments: unknown;
  /** Set when the model sent arguments that are not valid JSON. */
  argumentsError?: string;
}

export interface RunOptions {
  debug?: boolean;
  streamObserver?: AgentStreamObserver;
  /** Earlier turns of the conversation, oldest first. */
  history?: readonly Message[];
}

export interface RunResult {
  answer: string;
  transcript?: string[];
  steps: number;
}

export type AgentStreamEvent =
  | {
      type: "step_started";
      step: number;
    }
  | {
      type: "message_chunk";
      step: number;
      chunk: string;
    }
  | {
      type: "message_completed";
      step: number;
      content: string;
      trimmedContent: string;
      toolCalls: ToolCall[];
      isFinal: boolean;
    }
  | {
      type: "tool_call";
      step: number;
      call: ToolCall;
    }
  | {
      type: "tool_result";
      step: number;
      call: ToolCall;
      result: string;
      isError: boolean;
    }
  | {
      type: "iterations_exhausted";
      maxIterations: number;
    }
  | {
      type: "run_completed";
      answer: string;
    };

export type AgentStreamObserver = (event: AgentStreamEvent) => void | Promise<void>;

/** Opens one streamed chat completion. The default implementation wraps the OpenAI client. */
export type ChatStreamFactory = (
  request: ChatCompletionCreateParamsStreaming,
) => Promise<AsyncIterable<ChatCompletionChunk>>;

export interface AgentRunner {
  run(question: string, options?: RunOptions): Promise<RunResult>;
}

export interface ReActAgentOptions {
  createStream?: ChatStreamFactory;
  logger?: Logger;
}

export function createOpenAIStreamFactory(config: AgentConfig): ChatStreamFactory {
  if (!config.apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is not set");
  }
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
  });
  return (request) => client.chat.completions.create(request);
}

export class ReActAgent implements AgentRunner {
  private readonly registry: ToolRegistry;
  private readonly createStream: ChatStreamFactory;
  private readonly logger: Logger;

  constructor(
    private readonly config: AgentConfig,
    tools: ToolDefinition[],
    options: ReActAgentOptions = {},
  ) {
    this.registry = new ToolRegistry(tools);
    this.createStream = options.createStream ?? createOpenAIStreamFactory(config);
    this.logger = options.logger ?? silentLogger;
  }

  async run(question: string, options: RunOptions = {}): Promise<RunResult> {
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: BASE_SYSTEM_PROMPT },
      ...(options.history ?? []).map(
        (message): ChatCompletionMessageParam =>
          message.role === "user"
            ? { role: "user", content: message.content }
            : { role: "assistant", content: message.content },
      ),
      { role: "user", content: renderInitialUserPrompt(question) },
    ];
    const transcript: string[] = [];
    const captureDebug = Boolean(options.debug);
    const observer = options.streamObserver;
    const maxIterations = this.config.maxIterations;

    const finish = async (answer: string, steps: number): Promise<RunResult> => {
      if (captureDebug) {
        transcript.push(`Final answer:\n${answer}`);
      }
      await observer?.({ type: "run_completed", answer });
      this.logger.info({ steps, answerLength: answer.length }, "Agent run completed");
      return captureDebug ? { answer, transcript, steps } : { answer, steps };
    };

    for (let step = 1; step <= maxIterations; step += 1) {
      await observer?.({ type: "step_started", step });
      const message = await this.complete(messages, step, observer, true);

      const trimmedThought = message.content.trim();
      if (captureDebug && trimmedThought) {
        transcript.push(`Step ${step} thought:\n${trimmedThought}`);
      }

      const assistantMessage: ChatCompletionAssistantMessageParam = {
        role: "assistant",
        content: message.content,
      };
      if (message.toolCalls.length) {
        assistantMessage.tool_calls = message.toolCalls;
      }
      messages.push(assistantMessage);

      const toolCalls = message.toolCalls.map(toToolCall);
      await observer?.({
        type: "message_completed",
        step,
        content: message.content,
        trimmedContent: trimmedThought,
        toolCalls,
        isFinal: toolCalls.length === 0,
      });
      if (!toolCalls.length) {
        return finish(trimmedThought, step);
      }

      // Tools run one at a time, in the order the model asked for them.
      for (const call of toolCalls) {
        if (captureDebug) {
          transcript.push(`Step ${step} tool ${call.name} input:\n${formatToolArguments(call.arguments)}`);
        }
        await observer?.({ type: "tool_call", step, call });
        const { result, isError } = await this.executeTool(call);
        messages.push({
          role: "tool",
          tool_call_id: call.id,
          content: result,
        });
        await observer?.({ type: "tool_result", step, call, result, isError });
        if (captureDebug) {
          transcript.push(
            `Step ${step} tool ${call.name} ${isError ? "error" : "result"}:\n${summarizeToolResult(result)}`,
          );
        }
      }
    }

    this.logger.warn({ maxIterations }, "Iteration budget exhausted, forcing a final answer");
    await observer?.({ type: "iterations_exhausted", maxIterations });
    const finalStep = maxIterations + 1;
    await observer?.({ type: "step_started", step: finalStep });
    messages.push({ role: "user", content: FINAL_ANSWER_PROMPT });
    const message = await this.complete(messages, finalStep, observer, false);
    const answer = message.content.trim();
    await observer?.({
      type: "message_completed",
      step: finalStep,
      content: message.content,
      trimmedContent: answer,
      toolCalls: [],
      isFinal: true,
    });
    return finish(answer, finalStep);
  }

  private async executeTool(call: ToolCall): Promise<{ result: string; isError: boolean }> {
    if (call.argumentsError) {
      return { result: `${call.name} failed: ${call.argumentsError}`, isError: true };
    }
    try {
      const result = await this.registry.execute(call.name, call.arguments);
      return { result, isError: false };
    } catch (error) {
      this.logger.warn({ tool: call.name, err: error }, "Tool call failed");
      return { result: `${call.name} failed: ${describeError(error)}`, isError: true };
    }
  }

  private async complete(
    messages: ChatCompletionMessageParam[],
    step: number,
    observer: AgentStreamObserver | undefined,
    withTools: boolean,
  ): Promise<CollectedMessage> {
    const request: ChatCompletionCreateParamsStreaming = {
      model: this.config.model,
      messages,
      temperature: this.config.temperature,
      top_p: this.config.topP,
      max_tokens: this.config.maxTokens,
      stream: true,
    };
    if (withTools) {
      request.tools = this.registry.specs;
    }
    this.logger.debug({ step, model: request.model, messages: messages.length, withTools }, "Requesting completion");
    const stream = await this.createStream(request);
    return collectStream(stream, async (chunk) => {
      await observer?.({ type: "message_chunk", step, chunk });
    });
  }
}

interface CollectedMessage {
  content: string;
  toolCalls: ChatCompletionMessageToolCall[];
}

interface ToolCallAccumulator {
  id?: string;
  name: string;
  arguments: string;
}

async function collectStream(
  stream: AsyncIterable<ChatCompletionChunk>,
  onContentChunk: (chunk: string) => Promise<void>,
): Promise<CollectedMessage> {
  const toolCalls = new Map<number, ToolCallAccumulator>();
  let content = "";

  for await (const chunk of stream) {
    for (const choice of chunk.choices) {
      const delta = choice.delta;
      if (delta.content) {
        content += delta.content;
        await onContentChunk(delta.content);
      }
      for (const toolCall of delta.tool_calls ?? []) {
        const existing = toolCalls.get(toolCall.index) ?? { name: "", arguments: "" };
        if (toolCall.id) {
          existing.id = toolCall.id;
        }
        if (toolCall.function?.name) {
          existing.name = toolCall.function.name;
        }
        if (toolCall.function?.arguments) {
          existing.arguments += toolCall.function.arguments;
        }
        toolCalls.set(toolCall.index, existing);
      }
    }
  }

  const ordered = Array.from(toolCalls.entries()).sort(([a], [b]) => a - b);
  return {
    content,
    toolCalls: ordered.map(([index, call]): ChatCompletionMessageToolCall => ({
      id: call.id ?? `call_${index}`,
      type: "function",
      function: {
        name: call.name,
        arguments: call.arguments,
      },
    })),
  };
}

function toToolCall(call: ChatCompletionMessageToolCall): ToolCall {
  const raw = call.function.arguments.trim() || "{}";
  try {
    return { id: call.id, name: call.function.name, arguments: JSON.parse(raw) };
  } catch (error) {
    return {
      id: call.id,
      name: call.function.name,
      arguments: raw,
      argumentsError: `arguments are not valid JSON (${describeError(error)})`,
    };
  }
}

function formatToolArguments(args: unknown): string {
  if (typeof args === "string") {
    return args;
  }
  try {
    return JSON.stringify(args, null, 2);
  } catch {
    return String(args);
  }
}

function summarizeToolResult(content: string): string {
  const limit = 1200;
  if (content.length <= limit) {
    return content;
  }
  return `${content.slice(0, limit)}\n... (truncated)`;
}
