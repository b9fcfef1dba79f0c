#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import { createInterface } from "readline/promises";
import { stdin as input, stdout as output } from "node:process";

import { ReActAgent, type AgentRunner, type AgentStreamObserver } from "./agent";
import { AgentCache } from "./agentCache";
import {
  agentSettingsOf,
  buildAgentConfig,
  loadSettings,
  MaxIterationsSchema,
  MODEL_CHOICES,
  TemperatureSchema,
  type AgentSettings,
  type ModelName,
  type Settings,
} from "./config";
import { createConversation, processTurn, type ConversationState } from "./conversation";
import { describeError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { applyOverrides, formatHistory, formatSettings, HELP_TEXT, parseShellInput } from "./shell";
import { createConsoleStreamObserver } from "./stream";
import { createDefaultTools } from "./tools";

interface CliOptions {
  model?: ModelName;
  temperature?: number;
  maxIterations?: number;
  debug: boolean;
  thoughts: boolean;
  env?: string;
}

function parseTemperature(value: string): number {
  const parsed = TemperatureSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Temperature must be a number between 0 and 1.");
  }
  return parsed.data;
}

function parseMaxIterations(value: string): number {
  const parsed = MaxIterationsSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Max iterations must be a whole number between 1 and 10.");
  }
  return parsed.data;
}

interface ChatContext {
  cache: AgentCache<AgentRunner>;
  logger: Logger;
  streamObserver: AgentStreamObserver;
  debug: boolean;
}

function resolveAgent(context: ChatContext, current: AgentSettings): AgentRunner | undefined {
  try {
    return context.cache.get(current);
  } catch (error) {
    context.logger.error({ err: error }, "Agent initialization failed");
    console.error(`Error initializing agent: ${describeError(error)}`);
    return undefined;
  }
}

async function ask(
  context: ChatContext,
  current: AgentSettings,
  state: ConversationState,
  question: string,
): Promise<{ state: ConversationState; ok: boolean }> {
  const agent = resolveAgent(context, current);
  if (!agent) {
    return { state, ok: false };
  }

  const outcome = await processTurn(state, question, agent, {
    onStatus: (_status, label) => console.log(label),
    streamObserver: context.streamObserver,
    debug: context.debug,
  });
  if (context.debug && outcome.transcript?.length) {
    console.log("\n--- Transcript ---\n" + outcome.transcript.join("\n\n"));
  }
  if (outcome.status === "complete") {
    console.log("\nAnswer:\n" + outcome.reply);
  } else {
    console.error(outcome.reply);
  }
  return { state: outcome.state, ok: outcome.status === "complete" };
}

async function runInteractive(context: ChatContext, initial: AgentSettings): Promise<void> {
  let current = initial;
  let state = createConversation();

  console.log("Web Search AI Agent. Ask me anything, and I'll search the web for you.");
  console.log(`Settings: ${formatSettings(current)}. Type /help for commands.`);

  const rl = createInterface({ input, output });
  rl.setPrompt("\nYou: ");
  rl.prompt();
  try {
    for await (const line of rl) {
      const command = parseShellInput(line);
      if (command.kind === "exit") {
        break;
      }
      switch (command.kind) {
        case "empty":
          break;
        case "help":
          console.log(HELP_TEXT);
          break;
        case "settings":
          console.log(formatSettings(current));
          break;
        case "history":
          console.log(formatHistory(state));
          break;
        case "clear":
          state = createConversation();
          console.log("Started a new conversation.");
          break;
        case "set":
          current = applyOverrides(current, command.overrides);
          console.log(`Settings: ${formatSettings(current)}`);
          break;
        case "invalid":
          console.error(command.message);
          break;
        case "question":
          state = (await ask(context, current, state, command.text)).state;
          break;
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

function createChatContext(settings: Settings, options: CliOptions): ChatContext {
  const logger = createLogger(settings.logLevel);
  const tools = createDefaultTools(logger);
  return {
    cache: new AgentCache<AgentRunner>(
      (current) => new ReActAgent(buildAgentConfig(settings, current), tools, { logger }),
    ),
    logger,
    streamObserver: createConsoleStreamObserver({ writer: output, showThoughts: options.thoughts }),
    debug: options.debug,
  };
}

async function main() {
  const program = new Command();
  program
    .name("web-search-agent")
    .description("Ask questions and get answers researched on the web.")
    .argument("[question]", "Question to answer once; omit it to start an interactive chat")
    .addOption(new Option("-m, --model <name>", "Language model to use").choices(MODEL_CHOICES))
    .option("-t, --temperature <value>", "Sampling temperature between 0 and 1", parseTemperature)
    .option("-i, --max-iterations <value>", "Maximum agent iterations between 1 and 10", parseMaxIterations)
    .option("--debug", "Print the agent transcript after each answer", false)
    .option("--thoughts", "Stream the model's intermediate reasoning", false)
    .option("--env <path>", "Load environment variables from this file")
    .action(async (question: string | undefined, options: CliOptions) => {
      const settings = loadSettings(options.env);
      const initial = agentSettingsOf(
        buildAgentConfig(settings, {
          model: options.model,
          temperature: options.temperature,
          maxIterations: options.maxIterations,
        }),
      );
      const context = createChatContext(settings, options);

      if (question?.trim()) {
        const { ok } = await ask(context, initial, createConversation(), question.trim());
        if (!ok) {
          process.exitCode = 1;
        }
        return;
      }
      await runInteractive(context, initial);
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
