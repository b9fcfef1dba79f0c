import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { LOG_LEVELS } from "./logger";

loadEnv();

export const MODEL_CHOICES = ["gpt-4o", "gpt-4o-mini"] as const;
export type ModelName = (typeof MODEL_CHOICES)[number];

export const ModelSchema = z.enum(MODEL_CHOICES);
export const TemperatureSchema = z.coerce.number().min(0).max(1);
export const MaxIterationsSchema = z.coerce.number().int().min(1).max(10);

const SettingsSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: ModelSchema.default("gpt-4o"),
  baseUrl: z.string().min(1).default("https://api.openai.com/v1"),
  temperature: TemperatureSchema.default(0.5),
  maxIterations: MaxIterationsSchema.default(5),
  maxTokens: z.coerce.number().int().positive().default(1024),
  topP: z.coerce.number().min(0).max(1).default(1),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
});

export type Settings = z.infer<typeof SettingsSchema>;

/** The knobs a user may change between questions. */
export interface AgentSettings {
  model: ModelName;
  temperature: number;
  maxIterations: number;
}

const AgentOverridesSchema = z
  .object({
    model: ModelSchema,
    temperature: TemperatureSchema,
    maxIterations: MaxIterationsSchema,
  })
  .partial();

export type AgentOverrides = Partial<AgentSettings>;

export interface AgentConfig extends AgentSettings {
  apiKey?: string;
  baseUrl: string;
  maxTokens: number;
  topP: number;
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function loadSettings(envPath?: string): Settings {
  if (envPath) {
    loadEnv({ path: envPath, override: false });
  }

  const env = process.env;
  return SettingsSchema.parse({
    apiKey: blankToUndefined(env.OPENAI_API_KEY),
    model: blankToUndefined(env.MODEL_NAME ?? env.OPENAI_MODEL),
    baseUrl: blankToUndefined(env.OPENAI_BASE_URL),
    temperature: blankToUndefined(env.OPENAI_TEMPERATURE),
    maxIterations: blankToUndefined(env.AGENT_MAX_ITERATIONS),
    maxTokens: blankToUndefined(env.OPENAI_MAX_TOKENS),
    topP: blankToUndefined(env.OPENAI_TOP_P),
    logLevel: blankToUndefined(env.LOG_LEVEL),
  });
}

export function agentSettingsOf(config: AgentSettings): AgentSettings {
  return {
    model: config.model,
    temperature: config.temperature,
    maxIterations: config.maxIterations,
  };
}

export function buildAgentConfig(settings: Settings, overrides: AgentOverrides = {}): AgentConfig {
  const checked = AgentOverridesSchema.parse(overrides);
  return {
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    maxTokens: settings.maxTokens,
    topP: settings.topP,
    model: checked.model ?? settings.model,
    temperature: checked.temperature ?? settings.temperature,
    maxIterations: checked.maxIterations ?? settings.maxIterations,
  };
}
