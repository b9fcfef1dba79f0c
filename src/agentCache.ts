import type { AgentSettings } from "./config";

export function cacheKey(settings: AgentSettings): string {
  return JSON.stringify([settings.model, settings.temperature, settings.maxIterations]);
}

/**
 * Holds the agent built for the current (model, temperature, maxIterations) tuple.
 * Asking for a different tuple drops the old agent and builds a new one.
 */
export class AgentCache<T> {
  private entry: { key: string; value: T } | undefined;

  constructor(private readonly factory: (settings: AgentSettings) => T) {}

  get(settings: AgentSettings): T {
    const key = cacheKey(settings);
    if (this.entry?.key === key) {
      return this.entry.value;
    }
    this.entry = undefined;
    const value = this.factory(settings);
    this.entry = { key, value };
    return value;
  }

  has(settings: AgentSettings): boolean {
    return this.entry?.key === cacheKey(settings);
  }

  clear(): void {
    this.entry = undefined;
  }
}
