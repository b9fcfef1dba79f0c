import test from "node:test";
import assert from "node:assert/strict";

import { AgentCache, cacheKey } from "../src/agentCache";
import type { AgentSettings } from "../src/config";

const BASE: AgentSettings = { model: "gpt-4o", temperature: 0.5, maxIterations: 5 };

test("the same settings reuse the cached agent", () => {
  let builds = 0;
  const cache = new AgentCache((settings) => ({ id: ++builds, settings }));

  const first = cache.get(BASE);
  const second = cache.get({ ...BASE });

  assert.equal(first, second);
  assert.equal(builds, 1);
  assert.ok(cache.has(BASE));
});

test("changing any setting rebuilds the agent", () => {
  let builds = 0;
  const cache = new AgentCache((settings) => ({ id: ++builds, settings }));

  cache.get(BASE);
  const warmer = cache.get({ ...BASE, temperature: 0.9 });
  assert.equal(warmer.id, 2);
  assert.equal(warmer.settings.temperature, 0.9);
  assert.equal(cache.has(BASE), false);

  assert.equal(cache.get({ ...BASE, temperature: 0.9, model: "gpt-4o-mini" }).id, 3);
  assert.equal(cache.get({ ...BASE, temperature: 0.9, model: "gpt-4o-mini", maxIterations: 2 }).id, 4);
  // Only the latest tuple is kept.
  assert.equal(cache.get(BASE).id, 5);
});

test("a failing factory leaves the cache empty", () => {
  let fail = false;
  const cache = new AgentCache((settings: AgentSettings) => {
    if (fail) {
      throw new Error("OPENAI_API_KEY is not set");
    }
    return settings.model;
  });

  cache.get(BASE);
  fail = true;
  assert.throws(() => cache.get({ ...BASE, maxIterations: 3 }), /OPENAI_API_KEY is not set/);
  assert.equal(cache.has(BASE), false);

  fail = false;
  assert.equal(cache.get(BASE), "gpt-4o");
});

test("clear drops the cached agent", () => {
  let builds = 0;
  const cache = new AgentCache(() => ++builds);

  cache.get(BASE);
  cache.clear();
  assert.equal(cache.get(BASE), 2);
});

test("cache keys distinguish every setting", () => {
  assert.equal(cacheKey(BASE), '["gpt-4o",0.5,5]');
  assert.notEqual(cacheKey(BASE), cacheKey({ ...BASE, maxIterations: 6 }));
});
