import test from "node:test";
import assert from "node:assert/strict";
import { loadDrawConfig } from "../lib/config";

test("defaults apply when nothing is set", () => {
  assert.deepEqual(loadDrawConfig({}), {
    engine: { maxShuffles: 1000 },
    avoidPriorPairs: true,
    defaultPriceLimit: null,
    maxParticipants: 100,
    unlock: { maxAttempts: 5, windowMs: 900_000 }
  });
});

test("blank values fall back to defaults", () => {
  const config = loadDrawConfig({ ASSIGNMENT_MAX_SHUFFLES: "  ", DEFAULT_PRICE_LIMIT: "" });

  assert.equal(config.engine.maxShuffles, 1000);
  assert.equal(config.defaultPriceLimit, null);
});

test("environment values override defaults", () => {
  assert.deepEqual(
    loadDrawConfig({
      ASSIGNMENT_MAX_SHUFFLES: "50",
      AVOID_PRIOR_PAIRS: "0",
      DEFAULT_PRICE_LIMIT: " 30 EUR ",
      MAX_PARTICIPANTS: "12",
      UNLOCK_MAX_ATTEMPTS: "3",
      UNLOCK_WINDOW_SECONDS: "60"
    }),
    {
      engine: { maxShuffles: 50 },
      avoidPriorPairs: false,
      defaultPriceLimit: "30 EUR",
      maxParticipants: 12,
      unlock: { maxAttempts: 3, windowMs: 60_000 }
    }
  );
});

test("invalid values name every offending variable", () => {
  assert.throws(
    () => loadDrawConfig({ ASSIGNMENT_MAX_SHUFFLES: "0", MAX_PARTICIPANTS: "abc" }),
    { message: "Invalid draw configuration: ASSIGNMENT_MAX_SHUFFLES, MAX_PARTICIPANTS" }
  );
  assert.throws(() => loadDrawConfig({ AVOID_PRIOR_PAIRS: "yes" }), {
    message: "Invalid draw configuration: AVOID_PRIOR_PAIRS"
  });
});
