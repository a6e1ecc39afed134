import test from "node:test";
import assert from "node:assert/strict";
import { createRandom, createSeed, hashSeed, normalizeSeed, shuffleInPlace } from "../lib/random";

test("seed hashing is FNV-1a over the seed text", () => {
  assert.equal(hashSeed(""), 2166136261);
  assert.equal(hashSeed("a"), 0xe40c292c);
});

test("numeric seeds normalize to their decimal text", () => {
  assert.equal(normalizeSeed(42), "42");
  assert.equal(normalizeSeed("42"), "42");
});

test("generated seeds are 16 hex characters", () => {
  assert.match(createSeed(), /^[0-9a-f]{16}$/);
});

test("the same seed yields the same sequence", () => {
  const first = createRandom("party");
  const second = createRandom("party");

  const a = Array.from({ length: 10 }, () => first.next());
  const b = Array.from({ length: 10 }, () => second.next());

  assert.deepEqual(a, b);
  for (const value of a) {
    assert.ok(value >= 0 && value < 1);
  }
});

test("int stays within its bound", () => {
  const random = createRandom("bounds");

  for (let i = 0; i < 200; i += 1) {
    const value = random.int(3);
    assert.ok(Number.isInteger(value) && value >= 0 && value < 3);
  }
});

test("shuffle keeps every item and is reproducible", () => {
  const first = shuffleInPlace([1, 2, 3, 4, 5, 6], createRandom("deck"));
  const second = shuffleInPlace([1, 2, 3, 4, 5, 6], createRandom("deck"));

  assert.deepEqual(first, second);
  assert.deepEqual([...first].sort(), [1, 2, 3, 4, 5, 6]);
});
