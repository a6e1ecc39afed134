import test from "node:test";
import assert from "node:assert/strict";
import { applyGiftStep, NO_GIFT_PROGRESS, summarizeGiftProgress } from "../lib/gifts";

test("marking a later step marks the earlier ones", () => {
  assert.deepEqual(applyGiftStep(NO_GIFT_PROGRESS, "delivered", true), {
    sent: true,
    delivered: true,
    confirmed: false
  });
  assert.deepEqual(applyGiftStep(NO_GIFT_PROGRESS, "confirmed", true), {
    sent: true,
    delivered: true,
    confirmed: true
  });
});

test("clearing a step clears the later ones and keeps the earlier ones", () => {
  const full = { sent: true, delivered: true, confirmed: true };

  assert.deepEqual(applyGiftStep(full, "delivered", false), {
    sent: true,
    delivered: false,
    confirmed: false
  });
  assert.deepEqual(applyGiftStep(full, "sent", false), NO_GIFT_PROGRESS);
});

test("applying a step leaves the input untouched", () => {
  const progress = { sent: false, delivered: false, confirmed: false };

  applyGiftStep(progress, "confirmed", true);

  assert.deepEqual(progress, NO_GIFT_PROGRESS);
});

test("progress summary counts each step", () => {
  const summary = summarizeGiftProgress([
    { gift: { sent: true, delivered: true, confirmed: false } },
    { gift: { sent: true, delivered: false, confirmed: false } },
    { gift: NO_GIFT_PROGRESS }
  ]);

  assert.deepEqual(summary, { total: 3, sent: 2, delivered: 1, confirmed: 0 });
});
