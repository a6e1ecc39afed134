import type { GiftProgress, GiftStep } from "@/lib/types";

export const GIFT_STEPS: readonly GiftStep[] = ["sent", "delivered", "confirmed"];

export const NO_GIFT_PROGRESS: GiftProgress = {
  sent: false,
  delivered: false,
  confirmed: false
};

/**
 * Steps are ordered: marking one marks every earlier step, clearing one clears
 * every later step.
 */
export function applyGiftStep(progress: GiftProgress, step: GiftStep, done: boolean): GiftProgress {
  const target = GIFT_STEPS.indexOf(step);
  const next = { ...progress };

  GIFT_STEPS.forEach((candidate, index) => {
    if (done && index <= target) {
      next[candidate] = true;
    }

    if (!done && index >= target) {
      next[candidate] = false;
    }
  });

  return next;
}

export function summarizeGiftProgress(pairs: Array<{ gift: GiftProgress }>) {
  return {
    total: pairs.length,
    sent: pairs.filter((pair) => pair.gift.sent).length,
    delivered: pairs.filter((pair) => pair.gift.delivered).length,
    confirmed: pairs.filter((pair) => pair.gift.confirmed).length
  };
}
