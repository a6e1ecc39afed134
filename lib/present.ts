import type { DrawnPair, GiftProgress, Participant } from "@/lib/types";

export interface DescribedPair {
  giver: { id: string; name: string };
  receiver: { id: string; name: string; wishlist: string | null };
  gift: GiftProgress;
}

/**
 * Joins pairs with participant names for responses. Pairs naming someone who
 * is no longer in the group are dropped.
 */
export function describePairs(pairs: DrawnPair[], participants: Participant[]): DescribedPair[] {
  const byId = new Map(participants.map((participant) => [participant.id, participant]));
  const described: DescribedPair[] = [];

  for (const pair of pairs) {
    const giver = byId.get(pair.giverId);
    const receiver = byId.get(pair.receiverId);
    if (!giver || !receiver) {
      continue;
    }

    described.push({
      giver: { id: giver.id, name: giver.name },
      receiver: { id: receiver.id, name: receiver.name, wishlist: receiver.wishlist },
      gift: pair.gift
    });
  }

  return described;
}
