import type { CandidateGraph, HallViolation } from "@/lib/candidates";
import { shuffleInPlace, type Random } from "@/lib/random";
import type { StrategyName } from "@/lib/types";

export type StrategyResult =
  | { ok: true; receivers: number[]; attempts: number }
  // `violation` is set only when the strategy proves no assignment exists.
  | { ok: false; attempts: number; violation: HallViolation | null };

export interface AssignmentStrategy {
  name: StrategyName;
  solve(graph: CandidateGraph, random: Random): StrategyResult;
}

/**
 * Shuffles receivers, then swaps each conflicting giver's receiver with another
 * giver (conflicting ones first) when the swap satisfies both. Gives up after
 * `maxShuffles` shuffles without proving anything.
 */
export function createShuffleStrategy(maxShuffles: number): AssignmentStrategy {
  return {
    name: "shuffle",
    solve(graph, random) {
      for (let attempt = 1; attempt <= maxShuffles; attempt += 1) {
        const receivers = shuffleInPlace(
          graph.ids.map((_, index) => index),
          random
        );

        if (repairConflicts(graph, receivers)) {
          return { ok: true, receivers, attempts: attempt };
        }
      }

      return { ok: false, attempts: maxShuffles, violation: null };
    }
  };
}

/**
 * Augmenting-path bipartite matching over the candidate graph, O(n * E).
 * Adjacency and giver order are shuffled so results still vary by seed.
 */
export function createMatchingStrategy(): AssignmentStrategy {
  return {
    name: "matching",
    solve(graph, random) {
      const size = graph.ids.length;
      const adjacency = graph.receiversOf.map((receivers) => shuffleInPlace([...receivers], random));
      const order = shuffleInPlace(
        graph.ids.map((_, index) => index),
        random
      );
      const giverOf = new Array<number>(size).fill(-1);

      for (const root of order) {
        const seenGivers = new Set<number>();
        const seenReceivers = new Set<number>();

        if (!augment(root, adjacency, giverOf, seenGivers, seenReceivers)) {
          // The alternating tree from `root` is a Hall violator: every receiver it
          // reached is held by another giver in the tree.
          return {
            ok: false,
            attempts: 1,
            violation: {
              givers: [...seenGivers].sort((a, b) => a - b),
              receivers: [...seenReceivers].sort((a, b) => a - b)
            }
          };
        }
      }

      const receivers = new Array<number>(size).fill(-1);
      giverOf.forEach((giver, receiver) => {
        receivers[giver] = receiver;
      });

      return { ok: true, receivers, attempts: 1 };
    }
  };
}

export function createDefaultStrategies(maxShuffles: number) {
  return [createShuffleStrategy(maxShuffles), createMatchingStrategy()];
}

function repairConflicts(graph: CandidateGraph, receivers: number[]) {
  const conflicts: number[] = [];
  receivers.forEach((receiver, giver) => {
    if (!graph.allowed[giver][receiver]) {
      conflicts.push(giver);
    }
  });

  for (const giver of conflicts) {
    if (graph.allowed[giver][receivers[giver]]) {
      continue;
    }

    const partner = findSwapPartner(graph, receivers, giver, conflicts);
    if (partner === -1) {
      return false;
    }

    const held = receivers[giver];
    receivers[giver] = receivers[partner];
    receivers[partner] = held;
  }

  return receivers.every((receiver, giver) => graph.allowed[giver][receiver]);
}

function findSwapPartner(
  graph: CandidateGraph,
  receivers: number[],
  giver: number,
  conflicts: number[]
) {
  const canSwap = (other: number) =>
    other !== giver &&
    graph.allowed[giver][receivers[other]] &&
    graph.allowed[other][receivers[giver]];

  const conflicting = conflicts.find(canSwap);
  if (conflicting !== undefined) {
    return conflicting;
  }

  for (let other = 0; other < receivers.length; other += 1) {
    if (canSwap(other)) {
      return other;
    }
  }

  return -1;
}

function augment(
  giver: number,
  adjacency: number[][],
  giverOf: number[],
  seenGivers: Set<number>,
  seenReceivers: Set<number>
): boolean {
  seenGivers.add(giver);

  for (const receiver of adjacency[giver]) {
    if (seenReceivers.has(receiver)) {
      continue;
    }

    seenReceivers.add(receiver);
    const holder = giverOf[receiver];
    if (holder === -1 || augment(holder, adjacency, giverOf, seenGivers, seenReceivers)) {
      giverOf[receiver] = giver;
      return true;
    }
  }

  return false;
}
