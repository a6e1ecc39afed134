import {
  buildCandidateGraph,
  describeViolation,
  findObviousViolation,
  type CandidateGraph,
  type HallViolation
} from "@/lib/candidates";
import {
  InfeasibleConstraintsError,
  InternalAssignmentError,
  InvalidInputError
} from "@/lib/errors";
import { createRandom, createSeed, normalizeSeed, type Random } from "@/lib/random";
import { createDefaultStrategies, type AssignmentStrategy } from "@/lib/strategies";
import type {
  AssignmentPair,
  DrawParticipant,
  ExclusionPair,
  Seed,
  StrategyName
} from "@/lib/types";

export const DEFAULT_MAX_SHUFFLES = 1000;

export interface EngineConfig {
  maxShuffles: number;
  // Tried in order; defaults to shuffle-and-repair, then matching.
  strategies?: AssignmentStrategy[];
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxShuffles: DEFAULT_MAX_SHUFFLES
};

export interface AssignInput {
  participants: DrawParticipant[];
  exclusions?: ExclusionPair[];
  seed?: Seed;
  // Pairs from an earlier draw, avoided when a draw without them exists.
  avoid?: AssignmentPair[];
}

export interface AssignmentOutcome {
  pairs: AssignmentPair[];
  seed: string;
  strategy: StrategyName;
  attempts: number;
  avoidedPriorPairs: boolean;
}

type SolveResult =
  | { ok: true; receivers: number[]; strategy: StrategyName; attempts: number }
  // A null violation means no strategy could prove infeasibility.
  | { ok: false; violation: HallViolation | null; attempts: number };

export function assign(input: AssignInput, config: EngineConfig = DEFAULT_ENGINE_CONFIG): AssignmentOutcome {
  const exclusions = input.exclusions ?? [];
  validateInput(input.participants, exclusions, config);

  const seed = input.seed === undefined ? createSeed() : normalizeSeed(input.seed);
  const random = createRandom(seed);
  const strategies = config.strategies ?? createDefaultStrategies(config.maxShuffles);
  const check = (pairs: AssignmentPair[]) =>
    verifyAssignment(input.participants, exclusions, pairs).ok;

  const hardGraph = buildCandidateGraph(input.participants, exclusions);
  let attempts = 0;

  const avoid = input.avoid ?? [];
  if (avoid.length > 0) {
    const softGraph = buildCandidateGraph(input.participants, exclusions, avoid);
    const soft = solve(softGraph, random, strategies, check);
    attempts += soft.attempts;

    if (soft.ok) {
      return {
        pairs: toPairs(softGraph, soft.receivers),
        seed,
        strategy: soft.strategy,
        attempts,
        avoidedPriorPairs: true
      };
    }
  }

  const hard = solve(hardGraph, random, strategies, check);
  attempts += hard.attempts;

  if (!hard.ok) {
    if (!hard.violation) {
      throw new InternalAssignmentError("No strategy produced an assignment or an infeasibility proof");
    }

    throw new InfeasibleConstraintsError(
      describeViolation(hardGraph, hard.violation),
      hard.violation.givers.map((index) => hardGraph.ids[index]),
      hard.violation.receivers.map((index) => hardGraph.ids[index])
    );
  }

  return {
    pairs: toPairs(hardGraph, hard.receivers),
    seed,
    strategy: hard.strategy,
    attempts,
    avoidedPriorPairs: false
  };
}

export function verifyAssignment(
  participants: DrawParticipant[],
  exclusions: ExclusionPair[],
  pairs: AssignmentPair[]
): { ok: true } | { ok: false; reason: string } {
  const ids = new Set(participants.map((participant) => participant.id));

  if (pairs.length !== ids.size) {
    return {
      ok: false,
      reason: `Expected ${ids.size} pairs, got ${pairs.length}`
    };
  }

  const givers = new Set<string>();
  const receivers = new Set<string>();
  const forbidden = new Set<string>();

  for (const exclusion of exclusions) {
    forbidden.add(pairKey(exclusion.giverId, exclusion.receiverId));
    if (exclusion.kind === "mutual") {
      forbidden.add(pairKey(exclusion.receiverId, exclusion.giverId));
    }
  }

  for (const pair of pairs) {
    if (!ids.has(pair.giverId) || !ids.has(pair.receiverId)) {
      return { ok: false, reason: `Pair ${pair.giverId} -> ${pair.receiverId} names an unknown participant` };
    }

    if (pair.giverId === pair.receiverId) {
      return { ok: false, reason: `${pair.giverId} is assigned to themselves` };
    }

    if (givers.has(pair.giverId)) {
      return { ok: false, reason: `${pair.giverId} gives more than once` };
    }

    if (receivers.has(pair.receiverId)) {
      return { ok: false, reason: `${pair.receiverId} receives more than once` };
    }

    if (forbidden.has(pairKey(pair.giverId, pair.receiverId))) {
      return { ok: false, reason: `${pair.giverId} -> ${pair.receiverId} is excluded` };
    }

    givers.add(pair.giverId);
    receivers.add(pair.receiverId);
  }

  return { ok: true };
}

function solve(
  graph: CandidateGraph,
  random: Random,
  strategies: AssignmentStrategy[],
  check: (pairs: AssignmentPair[]) => boolean
): SolveResult {
  const obvious = findObviousViolation(graph);
  if (obvious) {
    return { ok: false, violation: obvious, attempts: 0 };
  }

  let attempts = 0;

  for (const [index, strategy] of strategies.entries()) {
    const result = strategy.solve(graph, random);
    attempts += result.attempts;

    if (!result.ok) {
      if (result.violation) {
        return { ok: false, violation: result.violation, attempts };
      }

      continue;
    }

    if (check(toPairs(graph, result.receivers))) {
      return { ok: true, receivers: result.receivers, strategy: strategy.name, attempts };
    }

    if (index === strategies.length - 1) {
      throw new InternalAssignmentError(`Strategy "${strategy.name}" produced an invalid assignment`);
    }
  }

  return { ok: false, violation: null, attempts };
}

function validateInput(
  participants: DrawParticipant[],
  exclusions: ExclusionPair[],
  config: EngineConfig
) {
  if (!Number.isInteger(config.maxShuffles) || config.maxShuffles < 1) {
    throw new InvalidInputError("maxShuffles must be a positive integer");
  }

  if (participants.length < 2) {
    throw new InvalidInputError("At least 2 participants are required");
  }

  const ids = new Set<string>();
  for (const participant of participants) {
    if (ids.has(participant.id)) {
      throw new InvalidInputError(`Duplicate participant id: ${participant.id}`);
    }
    ids.add(participant.id);
  }

  for (const exclusion of exclusions) {
    for (const id of [exclusion.giverId, exclusion.receiverId]) {
      if (!ids.has(id)) {
        throw new InvalidInputError(`Exclusion references unknown participant: ${id}`);
      }
    }

    if (exclusion.giverId === exclusion.receiverId) {
      throw new InvalidInputError(`Exclusion pairs ${exclusion.giverId} with themselves`);
    }
  }
}

function toPairs(graph: CandidateGraph, receivers: number[]): AssignmentPair[] {
  return receivers.map((receiver, giver) => ({
    giverId: graph.ids[giver],
    receiverId: graph.ids[receiver]
  }));
}

function pairKey(giverId: string, receiverId: string) {
  return `${giverId}->${receiverId}`;
}
