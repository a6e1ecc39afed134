import { assign, verifyAssignment, type AssignmentOutcome } from "@/lib/assignment";
import type { DrawConfig } from "@/lib/config";
import {
  assignmentKey,
  countRepeatedPairs,
  logDrawEvent,
  summarizeExclusions,
  summarizeParticipants
} from "@/lib/drawDebug";
import { AssignmentError, ConcurrentModificationError } from "@/lib/errors";
import { drawActionFor, nextStatus } from "@/lib/lifecycle";
import type {
  AssignmentPair,
  DrawParticipant,
  DrawRecord,
  ExclusionPair,
  Group,
  GroupStatus,
  Participant,
  Seed,
  StrategyName
} from "@/lib/types";

export interface NewDraw {
  round: number;
  seed: string;
  strategy: StrategyName;
  attempts: number;
  avoidedPriorPairs: boolean;
  pairs: AssignmentPair[];
  // Status the draw was computed against; the store rejects the save if it moved.
  expectedStatus: GroupStatus;
}

/**
 * Persistence the draw depends on. Members must come back in a stable order,
 * since a seed only reproduces a draw over the same ordering.
 *
 * `saveAssignment` must re-read members and exclusions under the same lock it
 * writes with and pass them to `assertDrawStillValid`: they are loaded without
 * a lock and can change while the engine runs.
 */
export interface DrawStore {
  loadGroupMembers(groupId: string): Promise<Participant[]>;
  loadExclusionPairs(groupId: string): Promise<ExclusionPair[]>;
  loadPriorAssignment(groupId: string): Promise<AssignmentPair[] | null>;
  saveAssignment(groupId: string, draw: NewDraw): Promise<DrawRecord>;
}

export async function runDraw(
  store: DrawStore,
  { group, seed }: { group: Group; seed?: Seed },
  config: Pick<DrawConfig, "engine" | "avoidPriorPairs">
) {
  const action = drawActionFor(group.status);
  nextStatus(group.status, action);

  const [participants, exclusions, prior] = await Promise.all([
    store.loadGroupMembers(group.id),
    store.loadExclusionPairs(group.id),
    config.avoidPriorPairs ? store.loadPriorAssignment(group.id) : Promise.resolve(null)
  ]);

  let outcome: AssignmentOutcome;
  try {
    outcome = assign(
      {
        participants,
        exclusions,
        seed,
        avoid: prior ?? undefined
      },
      config.engine
    );
  } catch (error) {
    if (error instanceof AssignmentError) {
      logDrawEvent("draw_rejected", {
        groupId: group.id,
        action,
        code: error.code,
        reason: error.message,
        participants: summarizeParticipants(participants),
        exclusions: summarizeExclusions(exclusions)
      });
    }

    throw error;
  }

  const draw = await store.saveAssignment(group.id, {
    round: group.round,
    seed: outcome.seed,
    strategy: outcome.strategy,
    attempts: outcome.attempts,
    avoidedPriorPairs: outcome.avoidedPriorPairs,
    pairs: outcome.pairs,
    expectedStatus: group.status
  });

  logDrawEvent(action, {
    groupId: group.id,
    drawId: draw.id,
    round: draw.round,
    seed: outcome.seed,
    strategy: outcome.strategy,
    attempts: outcome.attempts,
    avoidedPriorPairs: outcome.avoidedPriorPairs,
    repeatedPairs: countRepeatedPairs(outcome.pairs, prior),
    key: assignmentKey(outcome.pairs),
    participants: summarizeParticipants(participants),
    exclusions: summarizeExclusions(exclusions)
  });

  return { action, draw };
}

export function assertDrawStillValid(
  members: DrawParticipant[],
  exclusions: ExclusionPair[],
  pairs: AssignmentPair[]
) {
  const check = verifyAssignment(members, exclusions, pairs);
  if (!check.ok) {
    throw new ConcurrentModificationError(
      `Participants or exclusions changed during the draw (${check.reason}). Try again.`
    );
  }
}
