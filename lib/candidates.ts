import type { AssignmentPair, DrawParticipant, ExclusionPair } from "@/lib/types";

export interface CandidateGraph {
  ids: string[];
  names: string[];
  // receiversOf[giver] lists receiver indexes in participant order.
  receiversOf: number[][];
  allowed: boolean[][];
}

export interface HallViolation {
  givers: number[];
  receivers: number[];
}

export function buildCandidateGraph(
  participants: DrawParticipant[],
  exclusions: ExclusionPair[],
  avoid: AssignmentPair[] = []
): CandidateGraph {
  const indexById = new Map(participants.map((participant, index) => [participant.id, index]));
  const size = participants.length;
  const allowed = participants.map((_, giver) =>
    participants.map((__, receiver) => giver !== receiver)
  );

  const forbid = (giverId: string, receiverId: string) => {
    const giver = indexById.get(giverId);
    const receiver = indexById.get(receiverId);
    if (giver === undefined || receiver === undefined) {
      return;
    }

    allowed[giver][receiver] = false;
  };

  for (const exclusion of exclusions) {
    forbid(exclusion.giverId, exclusion.receiverId);
    if (exclusion.kind === "mutual") {
      forbid(exclusion.receiverId, exclusion.giverId);
    }
  }

  for (const pair of avoid) {
    forbid(pair.giverId, pair.receiverId);
  }

  const receiversOf: number[][] = [];
  for (let giver = 0; giver < size; giver += 1) {
    const receivers: number[] = [];
    for (let receiver = 0; receiver < size; receiver += 1) {
      if (allowed[giver][receiver]) {
        receivers.push(receiver);
      }
    }
    receiversOf.push(receivers);
  }

  return {
    ids: participants.map((participant) => participant.id),
    names: participants.map((participant) => participant.name),
    receiversOf,
    allowed
  };
}

/**
 * Cheap necessary conditions: every giver needs a receiver and every receiver
 * needs a giver. Returns the first participant that breaks either, shaped as a
 * Hall violation (givers that outnumber the receivers open to them).
 */
export function findObviousViolation(graph: CandidateGraph): HallViolation | null {
  const size = graph.ids.length;

  for (let giver = 0; giver < size; giver += 1) {
    if (graph.receiversOf[giver].length === 0) {
      return { givers: [giver], receivers: [] };
    }
  }

  for (let receiver = 0; receiver < size; receiver += 1) {
    let hasGiver = false;
    for (let giver = 0; giver < size; giver += 1) {
      if (graph.allowed[giver][receiver]) {
        hasGiver = true;
        break;
      }
    }

    if (!hasGiver) {
      const everyone = graph.ids.map((_, index) => index);
      return {
        givers: everyone,
        receivers: everyone.filter((index) => index !== receiver)
      };
    }
  }

  return null;
}

export function describeViolation(graph: CandidateGraph, violation: HallViolation) {
  const giverNames = [...violation.givers].sort((a, b) => a - b).map((index) => graph.names[index]);
  const receiverNames = [...violation.receivers]
    .sort((a, b) => a - b)
    .map((index) => graph.names[index]);

  if (violation.receivers.length === 0) {
    return `${giverNames.join(", ")} has no valid receiver`;
  }

  // All givers share every receiver but one: that receiver is unreachable.
  if (violation.givers.length === graph.ids.length) {
    const missing = graph.ids.findIndex((_, index) => !violation.receivers.includes(index));
    if (missing !== -1 && violation.receivers.length === graph.ids.length - 1) {
      return `${graph.names[missing]} has no valid giver`;
    }
  }

  return `${giverNames.join(", ")} can only give to ${receiverNames.join(", ")}`;
}

