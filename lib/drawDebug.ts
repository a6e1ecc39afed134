import type { AssignmentPair, DrawParticipant, ExclusionPair } from "@/lib/types";

const debugDbTarget = resolveDebugDbTarget();

export function isDrawDebugEnabled() {
  return process.env.DRAW_DEBUG === "1";
}

export function logDrawEvent(event: string, payload: Record<string, unknown>) {
  if (!isDrawDebugEnabled()) {
    return;
  }

  const envelope = {
    ts: new Date().toISOString(),
    pid: process.pid,
    db: debugDbTarget,
    event,
    ...payload
  };

  console.log(`[draw-debug] ${JSON.stringify(envelope)}`);
}

// Order-independent fingerprint of an assignment, for comparing draws in logs.
export function assignmentKey(pairs: AssignmentPair[]) {
  return pairs
    .map((pair) => `${pair.giverId}>${pair.receiverId}`)
    .sort()
    .join("|");
}

export function countRepeatedPairs(pairs: AssignmentPair[], prior: AssignmentPair[] | null) {
  if (!prior) {
    return 0;
  }

  const priorKeys = new Set(prior.map((pair) => `${pair.giverId}>${pair.receiverId}`));
  return pairs.filter((pair) => priorKeys.has(`${pair.giverId}>${pair.receiverId}`)).length;
}

export function summarizeParticipants(participants: DrawParticipant[]) {
  return participants.map((participant) => ({
    id: participant.id,
    name: participant.name
  }));
}

export function summarizeExclusions(exclusions: ExclusionPair[]) {
  return exclusions.map((exclusion) =>
    exclusion.kind === "mutual"
      ? `${exclusion.giverId}<>${exclusion.receiverId}`
      : `${exclusion.giverId}>${exclusion.receiverId}`
  );
}

function resolveDebugDbTarget() {
  const raw = process.env.DATABASE_URL;
  if (!raw) {
    return "unknown";
  }

  try {
    const parsed = new URL(raw);
    const dbName = parsed.pathname.replace(/^\/+/, "") || "unknown";
    return `${parsed.hostname}:${parsed.port || "5432"}/${dbName}`;
  } catch {
    return "invalid-url";
  }
}
