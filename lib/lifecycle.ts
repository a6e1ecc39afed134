import { GroupStateError } from "@/lib/errors";
import type { GroupStatus } from "@/lib/types";

export type GroupAction =
  | "join"
  | "edit_exclusions"
  | "draw"
  | "redraw"
  | "track_gifts"
  | "close"
  | "reopen";

const TRANSITIONS: Record<GroupAction, { from: GroupStatus; to: GroupStatus }> = {
  join: { from: "open", to: "open" },
  edit_exclusions: { from: "open", to: "open" },
  draw: { from: "open", to: "assigned" },
  redraw: { from: "assigned", to: "assigned" },
  track_gifts: { from: "assigned", to: "assigned" },
  close: { from: "assigned", to: "closed" },
  reopen: { from: "closed", to: "open" }
};

export function canPerform(status: GroupStatus, action: GroupAction) {
  return TRANSITIONS[action].from === status;
}

export function nextStatus(status: GroupStatus, action: GroupAction): GroupStatus {
  if (!canPerform(status, action)) {
    throw new GroupStateError(status, action);
  }

  return TRANSITIONS[action].to;
}

export function drawActionFor(status: GroupStatus): GroupAction {
  return status === "assigned" ? "redraw" : "draw";
}
