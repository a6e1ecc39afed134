import type { GroupStatus } from "@/lib/types";

export type AssignmentErrorCode = "INVALID_INPUT" | "INFEASIBLE_CONSTRAINTS" | "INTERNAL_ERROR";

export abstract class AssignmentError extends Error {
  abstract readonly code: AssignmentErrorCode;
}

export class InvalidInputError extends AssignmentError {
  readonly code = "INVALID_INPUT";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * No assignment exists. `giverIds` are the givers that cannot all be served and
 * `receiverIds` the only receivers open to them (fewer than the givers).
 */
export class InfeasibleConstraintsError extends AssignmentError {
  readonly code = "INFEASIBLE_CONSTRAINTS";

  constructor(
    message: string,
    readonly giverIds: string[],
    readonly receiverIds: string[]
  ) {
    super(message);
    this.name = "InfeasibleConstraintsError";
  }
}

export class InternalAssignmentError extends AssignmentError {
  readonly code = "INTERNAL_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "InternalAssignmentError";
  }
}

export class GroupStateError extends Error {
  constructor(
    readonly status: GroupStatus,
    readonly action: string
  ) {
    super(`Cannot ${action.replace(/_/g, " ")} while group is ${status}`);
    this.name = "GroupStateError";
  }
}

export class ConcurrentModificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConcurrentModificationError";
  }
}
