export type GroupStatus = "open" | "assigned" | "closed";

export interface Group {
  id: string;
  name: string;
  slug: string;
  description: string | null;
  price_limit: string | null;
  max_participants: number;
  status: GroupStatus;
  round: number;
  // Bumped when the PIN changes; organizer tokens carry it.
  organizer_version: number;
}

export interface GroupWithPin extends Group {
  pin_hash: string;
}

export interface Participant {
  id: string;
  group_id: string;
  name: string;
  wishlist: string | null;
  joined_at: string;
}

export type DrawParticipant = Pick<Participant, "id" | "name">;

export type ExclusionKind = "mutual" | "directional";

export interface ExclusionPair {
  giverId: string;
  receiverId: string;
  kind: ExclusionKind;
}

export interface Exclusion extends ExclusionPair {
  id: string;
  group_id: string;
  reason: string | null;
}

export interface AssignmentPair {
  giverId: string;
  receiverId: string;
}

export type GiftStep = "sent" | "delivered" | "confirmed";

export type GiftProgress = Record<GiftStep, boolean>;

export interface DrawnPair extends AssignmentPair {
  gift: GiftProgress;
}

export type Seed = number | string;

export type StrategyName = "shuffle" | "matching";

export interface DrawRecord {
  id: string;
  group_id: string;
  round: number;
  seed: string;
  strategy: StrategyName;
  attempts: number;
  avoided_prior_pairs: boolean;
  created_at: string;
  superseded_at: string | null;
  pairs: DrawnPair[];
}
