import type { TransactionSql } from "postgres";
import { sql } from "@/lib/db";
import { assertDrawStillValid, type DrawStore } from "@/lib/draw";
import { GroupStateError } from "@/lib/errors";
import { applyGiftStep, NO_GIFT_PROGRESS } from "@/lib/gifts";
import { drawActionFor, nextStatus, type GroupAction } from "@/lib/lifecycle";
import type {
  AssignmentPair,
  DrawnPair,
  DrawRecord,
  Exclusion,
  ExclusionKind,
  ExclusionPair,
  GiftStep,
  Group,
  GroupStatus,
  GroupWithPin,
  Participant,
  StrategyName
} from "@/lib/types";

type Timestamp = Date | string;

type ParticipantRow = Omit<Participant, "joined_at"> & { joined_at: Timestamp };

interface ExclusionRow {
  id: string;
  group_id: string;
  giver_id: string;
  receiver_id: string;
  kind: ExclusionKind;
  reason: string | null;
}

interface DrawRow {
  id: string;
  group_id: string;
  round: number;
  seed: string;
  strategy: StrategyName;
  attempts: number;
  avoided_prior_pairs: boolean;
  created_at: Timestamp;
  superseded_at: Timestamp | null;
}

interface PairRow {
  giver_id: string | null;
  receiver_id: string | null;
}

interface DrawPairRow extends PairRow {
  gift_sent: boolean;
  gift_delivered: boolean;
  gift_confirmed: boolean;
}

interface CurrentPairRow extends DrawPairRow {
  draw_id: string;
  position: number;
  giver_id: string;
  receiver_id: string;
}

export async function createGroup({
  name,
  slug,
  pinHash,
  description,
  priceLimit,
  maxParticipants
}: {
  name: string;
  slug: string;
  pinHash: string;
  description: string | null;
  priceLimit: string | null;
  maxParticipants: number;
}) {
  const rows = await sql<Group[]>`
    insert into groups (name, slug, pin_hash, description, price_limit, max_participants)
    values (${name}, ${slug}, ${pinHash}, ${description}, ${priceLimit}, ${maxParticipants})
    returning id, name, slug, description, price_limit, max_participants, status, round, organizer_version
  `;

  return rows[0];
}

export async function getGroupBySlug(slug: string) {
  const rows = await sql<Group[]>`
    select id, name, slug, description, price_limit, max_participants, status, round, organizer_version
    from groups
    where slug = ${slug}
    limit 1
  `;

  return rows[0] ?? null;
}

export async function getGroupWithPinBySlug(slug: string) {
  const rows = await sql<GroupWithPin[]>`
    select id, name, slug, description, price_limit, max_participants, status, round, organizer_version, pin_hash
    from groups
    where slug = ${slug}
    limit 1
  `;

  return rows[0] ?? null;
}

export async function listParticipants(groupId: string): Promise<Participant[]> {
  const rows = await sql<ParticipantRow[]>`
    select id, group_id, name, wishlist, joined_at
    from participants
    where group_id = ${groupId}
    order by joined_at asc, id asc
  `;

  return rows.map(normalizeParticipantRow);
}

export async function addParticipant({
  groupId,
  name,
  wishlist
}: {
  groupId: string;
  name: string;
  wishlist: string | null;
}) {
  return sql.begin(async (tx) => {
    const group = await lockGroup(tx, groupId, "join");

    const countRows = await tx.unsafe<Array<{ count: number }>>(
      `select count(*)::int as count from participants where group_id = $1`,
      [groupId]
    );

    if ((countRows[0]?.count ?? 0) >= group.max_participants) {
      throw new Error(`Group is full (${group.max_participants} participants)`);
    }

    const rows = await tx.unsafe<ParticipantRow[]>(
      `
        insert into participants (group_id, name, wishlist)
        values ($1, $2, $3)
        returning id, group_id, name, wishlist, joined_at
      `,
      [groupId, name, wishlist]
    );

    return normalizeParticipantRow(rows[0]);
  });
}

export async function updateParticipant({
  groupId,
  participantId,
  name,
  wishlist
}: {
  groupId: string;
  participantId: string;
  name?: string;
  wishlist?: string;
}) {
  return sql.begin(async (tx) => {
    await lockGroup(tx, groupId, "join");

    const rows = await tx.unsafe<ParticipantRow[]>(
      `
        update participants
        set
          name = coalesce($1, name),
          wishlist = coalesce($2, wishlist)
        where id = $3
          and group_id = $4
        returning id, group_id, name, wishlist, joined_at
      `,
      [name ?? null, wishlist ?? null, participantId, groupId]
    );

    return rows[0] ? normalizeParticipantRow(rows[0]) : null;
  });
}

export async function removeParticipant({
  groupId,
  participantId
}: {
  groupId: string;
  participantId: string;
}) {
  return sql.begin(async (tx) => {
    await lockGroup(tx, groupId, "join");

    const rows = await tx.unsafe<Array<{ id: string }>>(
      `delete from participants where id = $1 and group_id = $2 returning id`,
      [participantId, groupId]
    );

    return rows.length > 0;
  });
}

export async function listExclusions(groupId: string): Promise<Exclusion[]> {
  const rows = await sql<ExclusionRow[]>`
    select id, group_id, giver_id, receiver_id, kind, reason
    from exclusions
    where group_id = ${groupId}
    order by created_at asc, id asc
  `;

  return rows.map(normalizeExclusionRow);
}

export async function addExclusion({
  groupId,
  giverId,
  receiverId,
  kind,
  reason
}: {
  groupId: string;
  giverId: string;
  receiverId: string;
  kind: ExclusionKind;
  reason: string | null;
}) {
  return sql.begin(async (tx) => {
    await lockGroup(tx, groupId, "edit_exclusions");

    const members = await tx.unsafe<Array<{ id: string }>>(
      `select id from participants where group_id = $1 and id = any($2::uuid[])`,
      [groupId, [giverId, receiverId]]
    );

    if (members.length !== 2) {
      throw new Error("Exclusion participants must belong to the group");
    }

    const rows = await tx.unsafe<ExclusionRow[]>(
      `
        insert into exclusions (group_id, giver_id, receiver_id, kind, reason)
        values ($1, $2, $3, $4, $5)
        on conflict (group_id, giver_id, receiver_id)
        do update set kind = excluded.kind, reason = excluded.reason
        returning id, group_id, giver_id, receiver_id, kind, reason
      `,
      [groupId, giverId, receiverId, kind, reason]
    );

    return normalizeExclusionRow(rows[0]);
  });
}

export async function removeExclusion({
  groupId,
  exclusionId
}: {
  groupId: string;
  exclusionId: string;
}) {
  return sql.begin(async (tx) => {
    await lockGroup(tx, groupId, "edit_exclusions");

    const rows = await tx.unsafe<Array<{ id: string }>>(
      `delete from exclusions where id = $1 and group_id = $2 returning id`,
      [exclusionId, groupId]
    );

    return rows.length > 0;
  });
}

export async function getCurrentDraw(groupId: string) {
  const rows = await sql<DrawRow[]>`
    select id, group_id, round, seed, strategy, attempts, avoided_prior_pairs, created_at, superseded_at
    from draws
    where group_id = ${groupId}
      and superseded_at is null
    limit 1
  `;

  const row = rows[0];
  if (!row) {
    return null;
  }

  const pairs = await sql<DrawPairRow[]>`
    select giver_id, receiver_id, gift_sent, gift_delivered, gift_confirmed
    from draw_pairs
    where draw_id = ${row.id}
    order by position asc
  `;

  return normalizeDrawRow(row, pairs);
}

export async function closeGroup(groupId: string) {
  return sql.begin(async (tx) => {
    const group = await lockGroup(tx, groupId, "close");

    await tx.unsafe(
      `update groups set status = $1, updated_at = now() where id = $2`,
      [group.next, groupId]
    );

    return { status: group.next, round: group.round };
  });
}

// Archives the current round and opens the next one with the same members.
export async function reopenGroup(groupId: string) {
  return sql.begin(async (tx) => {
    const group = await lockGroup(tx, groupId, "reopen");

    await tx.unsafe(
      `update draws set superseded_at = now() where group_id = $1 and superseded_at is null`,
      [groupId]
    );

    const rows = await tx.unsafe<Array<{ status: GroupStatus; round: number }>>(
      `
        update groups
        set status = $1, round = round + 1, updated_at = now()
        where id = $2
        returning status, round
      `,
      [group.next, groupId]
    );

    return rows[0];
  });
}

export async function updateGiftProgress({
  groupId,
  giverId,
  step,
  done
}: {
  groupId: string;
  giverId: string;
  step: GiftStep;
  done: boolean;
}) {
  return sql.begin(async (tx) => {
    await lockGroup(tx, groupId, "track_gifts");

    const rows = await tx.unsafe<CurrentPairRow[]>(
      `
        select dp.draw_id, dp.position, dp.giver_id, dp.receiver_id,
               dp.gift_sent, dp.gift_delivered, dp.gift_confirmed
        from draw_pairs dp
        join draws d on d.id = dp.draw_id
        where d.group_id = $1
          and d.superseded_at is null
          and dp.giver_id = $2
          and dp.receiver_id is not null
        limit 1
      `,
      [groupId, giverId]
    );

    const row = rows[0];
    if (!row) {
      return null;
    }

    const gift = applyGiftStep(toDrawnPair(row).gift, step, done);

    await tx.unsafe(
      `
        update draw_pairs
        set gift_sent = $1, gift_delivered = $2, gift_confirmed = $3
        where draw_id = $4 and position = $5
      `,
      [gift.sent, gift.delivered, gift.confirmed, row.draw_id, row.position]
    );

    return { giverId: row.giver_id, receiverId: row.receiver_id, gift };
  });
}

// Invalidates every organizer token issued under the old PIN.
export async function changeOrganizerPin({ groupId, pinHash }: { groupId: string; pinHash: string }) {
  const rows = await sql<Array<{ organizer_version: number }>>`
    update groups
    set pin_hash = ${pinHash}, organizer_version = organizer_version + 1, updated_at = now()
    where id = ${groupId}
    returning organizer_version
  `;

  return rows[0]?.organizer_version ?? null;
}

export const drawStore: DrawStore = {
  loadGroupMembers: listParticipants,

  async loadExclusionPairs(groupId) {
    const exclusions = await listExclusions(groupId);
    return exclusions.map(
      (exclusion): ExclusionPair => ({
        giverId: exclusion.giverId,
        receiverId: exclusion.receiverId,
        kind: exclusion.kind
      })
    );
  },

  async loadPriorAssignment(groupId) {
    const rows = await sql<PairRow[]>`
      select giver_id, receiver_id
      from draw_pairs
      where draw_id = (
        select id
        from draws
        where group_id = ${groupId}
        order by created_at desc, id desc
        limit 1
      )
      order by position asc
    `;

    if (rows.length === 0) {
      return null;
    }

    return toAssignmentPairs(rows);
  },

  async saveAssignment(groupId, draw) {
    return sql.begin(async (tx) => {
      const action = drawActionFor(draw.expectedStatus);
      const group = await lockGroup(tx, groupId, action);

      if (group.status !== draw.expectedStatus || group.round !== draw.round) {
        throw new GroupStateError(group.status, action);
      }

      const [members, exclusions] = await Promise.all([
        tx.unsafe<Array<{ id: string; name: string }>>(
          `select id, name from participants where group_id = $1`,
          [groupId]
        ),
        tx.unsafe<Array<{ giver_id: string; receiver_id: string; kind: ExclusionKind }>>(
          `select giver_id, receiver_id, kind from exclusions where group_id = $1`,
          [groupId]
        )
      ]);

      assertDrawStillValid(
        members,
        exclusions.map((row) => ({ giverId: row.giver_id, receiverId: row.receiver_id, kind: row.kind })),
        draw.pairs
      );

      await tx.unsafe(
        `update draws set superseded_at = now() where group_id = $1 and superseded_at is null`,
        [groupId]
      );

      const drawRows = await tx.unsafe<DrawRow[]>(
        `
          insert into draws (group_id, round, seed, strategy, attempts, avoided_prior_pairs)
          values ($1, $2, $3, $4, $5, $6)
          returning id, group_id, round, seed, strategy, attempts, avoided_prior_pairs, created_at, superseded_at
        `,
        [groupId, draw.round, draw.seed, draw.strategy, draw.attempts, draw.avoidedPriorPairs]
      );

      const saved = drawRows[0];

      for (const [position, pair] of draw.pairs.entries()) {
        await tx.unsafe(
          `
            insert into draw_pairs (draw_id, position, giver_id, receiver_id)
            values ($1, $2, $3, $4)
          `,
          [saved.id, position, pair.giverId, pair.receiverId]
        );
      }

      await tx.unsafe(
        `update groups set status = $1, updated_at = now() where id = $2`,
        [group.next, groupId]
      );

      return {
        ...normalizeDrawRow(saved, []),
        pairs: draw.pairs.map((pair) => ({ ...pair, gift: NO_GIFT_PROGRESS }))
      };
    });
  }
};

async function lockGroup(tx: TransactionSql, groupId: string, action: GroupAction) {
  const rows = await tx.unsafe<Array<{ status: GroupStatus; round: number; max_participants: number }>>(
    `
      select status, round, max_participants
      from groups
      where id = $1
      for update
    `,
    [groupId]
  );

  const group = rows[0];
  if (!group) {
    throw new Error("Group not found");
  }

  return { ...group, next: nextStatus(group.status, action) };
}

function normalizeParticipantRow(row: ParticipantRow): Participant {
  return { ...row, joined_at: toIsoString(row.joined_at) };
}

function normalizeExclusionRow(row: ExclusionRow): Exclusion {
  return {
    id: row.id,
    group_id: row.group_id,
    giverId: row.giver_id,
    receiverId: row.receiver_id,
    kind: row.kind,
    reason: row.reason
  };
}

function normalizeDrawRow(row: DrawRow, pairs: DrawPairRow[]): DrawRecord {
  return {
    ...row,
    created_at: toIsoString(row.created_at),
    superseded_at: row.superseded_at === null ? null : toIsoString(row.superseded_at),
    pairs: toDrawnPairs(pairs)
  };
}

function toDrawnPairs(rows: DrawPairRow[]): DrawnPair[] {
  const drawn: DrawnPair[] = [];

  for (const row of rows) {
    if (row.giver_id !== null && row.receiver_id !== null) {
      drawn.push(toDrawnPair({ ...row, giver_id: row.giver_id, receiver_id: row.receiver_id }));
    }
  }

  return drawn;
}

function toDrawnPair(row: DrawPairRow & { giver_id: string; receiver_id: string }): DrawnPair {
  return {
    giverId: row.giver_id,
    receiverId: row.receiver_id,
    gift: {
      sent: row.gift_sent,
      delivered: row.gift_delivered,
      confirmed: row.gift_confirmed
    }
  };
}

// Pairs whose participant was removed in a later round come back with null ids.
function toAssignmentPairs(rows: PairRow[]): AssignmentPair[] {
  const pairs: AssignmentPair[] = [];

  for (const row of rows) {
    if (row.giver_id !== null && row.receiver_id !== null) {
      pairs.push({ giverId: row.giver_id, receiverId: row.receiver_id });
    }
  }

  return pairs;
}

function toIsoString(value: Timestamp) {
  return typeof value === "string" ? new Date(value).toISOString() : value.toISOString();
}
