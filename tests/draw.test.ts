import test from "node:test";
import assert from "node:assert/strict";
import { verifyAssignment } from "../lib/assignment";
import { assertDrawStillValid, runDraw, type DrawStore, type NewDraw } from "../lib/draw";
import {
  ConcurrentModificationError,
  GroupStateError,
  InfeasibleConstraintsError
} from "../lib/errors";
import { NO_GIFT_PROGRESS } from "../lib/gifts";
import type {
  AssignmentPair,
  DrawRecord,
  ExclusionPair,
  Group,
  GroupStatus,
  Participant
} from "../lib/types";

const config = { engine: { maxShuffles: 200 }, avoidPriorPairs: true };

function group(status: GroupStatus, round = 1): Group {
  return {
    id: "g1",
    name: "Office",
    slug: "office",
    description: null,
    price_limit: null,
    max_participants: 100,
    status,
    round,
    organizer_version: 1
  };
}

function member(name: string): Participant {
  return {
    id: name.toLowerCase(),
    group_id: "g1",
    name,
    wishlist: null,
    joined_at: "2026-01-01T00:00:00.000Z"
  };
}

// Mirrors the Postgres store: the save re-reads members and exclusions before writing.
class MemoryDrawStore implements DrawStore {
  saved: NewDraw[] = [];
  priorLoads = 0;
  beforeSave: ((draw: NewDraw) => void) | null = null;

  constructor(
    public members: Participant[],
    public exclusions: ExclusionPair[] = [],
    private readonly prior: AssignmentPair[] | null = null
  ) {}

  async loadGroupMembers() {
    return [...this.members];
  }

  async loadExclusionPairs() {
    return [...this.exclusions];
  }

  async loadPriorAssignment() {
    this.priorLoads += 1;
    return this.prior;
  }

  async saveAssignment(groupId: string, draw: NewDraw): Promise<DrawRecord> {
    this.beforeSave?.(draw);
    assertDrawStillValid(this.members, this.exclusions, draw.pairs);

    this.saved.push(draw);
    return {
      id: `draw-${this.saved.length}`,
      group_id: groupId,
      round: draw.round,
      seed: draw.seed,
      strategy: draw.strategy,
      attempts: draw.attempts,
      avoided_prior_pairs: draw.avoidedPriorPairs,
      created_at: "2026-12-01T00:00:00.000Z",
      superseded_at: null,
      pairs: draw.pairs.map((pair) => ({ ...pair, gift: NO_GIFT_PROGRESS }))
    };
  }
}

const members = ["Ann", "Bob", "Cid", "Dee"].map(member);

test("drawing an open group saves a verified assignment against the open status", async () => {
  const store = new MemoryDrawStore(members);

  const { action, draw } = await runDraw(store, { group: group("open"), seed: "fixed" }, config);

  assert.equal(action, "draw");
  assert.equal(draw.id, "draw-1");
  assert.equal(draw.seed, "fixed");
  assert.equal(draw.round, 1);
  assert.equal(store.saved.length, 1);
  assert.equal(store.saved[0].expectedStatus, "open");
  assert.deepEqual(verifyAssignment(members, [], draw.pairs), { ok: true });
  for (const pair of draw.pairs) {
    assert.deepEqual(pair.gift, { sent: false, delivered: false, confirmed: false });
  }
});

test("redrawing an assigned group avoids the previous pairs", async () => {
  const prior: AssignmentPair[] = [
    { giverId: "ann", receiverId: "bob" },
    { giverId: "bob", receiverId: "ann" },
    { giverId: "cid", receiverId: "dee" },
    { giverId: "dee", receiverId: "cid" }
  ];
  const store = new MemoryDrawStore(members, [], prior);

  const { action, draw } = await runDraw(store, { group: group("assigned", 2), seed: 8 }, config);

  assert.equal(action, "redraw");
  assert.equal(draw.round, 2);
  assert.equal(draw.avoided_prior_pairs, true);
  assert.equal(store.saved[0].expectedStatus, "assigned");
  assert.equal(store.priorLoads, 1);
  for (const pair of draw.pairs) {
    assert.equal(
      prior.some((old) => old.giverId === pair.giverId && old.receiverId === pair.receiverId),
      false
    );
  }
});

test("prior pairs are not loaded when avoidance is off", async () => {
  const store = new MemoryDrawStore(members, [], [{ giverId: "ann", receiverId: "bob" }]);

  const { draw } = await runDraw(
    store,
    { group: group("assigned"), seed: 8 },
    { ...config, avoidPriorPairs: false }
  );

  assert.equal(store.priorLoads, 0);
  assert.equal(draw.avoided_prior_pairs, false);
});

test("a closed group cannot be drawn and nothing is saved", async () => {
  const store = new MemoryDrawStore(members);

  await assert.rejects(runDraw(store, { group: group("closed") }, config), GroupStateError);
  assert.equal(store.saved.length, 0);
});

test("infeasible exclusions leave the group untouched", async () => {
  const store = new MemoryDrawStore(
    ["Ann", "Bob"].map(member),
    [{ giverId: "ann", receiverId: "bob", kind: "mutual" }]
  );

  await assert.rejects(
    runDraw(store, { group: group("open"), seed: 1 }, config),
    (error: unknown) => {
      assert.ok(error instanceof InfeasibleConstraintsError);
      assert.equal(error.message, "Ann has no valid receiver");
      return true;
    }
  );
  assert.equal(store.saved.length, 0);
});

test("an exclusion added while the draw runs blocks the save", async () => {
  const store = new MemoryDrawStore(members);
  store.beforeSave = (draw) => {
    const first = draw.pairs[0];
    store.exclusions.push({ giverId: first.giverId, receiverId: first.receiverId, kind: "directional" });
  };

  await assert.rejects(
    runDraw(store, { group: group("open"), seed: "race" }, config),
    (error: unknown) => {
      assert.ok(error instanceof ConcurrentModificationError);
      assert.match(
        error.message,
        /^Participants or exclusions changed during the draw \(ann -> (bob|cid|dee) is excluded\)\. Try again\.$/
      );
      return true;
    }
  );
  assert.equal(store.saved.length, 0);
});

test("a participant removed while the draw runs blocks the save", async () => {
  const store = new MemoryDrawStore(members);
  store.beforeSave = () => {
    store.members = store.members.filter((participant) => participant.id !== "dee");
  };

  await assert.rejects(
    runDraw(store, { group: group("open"), seed: "race" }, config),
    {
      name: "ConcurrentModificationError",
      message: "Participants or exclusions changed during the draw (Expected 3 pairs, got 4). Try again."
    }
  );
  assert.equal(store.saved.length, 0);
});

test("the recheck accepts an unchanged draw and names the first broken pair", () => {
  const three = ["Ann", "Bob", "Cid"].map(member);
  const pairs = [
    { giverId: "ann", receiverId: "bob" },
    { giverId: "bob", receiverId: "cid" },
    { giverId: "cid", receiverId: "ann" }
  ];

  assert.doesNotThrow(() => assertDrawStillValid(three, [], pairs));
  assert.throws(
    () => assertDrawStillValid(three, [{ giverId: "cid", receiverId: "bob", kind: "mutual" }], pairs),
    {
      name: "ConcurrentModificationError",
      message: "Participants or exclusions changed during the draw (bob -> cid is excluded). Try again."
    }
  );
});

test("the same seed over the same members saves the same pairs", async () => {
  const first = new MemoryDrawStore(members, [{ giverId: "ann", receiverId: "cid", kind: "mutual" }]);
  const second = new MemoryDrawStore(members, [{ giverId: "ann", receiverId: "cid", kind: "mutual" }]);

  const a = await runDraw(first, { group: group("open"), seed: "replay" }, config);
  const b = await runDraw(second, { group: group("open"), seed: "replay" }, config);

  assert.deepEqual(a.draw.pairs, b.draw.pairs);
  assert.equal(a.draw.strategy, b.draw.strategy);
});
