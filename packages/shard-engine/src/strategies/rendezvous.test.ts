import { describe, expect, it } from "vitest";
import { distributeRendezvous, pickRendezvousShard, rendezvousWeight } from "./rendezvous.js";
import { contextFor, range } from "./test-utils.js";

describe("rendezvousWeight", () => {
  it("hashes the id, shard and seed, including an empty seed", () => {
    expect(rendezvousWeight("42", 0, "")).toBe(16214634200096270710n);
  });
});

describe("distributeRendezvous", () => {
  it("places identifiers by highest weight with an empty seed", () => {
    const buckets = distributeRendezvous(contextFor(range(1, 10)), 3);

    expect(buckets).toEqual([["2", "3", "6", "10"], ["1", "4", "5", "7", "9"], ["8"]]);
  });

  it("changes placement with the seed", () => {
    const picks = range(1, 10).map((id) => pickRendezvousShard(id, 3, "wave"));

    expect(picks).toEqual([0, 0, 1, 2, 0, 0, 2, 0, 0, 0]);
  });

  it("does not depend on the arrival order", () => {
    const forward = distributeRendezvous(contextFor(range(1, 50), { seed: "s" }), 4);
    const backward = distributeRendezvous(
      contextFor([...range(1, 50)].reverse(), { seed: "s" }),
      4,
    );

    expect(backward.map((bucket) => [...bucket].sort())).toEqual(
      forward.map((bucket) => [...bucket].sort()),
    );
  });

  it("only moves identifiers to the new shard when a shard is added", () => {
    const ids = range(1, 2000);
    const before = ids.map((id) => pickRendezvousShard(id, 4, "fleet"));
    const after = ids.map((id) => pickRendezvousShard(id, 5, "fleet"));

    const moved = ids.filter((_, i) => before[i] !== after[i]);
    expect(moved).toHaveLength(390);
    for (const id of moved) {
      const index = ids.indexOf(id);
      expect(after[index]).toBe(4);
      expect(rendezvousWeight(id, 4, "fleet")).toBeGreaterThan(
        rendezvousWeight(id, before[index], "fleet"),
      );
    }
  });

  it("always returns shardCount buckets", () => {
    expect(distributeRendezvous(contextFor([]), 3)).toEqual([[], [], []]);
    expect(distributeRendezvous(contextFor(["1"]), 0)).toEqual([["1"]]);
  });
});
