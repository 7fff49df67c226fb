import { describe, expect, it } from "vitest";
import { DuplicateReservationError, InvalidReservationError } from "./errors.js";
import { partitionPool } from "./partitioner.js";

const pool = ["1", "2", "3", "4", "5", "6", "7", "8"];

describe("partitionPool", () => {
  it("passes the pool through when there is nothing to exclude or reserve", () => {
    const result = partitionPool(pool, [], new Map(), 3);

    expect(result.filtered).toEqual(pool);
    expect(result.distributable).toEqual(pool);
    expect(result.excludedCount).toBe(0);
    expect(result.reservedCount).toBe(0);
    expect(result.reservedByShard.size).toBe(0);
  });

  it("removes exclusions and reserved identifiers from the distributable pool", () => {
    const result = partitionPool(
      pool,
      ["2", "99"],
      new Map([
        [0, ["5"]],
        [2, ["7", "8"]],
      ]),
      3,
    );

    expect(result.filtered).toEqual(["1", "3", "4", "5", "6", "7", "8"]);
    expect(result.distributable).toEqual(["1", "3", "4", "6"]);
    expect(result.excludedCount).toBe(1);
    expect(result.reservedCount).toBe(3);
    expect(result.reservedByShard.get(2)).toEqual(["7", "8"]);
    expect(result.reservedCountByShard.get(0)).toBe(1);
    expect(result.reservedCountByShard.get(2)).toBe(2);
  });

  it("lets exclusion win over reservation", () => {
    const result = partitionPool(pool, ["3"], new Map([[1, ["3", "4"]]]), 2);

    expect(result.reservedByShard.get(1)).toEqual(["4"]);
    expect(result.distributable).not.toContain("3");
    expect(result.filtered).not.toContain("3");
    expect(result.unmatchedReserved).toEqual([]);
  });

  it("reports reserved identifiers that are not in the pool", () => {
    const result = partitionPool(pool, [], new Map([[0, ["1", "500"]]]), 2);

    expect(result.reservedByShard.get(0)).toEqual(["1"]);
    expect(result.reservedCountByShard.get(0)).toBe(1);
    expect(result.unmatchedReserved).toEqual(["500"]);
    expect(result.reservedCount).toBe(1);
  });

  it("collapses an identifier repeated within one shard", () => {
    const result = partitionPool(pool, [], new Map([[1, ["4", "4"]]]), 2);

    expect(result.reservedByShard.get(1)).toEqual(["4"]);
    expect(result.reservedCount).toBe(1);
  });

  it("rejects a reservation outside the shard range", () => {
    const run = () => partitionPool(pool, [], new Map([[3, ["1"]]]), 3);

    expect(run).toThrow(InvalidReservationError);
    expect(run).toThrow(
      "reservation for shard_3 is out of range: with shard count 3, valid shards are shard_0 to shard_2",
    );
  });

  it("rejects a negative shard index", () => {
    expect(() => partitionPool(pool, [], new Map([[-1, ["1"]]]), 3)).toThrow(
      InvalidReservationError,
    );
  });

  it("rejects an identifier reserved in two shards", () => {
    let caught: unknown;
    try {
      partitionPool(
        pool,
        [],
        new Map([
          [0, ["1", "2"]],
          [2, ["2"]],
        ]),
        3,
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DuplicateReservationError);
    if (caught instanceof DuplicateReservationError) {
      expect(caught.code).toBe("DUPLICATE_RESERVATION");
      expect(caught.identifier).toBe("2");
      expect(caught.firstShard).toBe(0);
      expect(caught.secondShard).toBe(2);
      expect(caught.message).toContain("shard_0 and shard_2");
    }
  });

  it("does not mutate its inputs", () => {
    const input = [...pool];
    partitionPool(input, ["1"], new Map([[0, ["2"]]]), 1);

    expect(input).toEqual(pool);
  });
});
