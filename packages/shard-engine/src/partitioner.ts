import { DuplicateReservationError, InvalidReservationError } from "./errors.js";
import type { Identifier } from "./identifiers.js";

/**
 * Shard index to the identifiers pinned to that shard. Indices are 0-based.
 */
export type ReservationMap = ReadonlyMap<number, readonly Identifier[]>;

export interface PoolPartition {
  /** The pool with exclusions removed, in arrival order. Reserved identifiers are still in it. */
  filtered: Identifier[];
  /** What the strategies operate on: `filtered` minus every reserved identifier. */
  distributable: Identifier[];
  reservedByShard: Map<number, Identifier[]>;
  reservedCountByShard: Map<number, number>;
  excludedCount: number;
  reservedCount: number;
  /** Reserved identifiers that were not in the pool (and not excluded), in reservation order. */
  unmatchedReserved: Identifier[];
}

/**
 * Checks every reservation against the shard range and against the other shards, returning
 * each shard's list with in-shard repeats collapsed.
 */
function collectReservations(
  reservations: ReservationMap,
  shardCount: number,
): Map<number, Identifier[]> {
  const owners = new Map<Identifier, number>();
  const byShard = new Map<number, Identifier[]>();

  for (const [shardIndex, ids] of reservations) {
    if (!Number.isInteger(shardIndex) || shardIndex < 0 || shardIndex >= shardCount) {
      throw new InvalidReservationError(shardIndex, shardCount);
    }

    const pinned: Identifier[] = [];
    for (const id of ids) {
      const owner = owners.get(id);
      if (owner === undefined) {
        owners.set(id, shardIndex);
        pinned.push(id);
      } else if (owner !== shardIndex) {
        throw new DuplicateReservationError(id, owner, shardIndex);
      }
    }
    byShard.set(shardIndex, pinned);
  }

  return byShard;
}

/**
 * Splits the fetched pool into excluded, reserved and distributable identifiers.
 *
 * Exclusion is applied first: an identifier that is both excluded and reserved ends up in
 * neither output.
 */
export function partitionPool(
  pool: readonly Identifier[],
  exclusions: readonly Identifier[],
  reservations: ReservationMap,
  shardCount: number,
): PoolPartition {
  const reserved = collectReservations(reservations, shardCount);

  const excluded = new Set(exclusions);
  const filtered = excluded.size === 0 ? [...pool] : pool.filter((id) => !excluded.has(id));
  const present = new Set(filtered);

  const reservedByShard = new Map<number, Identifier[]>();
  const reservedCountByShard = new Map<number, number>();
  const reservedSet = new Set<Identifier>();
  const unmatchedReserved: Identifier[] = [];

  for (const [shardIndex, ids] of reserved) {
    const kept: Identifier[] = [];
    for (const id of ids) {
      if (excluded.has(id)) {
        continue;
      }
      if (!present.has(id)) {
        unmatchedReserved.push(id);
        continue;
      }
      kept.push(id);
      reservedSet.add(id);
    }
    reservedByShard.set(shardIndex, kept);
    reservedCountByShard.set(shardIndex, kept.length);
  }

  const distributable =
    reservedSet.size === 0 ? [...filtered] : filtered.filter((id) => !reservedSet.has(id));

  return {
    filtered,
    distributable,
    reservedByShard,
    reservedCountByShard,
    excludedCount: pool.length - filtered.length,
    reservedCount: filtered.length - distributable.length,
    unmatchedReserved,
  };
}
