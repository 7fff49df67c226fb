import type { ReservationMap, ShardAssignment } from "@idshard/engine";
import { InvalidShardNameError } from "../errors.js";

export const SHARD_NAME_PATTERN = /^shard_(\d+)$/;

export const formatShardName = (index: number): string => `shard_${index}`;

/**
 * Returns the index encoded in a `shard_<N>` name, or `undefined` when the name does not match.
 */
export function parseShardName(name: string): number | undefined {
  const match = SHARD_NAME_PATTERN.exec(name);
  if (!match) {
    return undefined;
  }
  const index = Number(match[1]);
  return Number.isSafeInteger(index) ? index : undefined;
}

/**
 * Converts the `reserved_ids` config map into the engine's index-keyed reservation map,
 * keeping the config's key order. Names that decode to the same index (`shard_1`, `shard_01`)
 * have their lists concatenated.
 */
export function decodeReservations(reservedIds: Record<string, readonly string[]>): ReservationMap {
  const reservations = new Map<number, readonly string[]>();
  for (const [name, ids] of Object.entries(reservedIds)) {
    const index = parseShardName(name);
    if (index === undefined) {
      throw new InvalidShardNameError(name);
    }
    reservations.set(index, [...(reservations.get(index) ?? []), ...ids]);
  }
  return reservations;
}

export function encodeShards(shards: ShardAssignment): Record<string, string[]> {
  return Object.fromEntries(shards.map((ids, index) => [formatShardName(index), [...ids]]));
}
