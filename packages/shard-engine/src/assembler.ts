import { compareIdentifiers, type Identifier } from "./identifiers.js";
import type { ShardBuckets } from "./strategies/types.js";

/** Final shard contents: one numerically ascending list per shard index. */
export type ShardAssignment = readonly (readonly Identifier[])[];

/**
 * Adds each shard's reserved identifiers to its distributed bucket and sorts every bucket
 * numerically.
 */
export function assembleShards(
  distributed: ShardBuckets,
  reservedByShard: ReadonlyMap<number, readonly Identifier[]>,
): ShardAssignment {
  return distributed.map((bucket, shardIndex) => {
    const reserved = reservedByShard.get(shardIndex) ?? [];
    return [...reserved, ...bucket].sort(compareIdentifiers);
  });
}
