import { sequence } from "../sequencer.js";
import { emptyBuckets, type DistributionContext, type ShardBuckets } from "./types.js";

/** Target size for a shard, or `"remainder"` to take everything left. */
export type SliceTarget = number | "remainder";

/**
 * Sequences the pool once and carves contiguous slices off the front, left to right. Targets
 * are clamped to what is left; a negative target yields an empty shard.
 */
export function carveSlices(
  context: DistributionContext,
  targets: readonly SliceTarget[],
): ShardBuckets {
  const buckets = emptyBuckets(targets.length);
  if (context.pool.length === 0) {
    return buckets;
  }

  const ordered = sequence(context.pool, context.seed);
  let offset = 0;

  targets.forEach((target, index) => {
    const remaining = ordered.length - offset;
    const size = target === "remainder" ? remaining : Math.min(Math.max(0, target), remaining);
    buckets[index] = ordered.slice(offset, offset + size);
    offset += size;
  });

  return buckets;
}

export const reservedFor = (context: DistributionContext, shardIndex: number): number =>
  context.reservedCountByShard.get(shardIndex) ?? 0;
