import { sequence } from "../sequencer.js";
import { emptyBuckets, type DistributionContext, type ShardBuckets } from "./types.js";

/**
 * Deals the sequenced pool out one identifier per shard in turn, so bucket sizes differ by at
 * most one. Reservations do not shift the cycle.
 */
export function distributeRoundRobin(
  context: DistributionContext,
  shardCount: number,
): ShardBuckets {
  const count = Math.max(1, shardCount);
  const buckets = emptyBuckets(count);

  sequence(context.pool, context.seed).forEach((id, position) => {
    buckets[position % count].push(id);
  });

  return buckets;
}
