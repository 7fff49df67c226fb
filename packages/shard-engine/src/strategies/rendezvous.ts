import type { Identifier } from "../identifiers.js";
import { digestPrefix64 } from "../sequencer.js";
import { emptyBuckets, type DistributionContext, type ShardBuckets } from "./types.js";

/**
 * Weight of `shardIndex` for `id`: the first 8 bytes of SHA-256(`<id>:shard_<index>:<seed>`).
 * The seed is part of the input even when empty.
 */
export function rendezvousWeight(id: Identifier, shardIndex: number, seed: string): bigint {
  return digestPrefix64(`${id}:shard_${shardIndex}:${seed}`);
}

/**
 * Highest random weight selection. Ties keep the lowest shard index.
 */
export function pickRendezvousShard(id: Identifier, shardCount: number, seed: string): number {
  const count = Math.max(1, shardCount);
  let highestWeight = 0n;
  let selected = 0;

  for (let shardIndex = 0; shardIndex < count; shardIndex++) {
    const weight = rendezvousWeight(id, shardIndex, seed);
    if (weight > highestWeight) {
      highestWeight = weight;
      selected = shardIndex;
    }
  }

  return selected;
}

/**
 * Places every identifier independently, without a global ordering step. Growing the shard
 * count from N to N+1 only moves the identifiers whose weight for the new shard beats their
 * current winner, about 1/(N+1) of them.
 */
export function distributeRendezvous(
  context: DistributionContext,
  shardCount: number,
): ShardBuckets {
  const count = Math.max(1, shardCount);
  const buckets = emptyBuckets(count);

  for (const id of context.pool) {
    buckets[pickRendezvousShard(id, count, context.seed)].push(id);
  }

  return buckets;
}
