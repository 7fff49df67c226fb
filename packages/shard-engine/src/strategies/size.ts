import { carveSlices, reservedFor, type SliceTarget } from "./slices.js";
import type { DistributionContext, ShardBuckets } from "./types.js";

export const REMAINDER_SIZE = -1;

/**
 * Fills shards to literal sizes, counting reserved identifiers towards each size. A size of
 * `-1` takes every identifier still unassigned. Running out of identifiers is not an error;
 * later shards simply stay empty.
 */
export function distributeBySize(
  context: DistributionContext,
  sizes: readonly number[],
): ShardBuckets {
  const shardSizes = sizes.length === 0 ? [REMAINDER_SIZE] : sizes;

  const targets: SliceTarget[] = shardSizes.map((size, index) =>
    size === REMAINDER_SIZE ? "remainder" : size - reservedFor(context, index),
  );

  return carveSlices(context, targets);
}
