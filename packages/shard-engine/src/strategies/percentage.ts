import { carveSlices, reservedFor, type SliceTarget } from "./slices.js";
import type { DistributionContext, ShardBuckets } from "./types.js";

/**
 * Splits the pool by percentage of the exclusion-filtered population, so a shard's reserved
 * identifiers count towards its share. The last shard takes whatever the others left.
 */
export function distributePercentage(
  context: DistributionContext,
  percentages: readonly number[],
): ShardBuckets {
  const shardCount = Math.max(1, percentages.length);
  const total = context.filteredTotal;

  const targets: SliceTarget[] = Array.from({ length: shardCount }, (_, index) => {
    if (index === shardCount - 1) {
      return "remainder";
    }
    const share = Math.floor((total * (percentages[index] ?? 0)) / 100);
    return share - reservedFor(context, index);
  });

  return carveSlices(context, targets);
}
