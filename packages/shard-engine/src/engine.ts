import { assembleShards, type ShardAssignment } from "./assembler.js";
import type { Identifier } from "./identifiers.js";
import { partitionPool, type ReservationMap } from "./partitioner.js";
import { distribute, shardCountOf } from "./strategies/index.js";
import type { StrategyConfig } from "./strategies/types.js";

export interface PartitionInput {
  ids: readonly Identifier[];
  exclusions?: readonly Identifier[];
  reservations?: ReservationMap;
  /** Empty or omitted: no shuffling (rendezvous still hashes the empty seed). */
  seed?: string;
  strategy: StrategyConfig;
}

export interface PartitionMetadata {
  totalFetched: number;
  excludedCount: number;
  reservedCount: number;
  distributedCount: number;
  shardCount: number;
  /** Reserved identifiers missing from the pool. They are not placed in any shard. */
  unmatchedReserved: Identifier[];
}

export interface PartitionResult {
  shards: ShardAssignment;
  metadata: PartitionMetadata;
}

/**
 * Runs the whole pipeline: exclusions and reservations, distribution with the chosen strategy,
 * then assembly. Synchronous and free of side effects; any error aborts before a result exists.
 */
export function partitionIdentifiers(input: PartitionInput): PartitionResult {
  const seed = input.seed ?? "";
  const shardCount = shardCountOf(input.strategy);

  const partition = partitionPool(
    input.ids,
    input.exclusions ?? [],
    input.reservations ?? new Map(),
    shardCount,
  );

  const distributed = distribute(input.strategy, {
    pool: partition.distributable,
    filteredTotal: partition.filtered.length,
    reservedCountByShard: partition.reservedCountByShard,
    seed,
  });

  return {
    shards: assembleShards(distributed, partition.reservedByShard),
    metadata: {
      totalFetched: input.ids.length,
      excludedCount: partition.excludedCount,
      reservedCount: partition.reservedCount,
      distributedCount: partition.distributable.length,
      shardCount: distributed.length,
      unmatchedReserved: partition.unmatchedReserved,
    },
  };
}
