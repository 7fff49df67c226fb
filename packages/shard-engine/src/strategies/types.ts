import type { Identifier } from "../identifiers.js";

export const STRATEGY_NAMES = ["round-robin", "percentage", "size", "rendezvous"] as const;

export type StrategyName = (typeof STRATEGY_NAMES)[number];

export type StrategyConfig =
  | { strategy: "round-robin"; shardCount: number }
  | { strategy: "rendezvous"; shardCount: number }
  | { strategy: "percentage"; percentages: readonly number[] }
  | { strategy: "size"; sizes: readonly number[] };

/**
 * Strategy parameters as they arrive from configuration, before the strategy name is known to
 * be valid.
 */
export type StrategyParameters = {
  shardCount?: number;
  percentages?: readonly number[];
  sizes?: readonly number[];
};

export interface DistributionContext {
  /** Identifiers to distribute: exclusions and reservations already removed. */
  pool: readonly Identifier[];
  /** Size of the pool after exclusions but before reservations. */
  filteredTotal: number;
  reservedCountByShard: ReadonlyMap<number, number>;
  seed: string;
}

/** One array per shard, in shard order. Empty shards are empty arrays. */
export type ShardBuckets = Identifier[][];

export const emptyBuckets = (shardCount: number): ShardBuckets =>
  Array.from({ length: shardCount }, () => []);
