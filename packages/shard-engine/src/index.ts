export { compareIdentifiers, sortIdentifiers, type Identifier } from "./identifiers.js";
export {
  createSeededRandom,
  deriveSeed,
  digestPrefix64,
  sequence,
  shuffle,
  type SeededRandom,
} from "./sequencer.js";
export { partitionPool, type PoolPartition, type ReservationMap } from "./partitioner.js";
export {
  REMAINDER_SIZE,
  STRATEGY_NAMES,
  distribute,
  distributeBySize,
  distributePercentage,
  distributeRendezvous,
  distributeRoundRobin,
  isStrategyName,
  pickRendezvousShard,
  rendezvousWeight,
  resolveStrategy,
  shardCountOf,
  type DistributionContext,
  type ShardBuckets,
  type StrategyConfig,
  type StrategyName,
  type StrategyParameters,
} from "./strategies/index.js";
export { assembleShards, type ShardAssignment } from "./assembler.js";
export {
  partitionIdentifiers,
  type PartitionInput,
  type PartitionMetadata,
  type PartitionResult,
} from "./engine.js";
export {
  DuplicateReservationError,
  InvalidReservationError,
  ShardEngineError,
  UnknownStrategyError,
  type ShardEngineErrorOptions,
} from "./errors.js";
