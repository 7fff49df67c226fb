import { UnknownStrategyError } from "../errors.js";
import { distributePercentage } from "./percentage.js";
import { distributeRendezvous } from "./rendezvous.js";
import { distributeRoundRobin } from "./round-robin.js";
import { distributeBySize } from "./size.js";
import {
  STRATEGY_NAMES,
  type DistributionContext,
  type ShardBuckets,
  type StrategyConfig,
  type StrategyName,
  type StrategyParameters,
} from "./types.js";

export function isStrategyName(name: string): name is StrategyName {
  return (STRATEGY_NAMES as readonly string[]).includes(name);
}

/**
 * Builds a typed strategy configuration from a boundary strategy name. Parameter shapes are
 * assumed to have been validated already; missing values fall back to a single shard.
 */
export function resolveStrategy(name: string, parameters: StrategyParameters): StrategyConfig {
  if (!isStrategyName(name)) {
    throw new UnknownStrategyError(name, STRATEGY_NAMES);
  }

  switch (name) {
    case "round-robin":
    case "rendezvous":
      return { strategy: name, shardCount: parameters.shardCount ?? 1 };
    case "percentage":
      return { strategy: name, percentages: parameters.percentages ?? [] };
    case "size":
      return { strategy: name, sizes: parameters.sizes ?? [] };
  }
}

export function shardCountOf(config: StrategyConfig): number {
  switch (config.strategy) {
    case "round-robin":
    case "rendezvous":
      return Math.max(1, config.shardCount);
    case "percentage":
      return Math.max(1, config.percentages.length);
    case "size":
      return Math.max(1, config.sizes.length);
  }
}

export function distribute(config: StrategyConfig, context: DistributionContext): ShardBuckets {
  switch (config.strategy) {
    case "round-robin":
      return distributeRoundRobin(context, config.shardCount);
    case "rendezvous":
      return distributeRendezvous(context, config.shardCount);
    case "percentage":
      return distributePercentage(context, config.percentages);
    case "size":
      return distributeBySize(context, config.sizes);
  }
}

export { distributePercentage, distributeRendezvous, distributeRoundRobin, distributeBySize };
export { pickRendezvousShard, rendezvousWeight } from "./rendezvous.js";
export { REMAINDER_SIZE } from "./size.js";
export * from "./types.js";
