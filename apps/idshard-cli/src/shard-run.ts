import { partitionIdentifiers, resolveStrategy, type Identifier } from "@idshard/engine";
import { decodeReservations } from "./config/shard-names.js";
import { isSourceType, type ShardConfig, type SourceType } from "./config/schema.js";
import { validateShardConfig } from "./config/validate.js";
import { buildShardReport, type ShardReport } from "./output/report.js";
import { silentLogger, type Logger } from "./utils/logger.js";

export type FetchIds = (sourceType: SourceType, groupId: string) => Promise<Identifier[]>;

export interface ShardRunOptions {
  fetchIds: FetchIds;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Validates the configuration, fetches the identifier pool and partitions it. Nothing is
 * written here: a failure at any stage leaves no output behind.
 */
export async function executeShardRun(
  config: ShardConfig,
  { fetchIds, now = () => new Date(), logger = silentLogger }: ShardRunOptions,
): Promise<ShardReport> {
  validateShardConfig(config);

  // Validation guarantees this; the check narrows the type.
  if (!isSourceType(config.sourceType)) {
    throw new Error(`unknown source_type: ${config.sourceType}`);
  }

  const strategy = resolveStrategy(config.strategy, {
    shardCount: config.shardCount,
    percentages: config.shardPercentages,
    sizes: config.shardSizes,
  });
  const reservations = decodeReservations(config.reservedIds);

  const ids = await fetchIds(config.sourceType, config.groupId);
  logger.info(`fetched ${ids.length} ID(s) from ${config.sourceType}`);

  const result = partitionIdentifiers({
    ids,
    exclusions: config.excludeIds,
    reservations,
    seed: config.seed,
    strategy,
  });

  const { metadata } = result;
  if (metadata.unmatchedReserved.length > 0) {
    logger.warn(
      `${metadata.unmatchedReserved.length} reserved ID(s) were not returned by ` +
        `${config.sourceType} and are left out of every shard: ${metadata.unmatchedReserved.join(", ")}`,
    );
  }
  const placed = result.shards.reduce((total, shard) => total + shard.length, 0);
  const unassigned = metadata.distributedCount - (placed - metadata.reservedCount);
  if (unassigned > 0) {
    logger.warn(
      `${unassigned} ID(s) did not fit the configured shard_sizes and are left out of every shard`,
    );
  }
  logger.info(
    `excluded ${metadata.excludedCount}, reserved ${metadata.reservedCount}, ` +
      `distributed ${metadata.distributedCount} across ${metadata.shardCount} shard(s)`,
  );

  return buildShardReport(result, {
    generatedAt: now(),
    sourceType: config.sourceType,
    groupId: config.groupId,
    strategy: config.strategy,
    seed: config.seed,
  });
}
