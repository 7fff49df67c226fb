import type { Identifier } from "./identifiers.js";

export type ShardEngineErrorOptions = {
  cause?: Error | unknown;
};

export const formatShardLabel = (index: number): string => `shard_${index}`;

/**
 * Base error class for every failure raised by the partition engine. Each instance describes
 * exactly one problem.
 */
export abstract class ShardEngineError<TCode extends string = string> extends Error {
  readonly #code: TCode;

  constructor(message: string, code: TCode, options: ShardEngineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "ShardEngineError";
    this.#code = code;
  }

  get code(): TCode {
    return this.#code;
  }
}

/**
 * A reservation points at a shard index outside `[0, shardCount)`.
 */
export class InvalidReservationError extends ShardEngineError<"INVALID_RESERVATION"> {
  readonly shardIndex: number;
  readonly shardCount: number;

  constructor(shardIndex: number, shardCount: number) {
    super(
      `reservation for ${formatShardLabel(shardIndex)} is out of range: ` +
        `with shard count ${shardCount}, valid shards are ${formatShardLabel(0)} to ${formatShardLabel(shardCount - 1)}`,
      "INVALID_RESERVATION",
    );
    this.name = "InvalidReservationError";
    this.shardIndex = shardIndex;
    this.shardCount = shardCount;
  }
}

/**
 * The same identifier is pinned to two different shards.
 */
export class DuplicateReservationError extends ShardEngineError<"DUPLICATE_RESERVATION"> {
  readonly identifier: Identifier;
  readonly firstShard: number;
  readonly secondShard: number;

  constructor(identifier: Identifier, firstShard: number, secondShard: number) {
    super(
      `ID "${identifier}" is reserved in multiple shards: ${formatShardLabel(firstShard)} and ` +
        `${formatShardLabel(secondShard)}; each ID may only be reserved for one shard`,
      "DUPLICATE_RESERVATION",
    );
    this.name = "DuplicateReservationError";
    this.identifier = identifier;
    this.firstShard = firstShard;
    this.secondShard = secondShard;
  }
}

export class UnknownStrategyError extends ShardEngineError<"UNKNOWN_STRATEGY"> {
  readonly strategy: string;
  readonly validStrategies: readonly string[];

  constructor(strategy: string, validStrategies: readonly string[]) {
    super(
      `unknown strategy "${strategy}": must be one of ` +
        validStrategies.map((name) => `"${name}"`).join(", "),
      "UNKNOWN_STRATEGY",
    );
    this.name = "UnknownStrategyError";
    this.strategy = strategy;
    this.validStrategies = validStrategies;
  }
}
