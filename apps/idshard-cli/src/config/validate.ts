import { STRATEGY_NAMES, isStrategyName } from "@idshard/engine";
import { ConfigValidationError } from "../errors.js";
import { LOG_LEVELS, isLogLevel } from "../utils/logger.js";
import {
  AUTH_METHODS,
  GROUP_SOURCE_TYPES,
  OUTPUT_FORMATS,
  SOURCE_TYPES,
  isOutputFormat,
  isSourceType,
  type ShardConfig,
} from "./schema.js";
import { SHARD_NAME_PATTERN } from "./shard-names.js";

// Inventory IDs are plain integers.
const NUMERIC_ID_PATTERN = /^\d+$/;

type Issues = string[];

/**
 * Formats a list as ["a", "b", "c"].
 */
export function quotedList(items: readonly string[]): string {
  return `[${items.map((item) => JSON.stringify(item)).join(", ")}]`;
}

function validateAuth(config: ShardConfig, issues: Issues) {
  if (!config.instanceDomain) {
    issues.push("instance_domain is required");
  }

  switch (config.authMethod) {
    case "oauth2":
      if (!config.clientId) {
        issues.push("client_id is required when auth_method is 'oauth2'");
      }
      if (!config.clientSecret) {
        issues.push("client_secret is required when auth_method is 'oauth2'");
      }
      if (config.username || config.password) {
        issues.push(
          "basic_auth_username / basic_auth_password are set but auth_method is 'oauth2'; " +
            "these fields are ignored, remove them or switch auth_method to 'basic'",
        );
      }
      break;
    case "basic":
      if (!config.username) {
        issues.push("basic_auth_username is required when auth_method is 'basic'");
      }
      if (!config.password) {
        issues.push("basic_auth_password is required when auth_method is 'basic'");
      }
      if (config.clientId || config.clientSecret) {
        issues.push(
          "client_id / client_secret are set but auth_method is 'basic'; " +
            "these fields are ignored, remove them or switch auth_method to 'oauth2'",
        );
      }
      break;
    case "":
      issues.push(`auth_method is required: must be one of ${quotedList(AUTH_METHODS)}`);
      break;
    default:
      issues.push(
        `auth_method ${JSON.stringify(config.authMethod)} is not valid: must be one of ${quotedList(AUTH_METHODS)}`,
      );
  }
}

function validateSource(config: ShardConfig, issues: Issues) {
  const sourceValid = isSourceType(config.sourceType);
  if (!sourceValid) {
    issues.push(
      config.sourceType === ""
        ? `source_type is required: must be one of ${quotedList(SOURCE_TYPES)}`
        : `source_type ${JSON.stringify(config.sourceType)} is not valid: must be one of ${quotedList(SOURCE_TYPES)}`,
    );
  }

  const groupRequired = GROUP_SOURCE_TYPES.includes(config.sourceType);
  if (groupRequired && !config.groupId) {
    issues.push(`group_id is required when source_type is ${JSON.stringify(config.sourceType)}`);
  }

  if (config.groupId) {
    if (!NUMERIC_ID_PATTERN.test(config.groupId)) {
      issues.push(`group_id ${JSON.stringify(config.groupId)} must be a numeric ID (e.g. "42")`);
    }
    if (!groupRequired && sourceValid) {
      issues.push(
        `group_id is set (${JSON.stringify(config.groupId)}) but source_type ` +
          `${JSON.stringify(config.sourceType)} does not use a group; set source_type to ` +
          "'computer_group_membership' or 'mobile_device_group_membership', or remove group_id",
      );
    }
  }
}

function validateStrategyParameters(config: ShardConfig, issues: Issues) {
  const hasCount = config.shardCount !== undefined;
  const hasPercentages = config.shardPercentages.length > 0;
  const hasSizes = config.shardSizes.length > 0;

  const provided = [
    hasCount ? `shard_count (${config.shardCount})` : undefined,
    hasPercentages ? `shard_percentages (${config.shardPercentages.join(",")})` : undefined,
    hasSizes ? `shard_sizes (${config.shardSizes.join(",")})` : undefined,
  ].filter((entry): entry is string => entry !== undefined);

  if (provided.length === 0) {
    issues.push(
      "exactly one of shard_count, shard_percentages, or shard_sizes must be set; none were provided",
    );
  } else if (provided.length > 1) {
    issues.push(
      "exactly one of shard_count, shard_percentages, or shard_sizes must be set; " +
        `multiple were provided: ${provided.join("; ")}`,
    );
    // The parameter set is ambiguous, strategy checks would only add noise.
    return;
  }

  if (!isStrategyName(config.strategy)) {
    issues.push(
      config.strategy === ""
        ? `strategy is required: must be one of ${quotedList(STRATEGY_NAMES)}`
        : `strategy ${JSON.stringify(config.strategy)} is not valid: must be one of ${quotedList(STRATEGY_NAMES)}`,
    );
    return;
  }

  switch (config.strategy) {
    case "round-robin":
    case "rendezvous":
      if (!hasCount) {
        issues.push(
          `strategy "${config.strategy}" requires shard_count; use shard_count, not shard_percentages or shard_sizes`,
        );
      }
      if (hasPercentages) {
        issues.push(
          `shard_percentages is set but strategy is "${config.strategy}"; shard_percentages is only valid with strategy 'percentage'`,
        );
      }
      if (hasSizes) {
        issues.push(
          `shard_sizes is set but strategy is "${config.strategy}"; shard_sizes is only valid with strategy 'size'`,
        );
      }
      break;
    case "percentage":
      if (!hasPercentages) {
        issues.push(
          "strategy 'percentage' requires shard_percentages; use shard_percentages, not shard_count or shard_sizes",
        );
      }
      if (hasCount) {
        issues.push(
          "shard_count is set but strategy is 'percentage'; shard_count is only valid with strategies 'round-robin' or 'rendezvous'",
        );
      }
      if (hasSizes) {
        issues.push(
          "shard_sizes is set but strategy is 'percentage'; shard_sizes is only valid with strategy 'size'",
        );
      }
      break;
    case "size":
      if (!hasSizes) {
        issues.push(
          "strategy 'size' requires shard_sizes; use shard_sizes, not shard_count or shard_percentages",
        );
      }
      if (hasCount) {
        issues.push(
          "shard_count is set but strategy is 'size'; shard_count is only valid with strategies 'round-robin' or 'rendezvous'",
        );
      }
      if (hasPercentages) {
        issues.push(
          "shard_percentages is set but strategy is 'size'; shard_percentages is only valid with strategy 'percentage'",
        );
      }
      break;
  }

  if (config.shardCount !== undefined && config.shardCount < 1) {
    issues.push(`shard_count must be at least 1, got ${config.shardCount}`);
  }

  if (hasPercentages) {
    config.shardPercentages.forEach((percentage, index) => {
      if (percentage < 0) {
        issues.push(
          `shard_percentages[${index}] is ${percentage}; each percentage must be >= 0`,
        );
      }
    });
    const sum = config.shardPercentages.reduce((total, percentage) => total + percentage, 0);
    if (sum !== 100) {
      issues.push(
        `shard_percentages must sum to exactly 100, got ${sum} (${config.shardPercentages.join(",")})`,
      );
    }
  }

  if (hasSizes) {
    const last = config.shardSizes.length - 1;
    config.shardSizes.forEach((size, index) => {
      if (size !== -1 && size < 1) {
        issues.push(
          `shard_sizes[${index}] is ${size}; each size must be >= 1 or exactly -1 (remainder)`,
        );
      }
      if (size === -1 && index !== last) {
        issues.push(
          `shard_sizes[${index}] is -1 (remainder) but is not the last element; -1 is only valid in the final position`,
        );
      }
    });
  }
}

function validateIdFormats(config: ShardConfig, issues: Issues) {
  config.excludeIds.forEach((id, index) => {
    if (!NUMERIC_ID_PATTERN.test(id)) {
      issues.push(`exclude_ids[${index}] ${JSON.stringify(id)} must be a numeric ID (e.g. "42")`);
    }
  });

  for (const [key, ids] of Object.entries(config.reservedIds)) {
    if (!SHARD_NAME_PATTERN.test(key)) {
      issues.push(
        `reserved_ids key ${JSON.stringify(key)} is not valid; keys must be in the format 'shard_0', 'shard_1', etc.`,
      );
    }
    ids.forEach((id, index) => {
      if (!NUMERIC_ID_PATTERN.test(id)) {
        issues.push(
          `reserved_ids[${JSON.stringify(key)}][${index}] ${JSON.stringify(id)} must be a numeric ID (e.g. "42")`,
        );
      }
    });
  }
}

function validateIdConflicts(config: ShardConfig, issues: Issues) {
  const excluded = new Set(config.excludeIds);
  const firstOwner = new Map<string, string>();

  for (const [shardName, ids] of Object.entries(config.reservedIds)) {
    for (const id of ids) {
      if (excluded.has(id)) {
        issues.push(
          `ID ${JSON.stringify(id)} appears in both exclude_ids and reserved_ids[${JSON.stringify(shardName)}]; ` +
            "exclusion takes precedence and the ID will be absent from all shards, " +
            "remove it from reserved_ids or from exclude_ids",
        );
      }
      const owner = firstOwner.get(id);
      if (owner === undefined) {
        firstOwner.set(id, shardName);
      } else if (owner !== shardName) {
        issues.push(
          `ID ${JSON.stringify(id)} is reserved in multiple shards: ${JSON.stringify(owner)} and ` +
            `${JSON.stringify(shardName)}; each ID may only be pinned to one shard`,
        );
      }
    }
  }
}

function validateOutput(config: ShardConfig, issues: Issues) {
  if (!isOutputFormat(config.outputFormat)) {
    issues.push(
      config.outputFormat === ""
        ? `output_format is required: must be one of ${quotedList(OUTPUT_FORMATS)}`
        : `output_format ${JSON.stringify(config.outputFormat)} is not valid: must be one of ${quotedList(OUTPUT_FORMATS)}`,
    );
  }
  if (!isLogLevel(config.logLevel)) {
    issues.push(
      `log_level ${JSON.stringify(config.logLevel)} is not valid: must be one of ${quotedList(LOG_LEVELS)}`,
    );
  }
}

/**
 * Runs every rule and returns all problems found, in rule order. An empty list means the
 * configuration is usable.
 */
export function collectConfigIssues(config: ShardConfig): string[] {
  const issues: Issues = [];

  validateAuth(config, issues);
  validateSource(config, issues);
  validateStrategyParameters(config, issues);
  validateIdFormats(config, issues);
  validateIdConflicts(config, issues);
  validateOutput(config, issues);

  return issues;
}

export function validateShardConfig(config: ShardConfig): void {
  const issues = collectConfigIssues(config);
  if (issues.length > 0) {
    throw new ConfigValidationError(issues);
  }
}

export const __testing = {
  validateAuth,
  validateSource,
  validateStrategyParameters,
  validateIdFormats,
  validateIdConflicts,
  validateOutput,
};
