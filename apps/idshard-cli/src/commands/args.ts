import type { Args } from "gunshi";
import type { ConfigLayer } from "../config/load-config.js";
import type { ConfigKey } from "../config/schema.js";

// Every flag is a string; numbers and lists are parsed with the rest of the configuration.

export const configFileArgs = {
  config: {
    type: "string",
    short: "c",
    description: "Config file path (default: ./idshard.config.{yaml,yml,json})",
  },
} satisfies Args;

export const connectionArgs = {
  "instance-domain": {
    type: "string",
    description: "Inventory instance domain (e.g. company.jamfcloud.com)",
  },
  "auth-method": {
    type: "string",
    description: "Authentication method: oauth2 or basic (default: oauth2)",
  },
  "client-id": { type: "string", description: "OAuth2 client ID" },
  "client-secret": { type: "string", description: "OAuth2 client secret" },
  username: { type: "string", description: "Basic auth username" },
  password: { type: "string", description: "Basic auth password" },
  "log-level": {
    type: "string",
    description: "Log level: debug, info, warn or error (default: warn)",
  },
  "max-retry-attempts": {
    type: "string",
    description: "Retries per request for network errors, 5xx and 429 (default: 3)",
  },
  "retry-delay": {
    type: "string",
    description: "Delay between retries in milliseconds (default: 500)",
  },
  "custom-timeout": {
    type: "string",
    description: "Per-request timeout in seconds (default: 60)",
  },
  "token-refresh-buffer": {
    type: "string",
    description: "Refresh tokens expiring within this many seconds (default: 300)",
  },
  "mandatory-request-delay": {
    type: "string",
    description: "Delay before every request in milliseconds (default: 0)",
  },
  "page-size": {
    type: "string",
    description: "Page size for paged inventory endpoints (default: 100)",
  },
} satisfies Args;

export const shardingArgs = {
  "source-type": {
    type: "string",
    description:
      "Source to read IDs from: computer_inventory, mobile_device_inventory, " +
      "computer_group_membership, mobile_device_group_membership or user_accounts",
  },
  "group-id": {
    type: "string",
    description: "Group ID (required for *_group_membership source types)",
  },
  strategy: {
    type: "string",
    description: "Sharding strategy: round-robin, percentage, size or rendezvous",
  },
  "shard-count": {
    type: "string",
    description: "Number of shards (round-robin and rendezvous)",
  },
  "shard-percentages": {
    type: "string",
    description: "Percentages summing to 100, e.g. 10,30,60 (percentage)",
  },
  "shard-sizes": {
    type: "string",
    description: "Shard sizes, -1 as the last element takes the rest, e.g. 50,200,-1 (size)",
  },
  seed: { type: "string", description: "Seed for a reproducible distribution" },
  "exclude-ids": {
    type: "string",
    description: "Comma-separated IDs to leave out of every shard",
  },
  "reserved-ids": {
    type: "string",
    description: `JSON map of shard names to pinned IDs, e.g. '{"shard_0":["101","102"]}'`,
  },
} satisfies Args;

export const outputArgs = {
  output: {
    type: "string",
    short: "o",
    description: "Output format: json or yaml (default: json)",
  },
  "output-file": {
    type: "string",
    description: "Write output to this file instead of stdout",
  },
} satisfies Args;

export const shardCommandArgs = {
  ...configFileArgs,
  ...connectionArgs,
  ...shardingArgs,
  ...outputArgs,
};

const FLAG_KEYS: Record<string, ConfigKey> = {
  "instance-domain": "instance_domain",
  "auth-method": "auth_method",
  "client-id": "client_id",
  "client-secret": "client_secret",
  username: "basic_auth_username",
  password: "basic_auth_password",
  "log-level": "log_level",
  "max-retry-attempts": "max_retry_attempts",
  "retry-delay": "retry_delay_milliseconds",
  "custom-timeout": "custom_timeout_seconds",
  "token-refresh-buffer": "token_refresh_buffer_period_seconds",
  "mandatory-request-delay": "mandatory_request_delay_milliseconds",
  "page-size": "page_size",
  "source-type": "source_type",
  "group-id": "group_id",
  strategy: "strategy",
  "shard-count": "shard_count",
  "shard-percentages": "shard_percentages",
  "shard-sizes": "shard_sizes",
  seed: "seed",
  "exclude-ids": "exclude_ids",
  "reserved-ids": "reserved_ids",
  output: "output_format",
  "output-file": "output_file",
};

/**
 * Converts parsed flag values into a config layer. Flags that were not given are left out so
 * they do not mask the config file or the environment.
 */
export function flagLayer(values: Record<string, unknown>): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [flag, value] of Object.entries(values)) {
    const key = FLAG_KEYS[flag];
    if (key !== undefined && value !== undefined) {
      layer[key] = value;
    }
  }
  return layer;
}
