import { z } from "zod";

export const AUTH_METHODS = ["oauth2", "basic"] as const;

export const SOURCE_TYPES = [
  "computer_inventory",
  "mobile_device_inventory",
  "computer_group_membership",
  "mobile_device_group_membership",
  "user_accounts",
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export const GROUP_SOURCE_TYPES: readonly string[] = [
  "computer_group_membership",
  "mobile_device_group_membership",
];

export const OUTPUT_FORMATS = ["json", "yaml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const isSourceType = (value: string): value is SourceType =>
  (SOURCE_TYPES as readonly string[]).includes(value);

export const isOutputFormat = (value: string): value is OutputFormat =>
  (OUTPUT_FORMATS as readonly string[]).includes(value);

// Lists arrive as arrays from config files and as "a,b,c" from env vars and flags.
const splitList = (value: unknown) =>
  typeof value === "string"
    ? value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    : value;

const parseJsonString = (value: unknown) => {
  if (typeof value !== "string") {
    return value;
  }
  try {
    return JSON.parse(value) as unknown;
  } catch {
    return value;
  }
};

// YAML turns unquoted IDs into numbers.
const identifierSchema = z.union([z.string(), z.number().int()]).transform(String);
const integerSchema = z.coerce.number().int();

const integerListSchema = z.preprocess(splitList, z.array(integerSchema));
const identifierListSchema = z.preprocess(splitList, z.array(identifierSchema));
const reservedIdsSchema = z.preprocess(
  parseJsonString,
  z.record(z.string(), z.preprocess(splitList, z.array(identifierSchema))),
);

/**
 * The configuration as written in config files and env vars (snake case keys). Every key is
 * optional here; required-ness is a semantic rule checked by `collectConfigIssues`.
 */
export const rawConfigSchema = z.object({
  instance_domain: z.string().optional(),
  auth_method: z.string().optional(),
  client_id: z.string().optional(),
  client_secret: z.string().optional(),
  basic_auth_username: z.string().optional(),
  basic_auth_password: z.string().optional(),

  log_level: z.string().optional(),
  max_retry_attempts: integerSchema.min(0).optional(),
  retry_delay_milliseconds: integerSchema.min(0).optional(),
  custom_timeout_seconds: integerSchema.min(1).optional(),
  token_refresh_buffer_period_seconds: integerSchema.min(0).optional(),
  mandatory_request_delay_milliseconds: integerSchema.min(0).optional(),
  page_size: integerSchema.min(1).optional(),

  source_type: z.string().optional(),
  group_id: identifierSchema.optional(),
  strategy: z.string().optional(),
  shard_count: integerSchema.optional(),
  shard_percentages: integerListSchema.optional(),
  shard_sizes: integerListSchema.optional(),
  seed: z.string().optional(),
  exclude_ids: identifierListSchema.optional(),
  reserved_ids: reservedIdsSchema.optional(),

  output_format: z.string().optional(),
  output_file: z.string().optional(),
});

export const CONFIG_KEYS = rawConfigSchema.keyof().options;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

/**
 * The resolved configuration. Unset optional values stay `undefined` so validation can tell
 * "not provided" from "provided but wrong".
 */
export interface ShardConfig {
  instanceDomain: string;
  authMethod: string;
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;

  logLevel: string;
  maxRetryAttempts: number;
  retryDelayMs: number;
  customTimeoutSeconds: number;
  tokenRefreshBufferSeconds: number;
  mandatoryRequestDelayMs: number;
  pageSize: number;

  sourceType: string;
  groupId: string;
  strategy: string;
  shardCount: number | undefined;
  shardPercentages: number[];
  shardSizes: number[];
  seed: string;
  excludeIds: string[];
  reservedIds: Record<string, string[]>;

  outputFormat: string;
  outputFile: string;
}

export const shardConfigSchema = rawConfigSchema.transform(
  (raw): ShardConfig => ({
    instanceDomain: raw.instance_domain ?? "",
    authMethod: raw.auth_method ?? "oauth2",
    clientId: raw.client_id ?? "",
    clientSecret: raw.client_secret ?? "",
    username: raw.basic_auth_username ?? "",
    password: raw.basic_auth_password ?? "",

    logLevel: raw.log_level ?? "warn",
    maxRetryAttempts: raw.max_retry_attempts ?? 3,
    retryDelayMs: raw.retry_delay_milliseconds ?? 500,
    customTimeoutSeconds: raw.custom_timeout_seconds ?? 60,
    tokenRefreshBufferSeconds: raw.token_refresh_buffer_period_seconds ?? 300,
    mandatoryRequestDelayMs: raw.mandatory_request_delay_milliseconds ?? 0,
    pageSize: raw.page_size ?? 100,

    sourceType: raw.source_type ?? "",
    groupId: raw.group_id ?? "",
    strategy: raw.strategy ?? "",
    shardCount: raw.shard_count,
    shardPercentages: raw.shard_percentages ?? [],
    shardSizes: raw.shard_sizes ?? [],
    seed: raw.seed ?? "",
    excludeIds: raw.exclude_ids ?? [],
    reservedIds: raw.reserved_ids ?? {},

    outputFormat: raw.output_format ?? "json",
    outputFile: raw.output_file ?? "",
  }),
);
