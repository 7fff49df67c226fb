import type { ShardConfig } from "./schema.js";

/**
 * A complete, valid oauth2 configuration. Tests override only the fields they care about.
 */
export const baseOAuth2Config = (overrides: Partial<ShardConfig> = {}): ShardConfig => ({
  instanceDomain: "inventory.example.test",
  authMethod: "oauth2",
  clientId: "test-client",
  clientSecret: "test-secret",
  username: "",
  password: "",
  logLevel: "warn",
  maxRetryAttempts: 3,
  retryDelayMs: 500,
  customTimeoutSeconds: 60,
  tokenRefreshBufferSeconds: 300,
  mandatoryRequestDelayMs: 0,
  pageSize: 100,
  sourceType: "computer_inventory",
  groupId: "",
  strategy: "round-robin",
  shardCount: 3,
  shardPercentages: [],
  shardSizes: [],
  seed: "",
  excludeIds: [],
  reservedIds: {},
  outputFormat: "json",
  outputFile: "",
  ...overrides,
});
