import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigFileNotFoundError, ConfigParseError } from "../errors.js";
import {
  loadConfigFile,
  mergeLayers,
  parseShardConfig,
  readEnvLayer,
  resolveShardConfig,
} from "./load-config.js";

describe("readEnvLayer", () => {
  it("reads JAMF_ variables for known keys only", () => {
    const layer = readEnvLayer({
      JAMF_INSTANCE_DOMAIN: "inventory.example.test",
      JAMF_SHARD_COUNT: "4",
      JAMF_SEED: "",
      JAMF_UNKNOWN_KEY: "ignored",
      INSTANCE_DOMAIN: "ignored",
    });

    expect(layer).toEqual({ instance_domain: "inventory.example.test", shard_count: "4" });
  });
});

describe("mergeLayers", () => {
  it("lets later layers win and skips undefined values", () => {
    const merged = mergeLayers(
      { strategy: "round-robin", exclude_ids: ["1", "2"], seed: "file" },
      { exclude_ids: ["3"], seed: undefined },
    );

    expect(merged).toEqual({ strategy: "round-robin", exclude_ids: ["3"], seed: "file" });
  });
});

describe("parseShardConfig", () => {
  it("applies defaults", () => {
    const config = parseShardConfig({});

    expect(config.authMethod).toBe("oauth2");
    expect(config.logLevel).toBe("warn");
    expect(config.outputFormat).toBe("json");
    expect(config.maxRetryAttempts).toBe(3);
    expect(config.retryDelayMs).toBe(500);
    expect(config.customTimeoutSeconds).toBe(60);
    expect(config.tokenRefreshBufferSeconds).toBe(300);
    expect(config.mandatoryRequestDelayMs).toBe(0);
    expect(config.pageSize).toBe(100);
    expect(config.shardCount).toBeUndefined();
    expect(config.reservedIds).toEqual({});
  });

  it("accepts comma separated strings and JSON reservations", () => {
    const config = parseShardConfig({
      shard_count: "3",
      shard_percentages: "10, 30,60",
      exclude_ids: "5,6",
      reserved_ids: '{"shard_0": ["1", 2]}',
    });

    expect(config.shardCount).toBe(3);
    expect(config.shardPercentages).toEqual([10, 30, 60]);
    expect(config.excludeIds).toEqual(["5", "6"]);
    expect(config.reservedIds).toEqual({ shard_0: ["1", "2"] });
  });

  it("turns numeric YAML identifiers into strings", () => {
    const config = parseShardConfig({ group_id: 42, exclude_ids: [7, "8"] });

    expect(config.groupId).toBe("42");
    expect(config.excludeIds).toEqual(["7", "8"]);
  });

  it("reports shape problems with their key", () => {
    expect(() => parseShardConfig({ shard_count: "many" })).toThrow(ConfigParseError);

    try {
      parseShardConfig({ shard_count: "many" });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigParseError);
      if (error instanceof ConfigParseError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]?.startsWith("shard_count: ")).toBe(true);
      }
    }
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "idshard-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("finds idshard.config.yaml in the working directory", async () => {
    await writeFile(
      join(dir, "idshard.config.yaml"),
      ["instance_domain: inventory.example.test", "strategy: rendezvous", "shard_count: 4", ""].join(
        "\n",
      ),
    );

    const { layer, configFile } = await loadConfigFile({ cwd: dir });

    expect(configFile).toBe(join(dir, "idshard.config.yaml"));
    expect(layer).toMatchObject({
      instance_domain: "inventory.example.test",
      strategy: "rendezvous",
      shard_count: 4,
    });
  });

  it("returns an empty layer when there is no config file", async () => {
    const { layer, configFile } = await loadConfigFile({ cwd: dir });

    expect(configFile).toBeUndefined();
    expect(layer).toEqual({});
  });

  it("fails for an explicit config file that does not exist", async () => {
    await expect(loadConfigFile({ cwd: dir, configFile: "missing.yaml" })).rejects.toBeInstanceOf(
      ConfigFileNotFoundError,
    );
  });

  it("applies env over file and flags over env", async () => {
    await writeFile(
      join(dir, "shards.json"),
      JSON.stringify({ strategy: "round-robin", shard_count: 2, seed: "file", page_size: 50 }),
    );

    const { config, configFile } = await resolveShardConfig({
      cwd: dir,
      configFile: "shards.json",
      env: { JAMF_SHARD_COUNT: "5", JAMF_SEED: "env" },
      flags: { seed: "flag", output_format: undefined },
    });

    expect(configFile).toBe(join(dir, "shards.json"));
    expect(config.strategy).toBe("round-robin");
    expect(config.shardCount).toBe(5);
    expect(config.seed).toBe("flag");
    expect(config.pageSize).toBe(50);
    expect(config.outputFormat).toBe("json");
  });
});
