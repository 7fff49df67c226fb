import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { InventoryRequestError } from "./errors.js";
import type { InventoryClient } from "./inventory/client.js";
import { __testing, run, version, type RunOptions } from "./cli.js";

const env = {
  JAMF_INSTANCE_DOMAIN: "inventory.example.test",
  JAMF_CLIENT_ID: "test-client",
  JAMF_CLIENT_SECRET: "test-secret",
};

const fakeClient = (users: () => Promise<string[]>): InventoryClient => ({
  listComputers: async () => [],
  listMobileDevices: async () => [],
  getComputerGroupMembers: async () => [],
  getMobileDeviceGroupMembers: async () => [],
  listUsers: users,
});

describe("idshard CLI", () => {
  let cwd: string;
  let stdout: ReturnType<typeof vi.fn>;
  let stderr: ReturnType<typeof vi.fn>;

  const runWith = (argv: string[], options: RunOptions = {}) =>
    run(argv, {
      env,
      cwd,
      stdout,
      stderr,
      now: () => new Date("2026-03-01T12:00:00.000Z"),
      createClient: () => fakeClient(async () => ["3", "1", "2", "4"]),
      ...options,
    });

  const userShardArgs = [
    "--source-type",
    "user_accounts",
    "--strategy",
    "round-robin",
    "--shard-count",
    "2",
  ];

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), "idshard-cli-"));
    stdout = vi.fn();
    stderr = vi.fn();
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  test("prints usage without a command", async () => {
    expect(await runWith([])).toBe(0);
    expect(stdout).toHaveBeenCalledWith(`${__testing.USAGE}\n`);
  });

  test("prints the version", async () => {
    expect(await runWith(["--version"])).toBe(0);
    expect(stdout).toHaveBeenCalledWith(`${version}\n`);

    expect(await runWith(["version"])).toBe(0);
    expect(stdout).toHaveBeenLastCalledWith(`idshard version ${version}\n`);
  });

  test("rejects unknown commands", async () => {
    expect(await runWith(["split"])).toBe(1);
    expect(stderr).toHaveBeenCalledWith("Unknown command: split");
    expect(stdout).not.toHaveBeenCalled();
  });

  test("validates a configuration built from env and flags", async () => {
    expect(await runWith(["validate", ...userShardArgs])).toBe(0);
    expect(stdout).toHaveBeenCalledWith("Configuration is valid.\n");
  });

  test("reports every validation problem", async () => {
    const exitCode = await runWith([
      "validate",
      "--source-type",
      "user_accounts",
      "--strategy",
      "percentage",
      "--shard-percentages",
      "50,40",
    ]);

    expect(exitCode).toBe(1);
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith(
      "configuration validation failed with 1 error(s):\n" +
        "  • shard_percentages must sum to exactly 100, got 90 (50,40)",
    );
  });

  test("writes the shard report to stdout", async () => {
    expect(await runWith(["shard", ...userShardArgs])).toBe(0);

    expect(stdout).toHaveBeenCalledTimes(1);
    const report: unknown = JSON.parse(String(stdout.mock.calls[0]?.[0]));
    expect(report).toEqual({
      metadata: {
        generated_at: "2026-03-01T12:00:00.000Z",
        source_type: "user_accounts",
        strategy: "round-robin",
        seed: "",
        total_ids_fetched: 4,
        excluded_id_count: 0,
        reserved_id_count: 0,
        unreserved_ids_distributed: 4,
        shard_count: 2,
      },
      shards: { shard_0: ["2", "3"], shard_1: ["1", "4"] },
    });
  });

  test("reads the config file and lets flags override it", async () => {
    await writeFile(
      join(cwd, "idshard.config.yaml"),
      [
        "source_type: user_accounts",
        "strategy: round-robin",
        "shard_count: 4",
        "exclude_ids: [1]",
        "reserved_ids:",
        "  shard_1: [4]",
        "",
      ].join("\n"),
    );

    expect(await runWith(["shard", "--shard-count", "2", "-o", "yaml"])).toBe(0);

    const output = String(stdout.mock.calls[0]?.[0]);
    expect(output).toContain("shard_count: 2\n");
    expect(output).toContain("excluded_id_count: 1\n");
  });

  test("writes the report to --output-file", async () => {
    const outputFile = join(cwd, "shards.json");

    expect(await runWith(["shard", ...userShardArgs, "--output-file", outputFile])).toBe(0);

    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith(`Output written to ${outputFile}`);
    const written: unknown = JSON.parse(await readFile(outputFile, "utf8"));
    expect(written).toMatchObject({ shards: { shard_0: ["2", "3"], shard_1: ["1", "4"] } });
  });

  test("fails without output when the inventory request fails", async () => {
    const exitCode = await runWith(["shard", ...userShardArgs], {
      createClient: () =>
        fakeClient(async () => {
          throw new InventoryRequestError("GET /JSSResource/users failed: 500 boom", 500);
        }),
    });

    expect(exitCode).toBe(1);
    expect(stdout).not.toHaveBeenCalled();
    expect(stderr).toHaveBeenCalledWith(
      "failed to retrieve users: GET /JSSResource/users failed: 500 boom",
    );
  });

  test("fails for an explicit config file that does not exist", async () => {
    expect(await runWith(["validate", "--config", "missing.yaml"])).toBe(1);
    expect(stderr).toHaveBeenCalledWith(`config file not found: ${join(cwd, "missing.yaml")}`);
  });
});
