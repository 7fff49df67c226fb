import { cli } from "gunshi";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { createShardCommand } from "./commands/shard.js";
import { createValidateCommand } from "./commands/validate.js";
import type { CommandEnvironment } from "./commands/context.js";
import { createInventoryClient, inventoryClientConfigFrom } from "./inventory/client.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8")));
export const version = packageJson.version;

const USAGE = `idshard <command> [options]

Fetch device and user IDs from an inventory API and distribute them into shards for
progressive rollouts and phased deployments.

Commands:
  shard                   Fetch IDs and write the shard assignment
  validate                Check the resolved configuration
  version                 Print the version

Strategies:
  round-robin             Equal distribution (±1 ID)
  percentage              Proportional distribution by percentages
  size                    Fixed shard sizes, -1 in last position takes the rest
  rendezvous              Highest random weight hashing, stable when shards are added

Configuration (lowest precedence first):
  1. idshard.config.{yaml,yml,json} in the working directory, or --config <path>
  2. Environment variables prefixed with JAMF_ (e.g. JAMF_INSTANCE_DOMAIN)
  3. Command-line flags

Examples:
  idshard shard --config ./idshard.config.yaml --strategy round-robin --shard-count 3 --seed os-updates
  idshard shard --config ./idshard.config.yaml --strategy percentage --shard-percentages 10,30,60
  idshard shard --config ./idshard.config.yaml --strategy size --shard-sizes 50,200,-1 -o yaml --output-file shards.yaml
  idshard validate --config ./idshard.config.yaml

Run 'idshard <command> --help' for the options of a command.`;

export type RunOptions = Partial<CommandEnvironment>;

const defaultEnvironment = (options: RunOptions): CommandEnvironment => ({
  env: options.env ?? process.env,
  cwd: options.cwd ?? process.cwd(),
  stdout: options.stdout ?? ((text) => process.stdout.write(text)),
  stderr: options.stderr ?? console.error,
  createClient:
    options.createClient ??
    ((config, logger) => createInventoryClient(inventoryClientConfigFrom(config), logger)),
  now: options.now ?? (() => new Date()),
});

/**
 * Runs the CLI and returns the process exit code. Errors are printed, never thrown.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const environment = defaultEnvironment(options);
  const [commandName, ...rest] = argv;

  // The report is the only thing written to stdout, so gunshi's banner stays off.
  const cliOptions = { name: `idshard ${commandName}`, version, renderHeader: null };

  try {
    switch (commandName) {
      case undefined:
      case "--help":
      case "-h":
        environment.stdout(`${USAGE}\n`);
        return 0;
      case "--version":
      case "-v":
        environment.stdout(`${version}\n`);
        return 0;
      case "version":
        environment.stdout(`idshard version ${version}\n`);
        return 0;
      case "shard":
        await cli(rest, createShardCommand(environment), cliOptions);
        return 0;
      case "validate":
        await cli(rest, createValidateCommand(environment), cliOptions);
        return 0;
      default:
        environment.stderr(`Unknown command: ${commandName}`);
        environment.stderr("");
        environment.stderr("Run 'idshard --help' for available commands.");
        return 1;
    }
  } catch (error) {
    environment.stderr(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

export const __testing = { USAGE };
