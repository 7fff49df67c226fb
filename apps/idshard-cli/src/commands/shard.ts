import { define } from "gunshi";
import { fetchSourceIds } from "../inventory/sources.js";
import { writeShardReport } from "../output/report.js";
import { executeShardRun } from "../shard-run.js";
import { shardCommandArgs } from "./args.js";
import { resolveCommandConfig, type CommandEnvironment } from "./context.js";

export const createShardCommand = (environment: CommandEnvironment) =>
  define({
    name: "shard",
    description: "Fetch inventory IDs and distribute them into shards",
    args: shardCommandArgs,
    run: async (ctx) => {
      const { config, logger } = await resolveCommandConfig(ctx.values, environment);
      const client = environment.createClient(config, logger);

      const report = await executeShardRun(config, {
        fetchIds: (sourceType, groupId) => fetchSourceIds(client, sourceType, groupId),
        now: environment.now,
        logger,
      });

      await writeShardReport(report, {
        format: config.outputFormat === "yaml" ? "yaml" : "json",
        outputFile: config.outputFile,
        stdout: environment.stdout,
        stderr: environment.stderr,
      });
    },
  });
