import { define } from "gunshi";
import { validateShardConfig } from "../config/validate.js";
import { shardCommandArgs } from "./args.js";
import { resolveCommandConfig, type CommandEnvironment } from "./context.js";

export const createValidateCommand = (environment: CommandEnvironment) =>
  define({
    name: "validate",
    description: "Check the resolved configuration without contacting the inventory",
    args: shardCommandArgs,
    run: async (ctx) => {
      const { config } = await resolveCommandConfig(ctx.values, environment);
      validateShardConfig(config);
      environment.stdout("Configuration is valid.\n");
    },
  });
