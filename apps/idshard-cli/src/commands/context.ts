import { resolveShardConfig } from "../config/load-config.js";
import type { ShardConfig } from "../config/schema.js";
import type { InventoryClient } from "../inventory/client.js";
import { createLogger, isLogLevel, type Logger } from "../utils/logger.js";
import { flagLayer } from "./args.js";

/**
 * Everything a command touches outside its arguments. `run` fills in the process defaults;
 * tests pass their own.
 */
export interface CommandEnvironment {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (...data: unknown[]) => void;
  createClient: (config: ShardConfig, logger: Logger) => InventoryClient;
  now: () => Date;
}

export type CommandValues = Record<string, unknown> & { config?: string };

export async function resolveCommandConfig(
  values: CommandValues,
  environment: CommandEnvironment,
): Promise<{ config: ShardConfig; logger: Logger }> {
  const { config, configFile } = await resolveShardConfig({
    configFile: values.config,
    cwd: environment.cwd,
    env: environment.env,
    flags: flagLayer(values),
  });

  // An invalid level is reported by validation; log at the default until then.
  const logger = createLogger(
    isLogLevel(config.logLevel) ? config.logLevel : "warn",
    environment.stderr,
  );
  if (configFile) {
    logger.info(`Using config file: ${configFile}`);
  }

  return { config, logger };
}
