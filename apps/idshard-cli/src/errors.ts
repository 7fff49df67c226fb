export type IdshardErrorOptions = {
  cause?: Error | unknown;
};

/**
 * Base error class for failures raised by the CLI layer (configuration, inventory, output).
 */
export abstract class IdshardCliError<TCode extends string = string> extends Error {
  readonly #code: TCode;

  constructor(message: string, code: TCode, options: IdshardErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "IdshardCliError";
    this.#code = code;
  }

  get code(): TCode {
    return this.#code;
  }
}

const bulletList = (issues: readonly string[]) => `\n  • ${issues.join("\n  • ")}`;

/**
 * The merged configuration does not have the expected shape (wrong types, malformed lists).
 */
export class ConfigParseError extends IdshardCliError<"CONFIG_PARSE"> {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`configuration could not be parsed:${bulletList(issues)}`, "CONFIG_PARSE");
    this.name = "ConfigParseError";
    this.issues = issues;
  }
}

/**
 * Every cross-field problem found in a configuration, reported together.
 */
export class ConfigValidationError extends IdshardCliError<"CONFIG_VALIDATION"> {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(
      `configuration validation failed with ${issues.length} error(s):${bulletList(issues)}`,
      "CONFIG_VALIDATION",
    );
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export class ConfigFileNotFoundError extends IdshardCliError<"CONFIG_FILE_NOT_FOUND"> {
  readonly path: string;

  constructor(path: string) {
    super(`config file not found: ${path}`, "CONFIG_FILE_NOT_FOUND");
    this.name = "ConfigFileNotFoundError";
    this.path = path;
  }
}

export class InvalidShardNameError extends IdshardCliError<"INVALID_SHARD_NAME"> {
  readonly shardName: string;

  constructor(shardName: string) {
    super(
      `invalid shard name "${shardName}" in reserved_ids: must be 'shard_0', 'shard_1', etc.`,
      "INVALID_SHARD_NAME",
    );
    this.name = "InvalidShardNameError";
    this.shardName = shardName;
  }
}

/**
 * The inventory API answered with a non-2xx status, or with a payload of the wrong shape.
 */
export class InventoryRequestError extends IdshardCliError<"INVENTORY_REQUEST"> {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options: IdshardErrorOptions = {}) {
    super(message, "INVENTORY_REQUEST", options);
    this.name = "InventoryRequestError";
    this.status = status;
  }
}
