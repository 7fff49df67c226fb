import { z } from "zod";
import { InventoryRequestError } from "../errors.js";
import type { ShardConfig } from "../config/schema.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export type InventoryAuth =
  | { method: "oauth2"; clientId: string; clientSecret: string }
  | { method: "basic"; username: string; password: string };

export type InventoryClientConfig = {
  baseUrl: string;
  auth: InventoryAuth;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  /** Wait before every request, including token requests. */
  mandatoryDelayMs: number;
  /** Tokens expiring within this window are replaced before use. */
  tokenRefreshBufferMs: number;
  pageSize: number;
  now?: () => number;
};

export type InventoryDevice = {
  id: string;
  managed: boolean;
};

export interface InventoryClient {
  listComputers(): Promise<InventoryDevice[]>;
  listMobileDevices(): Promise<InventoryDevice[]>;
  getComputerGroupMembers(groupId: string): Promise<string[]>;
  getMobileDeviceGroupMembers(groupId: string): Promise<string[]>;
  listUsers(): Promise<string[]>;
}

type Query = Record<string, string | number | boolean | undefined>;

type RequestOptions = {
  method?: string;
  query?: Query;
  headers?: Record<string, string>;
  body?: string;
  /** Token requests authenticate themselves. */
  authenticate?: boolean;
};

type CachedToken = {
  value: string;
  expiresAt: number;
};

const numericId = z.union([z.string(), z.number().int()]).transform(String);

const oauthTokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const basicTokenSchema = z.object({
  token: z.string(),
  expires: z.string(),
});

const computersInventorySchema = z.object({
  totalCount: z.number().int(),
  results: z.array(
    z.object({
      id: numericId,
      general: z
        .object({
          remoteManagement: z.object({ managed: z.boolean() }).nullish(),
        })
        .nullish(),
    }),
  ),
});

const mobileDevicesSchema = z.object({
  mobile_devices: z.array(z.object({ id: numericId, managed: z.boolean() })),
});

const memberListSchema = z.array(z.object({ id: numericId })).nullish();

const computerGroupSchema = z.object({
  computer_group: z.object({ computers: memberListSchema }),
});

const mobileDeviceGroupSchema = z.object({
  mobile_device_group: z.object({ mobile_devices: memberListSchema }),
});

const usersSchema = z.object({
  users: z.array(z.object({ id: numericId })),
});

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** 5xx and rate limiting are worth another attempt; everything else is final. */
const isTransientStatus = (status: number) => status >= 500 || status === 429;

const resolveUrl = (baseUrl: string, path: string, query: Query = {}) => {
  const url = new URL(path.replace(/^\/+/, ""), baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
};

const safeJsonParse = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const errorMessageFrom = (payload: unknown): string | undefined => {
  const parsed = z
    .union([
      z.object({ errors: z.array(z.object({ description: z.string() })).min(1) }),
      z.object({ error_description: z.string() }),
      z.object({ message: z.string() }),
    ])
    .safeParse(payload);
  if (!parsed.success) {
    return undefined;
  }
  const body = parsed.data;
  if ("errors" in body) {
    return body.errors.map((error) => error.description).join("; ");
  }
  return "error_description" in body ? body.error_description : body.message;
};

/**
 * Accepts a bare host ("example.jamfcloud.com") or a full origin.
 */
export const normalizeBaseUrl = (instanceDomain: string): string => {
  const trimmed = instanceDomain.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
};

export function inventoryClientConfigFrom(config: ShardConfig): InventoryClientConfig {
  return {
    baseUrl: normalizeBaseUrl(config.instanceDomain),
    auth:
      config.authMethod === "basic"
        ? { method: "basic", username: config.username, password: config.password }
        : { method: "oauth2", clientId: config.clientId, clientSecret: config.clientSecret },
    timeoutMs: config.customTimeoutSeconds * 1000,
    retries: config.maxRetryAttempts,
    retryDelayMs: config.retryDelayMs,
    mandatoryDelayMs: config.mandatoryRequestDelayMs,
    tokenRefreshBufferMs: config.tokenRefreshBufferSeconds * 1000,
    pageSize: config.pageSize,
  };
}

export function createInventoryClient(
  config: InventoryClientConfig,
  logger: Logger = silentLogger,
): InventoryClient {
  const now = config.now ?? Date.now;
  let cachedToken: CachedToken | undefined;
  let pendingToken: Promise<CachedToken> | undefined;

  /**
   * One logical request: every attempt waits out the mandatory delay and carries a token that
   * is fresh at that moment. Transient failures are retried up to `retries` times; a 401 on an
   * authenticated call drops the cached token and is replayed once without using up a retry.
   */
  async function dispatch(method: string, url: string, options: RequestOptions) {
    const authenticate = options.authenticate ?? true;
    let retriesLeft = config.retries;
    let tokenReplayed = false;

    for (;;) {
      const headers = new Headers({ accept: "application/json", ...options.headers });
      if (authenticate) {
        headers.set("authorization", `Bearer ${await getToken()}`);
      }
      if (config.mandatoryDelayMs > 0) {
        await delay(config.mandatoryDelayMs);
      }

      logger.debug(`${method} ${url}`);

      let response: Response;
      try {
        response = await fetch(url, {
          method,
          headers,
          body: options.body,
          signal: AbortSignal.timeout(config.timeoutMs),
        });
      } catch (error) {
        if (retriesLeft === 0) {
          throw error;
        }
        retriesLeft -= 1;
        logger.debug(`${method} ${url} errored, ${retriesLeft} retries left`);
        await delay(config.retryDelayMs);
        continue;
      }

      if (response.status === 401 && authenticate && !tokenReplayed) {
        await response.body?.cancel();
        tokenReplayed = true;
        cachedToken = undefined;
        continue;
      }

      if (isTransientStatus(response.status) && retriesLeft > 0) {
        await response.body?.cancel();
        retriesLeft -= 1;
        logger.debug(`${method} ${url} returned ${response.status}, ${retriesLeft} retries left`);
        await delay(config.retryDelayMs);
        continue;
      }

      return response;
    }
  }

  async function send(path: string, options: RequestOptions): Promise<unknown> {
    const method = options.method ?? "GET";
    const url = resolveUrl(config.baseUrl, path, options.query);

    let response: Response;
    try {
      response = await dispatch(method, url, options);
    } catch (error) {
      if (error instanceof InventoryRequestError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new InventoryRequestError(`${method} ${path} failed: ${reason}`, undefined, {
        cause: error,
      });
    }

    const text = await response.text();
    const parsed = text ? safeJsonParse(text) : undefined;

    if (!response.ok) {
      const message = errorMessageFrom(parsed) ?? (text || response.statusText);
      throw new InventoryRequestError(
        `${method} ${path} failed: ${response.status} ${message}`,
        response.status,
      );
    }

    if (parsed === undefined) {
      throw new InventoryRequestError(
        `${method} ${path} did not return JSON`,
        response.status,
      );
    }

    return parsed;
  }

  async function requestJson<TSchema extends z.ZodType>(
    schema: TSchema,
    path: string,
    options: RequestOptions = {},
  ): Promise<z.output<TSchema>> {
    const payload = await send(path, options);
    const result = schema.safeParse(payload);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new InventoryRequestError(`unexpected response from ${path}: ${details}`);
    }
    return result.data;
  }

  async function requestToken(): Promise<CachedToken> {
    const { auth } = config;

    if (auth.method === "oauth2") {
      const body = new URLSearchParams({
        grant_type: "client_credentials",
        client_id: auth.clientId,
        client_secret: auth.clientSecret,
      });
      const token = await requestJson(oauthTokenSchema, "/api/oauth/token", {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: body.toString(),
        authenticate: false,
      });
      return { value: token.access_token, expiresAt: now() + token.expires_in * 1000 };
    }

    const credentials = Buffer.from(`${auth.username}:${auth.password}`).toString("base64");
    const token = await requestJson(basicTokenSchema, "/api/v1/auth/token", {
      method: "POST",
      headers: { authorization: `Basic ${credentials}` },
      authenticate: false,
    });
    const expiresAt = Date.parse(token.expires);
    return { value: token.token, expiresAt: Number.isFinite(expiresAt) ? expiresAt : now() };
  }

  async function getToken(): Promise<string> {
    if (cachedToken && now() < cachedToken.expiresAt - config.tokenRefreshBufferMs) {
      return cachedToken.value;
    }

    if (!pendingToken) {
      logger.debug(`requesting ${config.auth.method} token`);
      pendingToken = requestToken().finally(() => {
        pendingToken = undefined;
      });
    }

    cachedToken = await pendingToken;
    return cachedToken.value;
  }

  return {
    async listComputers() {
      const devices: InventoryDevice[] = [];

      for (let page = 0; ; page += 1) {
        const { totalCount, results } = await requestJson(
          computersInventorySchema,
          "/api/v1/computers-inventory",
          { query: { section: "GENERAL", page, "page-size": config.pageSize } },
        );

        for (const computer of results) {
          devices.push({
            id: computer.id,
            managed: computer.general?.remoteManagement?.managed ?? false,
          });
        }

        if (results.length === 0 || devices.length >= totalCount) {
          return devices;
        }
      }
    },

    async listMobileDevices() {
      const { mobile_devices } = await requestJson(
        mobileDevicesSchema,
        "/JSSResource/mobiledevices",
      );
      return mobile_devices.map((device) => ({ id: device.id, managed: device.managed }));
    },

    async getComputerGroupMembers(groupId: string) {
      const { computer_group } = await requestJson(
        computerGroupSchema,
        `/JSSResource/computergroups/id/${encodeURIComponent(groupId)}`,
      );
      return (computer_group.computers ?? []).map((member) => member.id);
    },

    async getMobileDeviceGroupMembers(groupId: string) {
      const { mobile_device_group } = await requestJson(
        mobileDeviceGroupSchema,
        `/JSSResource/mobiledevicegroups/id/${encodeURIComponent(groupId)}`,
      );
      return (mobile_device_group.mobile_devices ?? []).map((member) => member.id);
    },

    async listUsers() {
      const { users } = await requestJson(usersSchema, "/JSSResource/users");
      return users.map((user) => user.id);
    },
  };
}
