import fs from 'node:fs';
import path from 'node:path';
import yaml from 'yaml';
import { z } from 'zod';

import { ConfigError } from '@deepdub/shared';

export interface RetryPolicy {
  /**
   * Reconnect attempts after the first failure before the session gives up.
   */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface ClientConfig {
  apiKey: string;
  baseUrl: string;
  websocketUrl: string;
  streamingWebsocketUrl: string;
  maxConcurrentSessions: number;
  connectTimeoutMs: number;
  heartbeatIntervalMs: number;
  /**
   * Time allowed for a pong before the connection is considered dropped.
   */
  heartbeatTimeoutMs: number;
  /**
   * Undrained audio bytes per session before the session stops reading.
   */
  highWaterMarkBytes: number;
  retry: RetryPolicy;
}

export type ClientConfigOverrides = Partial<Omit<ClientConfig, 'retry'>> & {
  eu?: boolean;
  retry?: Partial<RetryPolicy>;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8000,
  multiplier: 2,
};

export const DEFAULT_POOL_SETTINGS = {
  maxConcurrentSessions: 4,
  connectTimeoutMs: 10_000,
  heartbeatIntervalMs: 15_000,
  heartbeatTimeoutMs: 10_000,
  highWaterMarkBytes: 4 * 1024 * 1024,
} as const;

const DEFAULT_CONFIG_FILENAMES = ['deepdub.config.json', 'deepdub.config.yaml', 'deepdub.config.yml'];

const ConfigFileSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    websocketUrl: z.string().url().optional(),
    streamingWebsocketUrl: z.string().url().optional(),
    eu: z.boolean().optional(),
    maxConcurrentSessions: z.number().int().positive().optional(),
    connectTimeoutMs: z.number().positive().optional(),
    heartbeatIntervalMs: z.number().positive().optional(),
    heartbeatTimeoutMs: z.number().positive().optional(),
    highWaterMarkBytes: z.number().int().positive().optional(),
    retry: z
      .object({
        maxAttempts: z.number().int().nonnegative().optional(),
        initialDelayMs: z.number().nonnegative().optional(),
        maxDelayMs: z.number().nonnegative().optional(),
        multiplier: z.number().min(1).optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function defaultEndpoints(eu: boolean): {
  baseUrl: string;
  websocketUrl: string;
  streamingWebsocketUrl: string;
} {
  const region = eu ? '.eu' : '';
  return {
    baseUrl: `https://restapi${region}.deepdub.ai/api/v1`,
    websocketUrl: `wss://wsapi${region}.deepdub.ai/open`,
    streamingWebsocketUrl: `wss://wss${region}.deepdub.ai/ws`,
  };
}

function readEnvString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function readEnvPositiveInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = readEnvString(env, key);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigError(`${key} must be a non-negative number when set`);
  }
  return Math.floor(parsed);
}

function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

function loadConfigFile(cwd: string): ConfigFile {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return {};
  }

  const content = fs.readFileSync(configPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(content) : yaml.parse(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${path.basename(configPath)}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = ConfigFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${path.basename(configPath)}: ${issues}`);
  }
  return result.data;
}

/**
 * Resolves client configuration. Precedence: explicit overrides, then
 * environment variables, then a deepdub.config.(json|yaml|yml) file in `cwd`,
 * then defaults.
 */
export function loadClientConfig(
  options: {
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    overrides?: ClientConfigOverrides;
  } = {},
): ClientConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const file = loadConfigFile(options.cwd ?? process.cwd());

  const envEu = readEnvString(env, 'DD_EU');
  const eu = overrides.eu ?? (envEu !== undefined ? envEu === '1' : (file.eu ?? false));
  const endpoints = defaultEndpoints(eu);

  const apiKey = overrides.apiKey ?? readEnvString(env, 'DEEPDUB_API_KEY') ?? file.apiKey;
  if (!apiKey) {
    throw new ConfigError(
      'No API key provided, supply it as an option or set the DEEPDUB_API_KEY environment variable',
    );
  }

  const retry: RetryPolicy = {
    ...DEFAULT_RETRY_POLICY,
    ...(file.retry ?? {}),
  };
  const envMaxAttempts = readEnvPositiveInt(env, 'DEEPDUB_RETRY_MAX_ATTEMPTS');
  if (envMaxAttempts !== undefined) {
    retry.maxAttempts = envMaxAttempts;
  }
  Object.assign(retry, overrides.retry ?? {});

  const maxConcurrentSessions =
    overrides.maxConcurrentSessions ??
    readEnvPositiveInt(env, 'DEEPDUB_MAX_CONCURRENT_SESSIONS') ??
    file.maxConcurrentSessions ??
    DEFAULT_POOL_SETTINGS.maxConcurrentSessions;
  if (maxConcurrentSessions < 1) {
    throw new ConfigError('maxConcurrentSessions must be at least 1');
  }

  return {
    apiKey,
    baseUrl:
      overrides.baseUrl ?? readEnvString(env, 'DEEPDUB_BASE_URL') ?? file.baseUrl ?? endpoints.baseUrl,
    websocketUrl:
      overrides.websocketUrl ??
      readEnvString(env, 'DEEPDUB_BASE_WEBSOCKET_URL') ??
      file.websocketUrl ??
      endpoints.websocketUrl,
    streamingWebsocketUrl:
      overrides.streamingWebsocketUrl ??
      readEnvString(env, 'DEEPDUB_BASE_WEBSOCKET_STREAMING_URL') ??
      file.streamingWebsocketUrl ??
      endpoints.streamingWebsocketUrl,
    maxConcurrentSessions,
    connectTimeoutMs:
      overrides.connectTimeoutMs ??
      readEnvPositiveInt(env, 'DEEPDUB_CONNECT_TIMEOUT_MS') ??
      file.connectTimeoutMs ??
      DEFAULT_POOL_SETTINGS.connectTimeoutMs,
    heartbeatIntervalMs:
      overrides.heartbeatIntervalMs ??
      file.heartbeatIntervalMs ??
      DEFAULT_POOL_SETTINGS.heartbeatIntervalMs,
    heartbeatTimeoutMs:
      overrides.heartbeatTimeoutMs ??
      file.heartbeatTimeoutMs ??
      DEFAULT_POOL_SETTINGS.heartbeatTimeoutMs,
    highWaterMarkBytes:
      overrides.highWaterMarkBytes ??
      file.highWaterMarkBytes ??
      DEFAULT_POOL_SETTINGS.highWaterMarkBytes,
    retry,
  };
}
