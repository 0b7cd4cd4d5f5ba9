/**
 * Console configuration: defaults < config file < environment < CLI flags.
 */

import { ConfigError } from './errors';
import { getConfigPath, getDefaultLogPath } from './paths';
import { readJsonStore } from './readers';

export interface ConsoleConfig {
  serverUrl: string;
  apiKey: string | null;
  /** Per-request timeout for REST calls. */
  timeoutMs: number;
  /** Default watch refresh interval, in seconds. */
  refreshInterval: number;
  /** Log entries per page in log view. */
  pageSize: number;
  /** Delay between log tail polls. */
  tailPollMs: number;
  logFile: string;
}

export type ConfigLayer = Partial<ConsoleConfig>;

export function defaultConfig(): ConsoleConfig {
  return {
    serverUrl: 'http://127.0.0.1:8000',
    apiKey: null,
    timeoutMs: 5000,
    refreshInterval: 2,
    pageSize: 50,
    tailPollMs: 1000,
    logFile: getDefaultLogPath(),
  };
}

const STRING_FIELDS = ['serverUrl', 'apiKey', 'logFile'] as const;
const NUMBER_FIELDS = ['timeoutMs', 'refreshInterval', 'pageSize', 'tailPollMs'] as const;

/**
 * Validate the parsed contents of a config file.
 * A missing or non-object file yields an empty layer; a field of the wrong type throws.
 */
export function parseConfigLayer(raw: unknown, source: string): ConfigLayer {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return {};
  const record = new Map(Object.entries(raw));
  const layer: ConfigLayer = {};

  for (const field of STRING_FIELDS) {
    const value = record.get(field);
    if (value === undefined || value === null) continue;
    if (typeof value !== 'string') throw new ConfigError(`${source}: "${field}" must be a string`);
    layer[field] = value;
  }
  for (const field of NUMBER_FIELDS) {
    const value = record.get(field);
    if (value === undefined || value === null) continue;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`${source}: "${field}" must be a positive number`);
    }
    layer[field] = value;
  }
  return layer;
}

export async function loadConfigFile(filePath: string = getConfigPath()): Promise<ConfigLayer> {
  return parseConfigLayer(await readJsonStore(filePath), filePath);
}

export function configFromEnv(env: Record<string, string | undefined>): ConfigLayer {
  const layer: ConfigLayer = {};
  if (env.ARTNET_SERVER_URL) layer.serverUrl = env.ARTNET_SERVER_URL;
  if (env.ARTNET_API_KEY) layer.apiKey = env.ARTNET_API_KEY;
  if (env.ARTNET_CONSOLE_LOG) layer.logFile = env.ARTNET_CONSOLE_LOG;
  return layer;
}

/** Merge layers over the defaults; later layers win, undefined values are skipped. */
export function resolveConfig(...layers: ConfigLayer[]): ConsoleConfig {
  const config = defaultConfig();
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      Object.assign(config, { [key]: value });
    }
  }

  let url: URL;
  try {
    url = new URL(config.serverUrl);
  } catch {
    throw new ConfigError(`Invalid server URL: ${config.serverUrl}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Server URL must use http or https: ${config.serverUrl}`);
  }
  config.pageSize = Math.floor(config.pageSize);
  return config;
}
