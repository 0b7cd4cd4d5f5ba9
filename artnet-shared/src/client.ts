/**
 * REST client for the ArtNet bridge.
 *
 * Every request carries a timeout combined with the caller's abort signal,
 * so a controller that goes away can cancel its in-flight queries.
 * Responses are snake_case JSON; they are validated field by field and
 * mapped onto the camelCase domain types.
 */

import { linkSignal } from './async';
import { ApiError } from './errors';
import { parseLogLevel } from './levels';
import type {
  BridgeStatus,
  Device,
  HealthInfo,
  LogEntry,
  LogFilters,
  LogPage,
  LogTailBatch,
} from './types';

export interface BridgeClientOptions {
  apiKey?: string | null;
  timeoutMs?: number;
  fetchFn?: typeof fetch;
}

export interface LogQuery extends LogFilters {
  page: number;
  pageSize: number;
  search?: string | null;
}

export interface TailQuery extends LogFilters {
  since?: string | null;
}

const DEFAULT_TIMEOUT_MS = 5000;

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function num(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function toLogEntry(raw: unknown): LogEntry | null {
  if (!isRecord(raw)) return null;
  const message = str(raw.message);
  if (message === null) return null;
  return {
    timestamp: str(raw.timestamp) ?? '',
    level: parseLogLevel(str(raw.level) ?? '') ?? 'INFO',
    logger: str(raw.logger) ?? 'root',
    message,
  };
}

function toLogEntries(raw: unknown): LogEntry[] {
  if (!Array.isArray(raw)) return [];
  const entries: LogEntry[] = [];
  for (const item of raw) {
    const entry = toLogEntry(item);
    if (entry) entries.push(entry);
  }
  return entries;
}

function toDevice(raw: unknown): Device | null {
  if (!isRecord(raw)) return null;
  const id = str(raw.id) ?? (num(raw.id) !== null ? String(raw.id) : null);
  if (id === null) return null;
  return {
    id,
    name: str(raw.name),
    ip: str(raw.ip),
    model: str(raw.model),
    online: raw.online === true,
    universe: num(raw.universe),
    channel: num(raw.channel),
  };
}

export class BridgeClient {
  readonly endpoint: string;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(endpoint: string, options: BridgeClientOptions = {}) {
    this.endpoint = endpoint.replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async getHealth(signal?: AbortSignal): Promise<HealthInfo> {
    const data = await this.get('/health', {}, signal);
    if (!isRecord(data)) throw new Error('Invalid API response: expected an object from /health');
    return {
      status: str(data.status) ?? 'unknown',
      version: str(data.version) ?? undefined,
    };
  }

  async getStatus(signal?: AbortSignal): Promise<BridgeStatus> {
    const data = await this.get('/status', {}, signal);
    if (!isRecord(data)) throw new Error('Invalid API response: expected an object from /status');
    const universes = Array.isArray(data.universes)
      ? data.universes.filter((u): u is number => typeof u === 'number')
      : [];
    return {
      status: str(data.status) ?? 'unknown',
      version: str(data.version) ?? undefined,
      uptimeSeconds: num(data.uptime_seconds) ?? undefined,
      deviceCount: num(data.device_count) ?? 0,
      onlineDevices: num(data.online_devices) ?? 0,
      universes,
      packetsPerSecond: num(data.packets_per_second) ?? undefined,
      queueDepth: num(data.queue_depth) ?? undefined,
    };
  }

  async getDevices(signal?: AbortSignal): Promise<Device[]> {
    const data = await this.get('/devices', {}, signal);
    const list = Array.isArray(data) ? data : isRecord(data) && Array.isArray(data.devices) ? data.devices : null;
    if (!list) throw new Error('Invalid API response: expected a device list from /devices');
    const devices: Device[] = [];
    for (const item of list) {
      const device = toDevice(item);
      if (device) devices.push(device);
    }
    return devices;
  }

  /** Fetch one page of stored logs. Pages are zero-based. */
  async getLogs(query: LogQuery, signal?: AbortSignal): Promise<LogPage> {
    const pageSize = Math.max(1, query.pageSize);
    const page = Math.max(0, query.page);
    const data = await this.get('/logs', {
      offset: String(page * pageSize),
      limit: String(pageSize),
      level: query.level ?? null,
      logger: query.logger ?? null,
      search: query.search ?? null,
    }, signal);
    if (!isRecord(data)) throw new Error('Invalid API response: expected an object from /logs');

    const entries = toLogEntries(data.logs);
    const total = num(data.total) ?? entries.length;
    const totalPages = Math.max(1, Math.ceil(total / pageSize));
    return {
      entries,
      page,
      pageSize,
      total,
      totalPages,
      hasNext: page < totalPages - 1,
      hasPrev: page > 0,
    };
  }

  /** Fetch log lines newer than `since` (all recent lines when null). */
  async tailLogs(query: TailQuery, signal?: AbortSignal): Promise<LogTailBatch> {
    const data = await this.get('/logs/tail', {
      since: query.since ?? null,
      level: query.level ?? null,
      logger: query.logger ?? null,
    }, signal);
    if (!isRecord(data)) throw new Error('Invalid API response: expected an object from /logs/tail');
    return {
      entries: toLogEntries(data.logs),
      cursor: str(data.cursor) ?? query.since ?? null,
    };
  }

  // ── Internals ──

  buildUrl(pathname: string, params: Record<string, string | null>): string {
    const url = new URL(this.endpoint + '/' + pathname.replace(/^\/+/, ''));
    for (const [key, value] of Object.entries(params)) {
      if (value !== null && value !== '') url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async get(pathname: string, params: Record<string, string | null>, signal?: AbortSignal): Promise<unknown> {
    const url = this.buildUrl(pathname, params);
    const headers: Record<string, string> = { 'Accept': 'application/json' };
    if (this.apiKey) headers['X-API-Key'] = this.apiKey;

    const linked = linkSignal(this.timeoutMs, signal);
    try {
      const response = await this.fetchFn(url, { headers, signal: linked.signal });
      if (!response.ok) {
        const details: unknown = await response.json().catch(() => null);
        const detailText = isRecord(details) ? str(details.detail) ?? str(details.error) : null;
        throw new ApiError(detailText || `HTTP ${response.status}`, response.status, details);
      }
      return await response.json();
    } finally {
      linked.dispose();
    }
  }
}
