/**
 * Domain types for the ArtNet bridge REST API.
 * Wire shapes (snake_case) live next to the client; these are what callers see.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  logger: string;
  message: string;
}

export interface LogFilters {
  /** Minimum severity. */
  level?: LogLevel | null;
  /** Logger name or dotted prefix (e.g. `artnet` matches `artnet.rx`). */
  logger?: string | null;
}

export interface LogPage {
  entries: LogEntry[];
  /** Zero-based page index this result belongs to. */
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface LogTailBatch {
  entries: LogEntry[];
  /** Opaque resume token for the next tail request. */
  cursor: string | null;
}

export interface HealthInfo {
  status: string;
  version?: string;
}

export interface BridgeStatus {
  status: string;
  version?: string;
  uptimeSeconds?: number;
  deviceCount: number;
  onlineDevices: number;
  universes: number[];
  packetsPerSecond?: number;
  queueDepth?: number;
}

export interface Device {
  id: string;
  name: string | null;
  ip: string | null;
  model: string | null;
  online: boolean;
  universe: number | null;
  channel: number | null;
}
