/**
 * Tagged-text renderings of bridge data for the console views.
 */

import type { BridgeStatus, Device, HealthInfo, LogEntry, LogLevel } from '../types';
import { color, escapeTags } from './tags';

const LEVEL_COLORS: Record<LogLevel, string> = {
  DEBUG: 'gray',
  INFO: 'cyan',
  WARNING: 'yellow',
  ERROR: 'red',
  CRITICAL: 'magenta',
};

/** Format a duration in seconds, e.g. `2h05m`, `3m12s`, `42s`. */
export function formatUptime(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  const d = Math.floor(s / 86_400);
  const h = Math.floor((s % 86_400) / 3600);
  const m = Math.floor((s % 3600) / 60);
  const sec = s % 60;
  if (d > 0) return `${d}d${String(h).padStart(2, '0')}h`;
  if (h > 0) return `${h}h${String(m).padStart(2, '0')}m`;
  if (m > 0) return `${m}m${String(sec).padStart(2, '0')}s`;
  return `${sec}s`;
}

/** Time-of-day part of an ISO timestamp (`HH:MM:SS`), or the raw value. */
export function formatClock(ts: string): string {
  const match = /T(\d{2}:\d{2}:\d{2})/.exec(ts);
  return match ? match[1] : ts;
}

export function formatLogEntry(entry: LogEntry): string {
  const level = color(LEVEL_COLORS[entry.level], entry.level.padEnd(8));
  const time = color('gray', formatClock(entry.timestamp));
  return `${time} ${level} ${color('blue', escapeTags(entry.logger))} ${escapeTags(entry.message)}`;
}

export function formatHealth(health: HealthInfo): string {
  const ok = health.status.toLowerCase() === 'ok' || health.status.toLowerCase() === 'healthy';
  const state = ok ? color('green', escapeTags(health.status)) : color('red', escapeTags(health.status));
  return health.version ? `Health: ${state} (v${escapeTags(health.version)})` : `Health: ${state}`;
}

export function formatStatus(status: BridgeStatus): string {
  const lines: string[] = [];
  const running = status.status.toLowerCase() === 'running' || status.status.toLowerCase() === 'ok';
  lines.push(`{bold}Bridge status{/bold}  ${running ? color('green', escapeTags(status.status)) : color('yellow', escapeTags(status.status))}`);
  if (status.version) lines.push(`  Version:      ${escapeTags(status.version)}`);
  if (status.uptimeSeconds !== undefined) lines.push(`  Uptime:       ${formatUptime(status.uptimeSeconds)}`);
  lines.push(`  Devices:      ${status.onlineDevices}/${status.deviceCount} online`);
  lines.push(`  Universes:    ${status.universes.length > 0 ? status.universes.join(', ') : '(none)'}`);
  if (status.packetsPerSecond !== undefined) lines.push(`  Packets/s:    ${status.packetsPerSecond}`);
  if (status.queueDepth !== undefined) lines.push(`  Queue depth:  ${status.queueDepth}`);
  return lines.join('\n');
}

export function formatDevices(devices: Device[]): string {
  if (devices.length === 0) return color('gray', '(no devices)');
  const lines = [`{bold}${'ID'.padEnd(20)} ${'NAME'.padEnd(20)} ${'IP'.padEnd(16)} ${'U/CH'.padEnd(8)} STATE{/bold}`];
  for (const d of devices) {
    const route = d.universe !== null ? `${d.universe}/${d.channel ?? '-'}` : '-';
    const state = d.online ? color('green', 'online') : color('red', 'offline');
    lines.push(
      `${escapeTags(d.id.padEnd(20))} ${escapeTags((d.name ?? '-').padEnd(20))} ${escapeTags((d.ip ?? '-').padEnd(16))} ${route.padEnd(8)} ${state}`,
    );
  }
  return lines.join('\n');
}
