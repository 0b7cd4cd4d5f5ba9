/**
 * Status collaborator for watch mode: one query, one renderable snapshot.
 */

import type { BridgeClient } from './client';
import { formatDevices, formatStatus } from './formatters/bridge';

export type WatchTarget = 'status' | 'devices';

export const WATCH_TARGETS: readonly WatchTarget[] = ['status', 'devices'];

export interface StatusSource {
  readonly label: string;
  /** Fetch and render a tagged-text snapshot. */
  query(signal?: AbortSignal): Promise<string>;
}

export type StatusApi = Pick<BridgeClient, 'getStatus' | 'getDevices'>;

export function isWatchTarget(value: string): value is WatchTarget {
  return WATCH_TARGETS.some(t => t === value);
}

export function createStatusSource(client: StatusApi, target: WatchTarget): StatusSource {
  switch (target) {
    case 'devices':
      return {
        label: 'devices',
        query: async (signal) => formatDevices(await client.getDevices(signal)),
      };
    case 'status':
    default:
      return {
        label: 'status',
        query: async (signal) => formatStatus(await client.getStatus(signal)),
      };
  }
}
