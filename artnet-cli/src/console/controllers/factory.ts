import { createStatusSource } from 'artnet-shared';
import type { LogSource, StatusApi } from 'artnet-shared';
import type { ControllerFactory } from '../ConsoleSession';
import { LogTailController } from './LogTailController';
import { LogViewController } from './LogViewController';
import { WatchController } from './WatchController';

export interface ControllerDeps {
  logSource: LogSource;
  statusApi: StatusApi;
  /** Watch interval used when a watch request names none, in seconds. */
  refreshInterval: number;
}

export function createControllerFactory(deps: ControllerDeps): ControllerFactory {
  return {
    logTail: (request, host) => new LogTailController(host, {
      filters: request.filters,
      source: deps.logSource,
    }),
    watch: (request, host) => new WatchController(
      host,
      createStatusSource(deps.statusApi, request.target),
      request.interval ?? deps.refreshInterval,
    ),
    logView: (request, host) => new LogViewController(host, {
      source: deps.logSource,
      filters: request.filters,
      search: request.search,
      follow: request.follow,
    }),
  };
}
