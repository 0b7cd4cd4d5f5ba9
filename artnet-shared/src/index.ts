/**
 * Public API for artnet-shared.
 */

export type {
  LogLevel,
  LogEntry,
  LogFilters,
  LogPage,
  LogTailBatch,
  HealthInfo,
  BridgeStatus,
  Device,
} from './types';

export { ApiError, ConfigError, errorMessage } from './errors';
export { sleep, linkSignal } from './async';
export type { LinkedSignal } from './async';

export { BridgeClient } from './client';
export type { BridgeClientOptions, LogQuery, TailQuery } from './client';

export { LOG_LEVELS, parseLogLevel, levelRank, loggerMatches, matchesFilters } from './levels';

export { PollingLogSource } from './logSource';
export type { LogSource, LogApi, PollingLogSourceOptions, TailPosition } from './logSource';

export { createStatusSource, isWatchTarget, WATCH_TARGETS } from './statusSource';
export type { StatusSource, StatusApi, WatchTarget } from './statusSource';

export { escapeTags, stripBlessedTags, visibleLength, truncate, color } from './formatters/tags';
export { formatLogEntry, formatStatus, formatDevices, formatHealth, formatUptime, formatClock } from './formatters/bridge';

export { getConfigDir, getConfigPath, getDefaultLogPath, APP_DIR_NAME } from './paths';
export { readJsonStore } from './readers';
export { defaultConfig, parseConfigLayer, loadConfigFile, configFromEnv, resolveConfig } from './config';
export type { ConsoleConfig, ConfigLayer } from './config';
