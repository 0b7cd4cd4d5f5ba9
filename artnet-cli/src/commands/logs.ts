/**
 * `artnet-console logs` — print one page of stored bridge logs.
 */

import type { Command } from 'commander';
import { color, escapeTags, formatLogEntry } from 'artnet-shared';
import type { LogLevel, LogPage } from 'artnet-shared';
import { runOneShot } from './output';

export interface LogsOptions {
  level?: LogLevel;
  logger?: string;
  search?: string;
  /** One-based, as typed by the user. */
  page?: number;
  pageSize?: number;
}

export function renderLogPage(page: LogPage, search: string | null = null): string {
  const lines = page.entries.map(formatLogEntry);
  if (lines.length === 0) lines.push(color('gray', '(no log entries)'));
  let footer = `Page ${page.page + 1}/${page.totalPages} (${page.total} entries)`;
  if (search) footer += ` matching "${escapeTags(search)}"`;
  lines.push(color('gray', footer));
  return lines.join('\n');
}

export async function logsAction(opts: LogsOptions, cmd: Command): Promise<void> {
  const search = opts.search || null;
  await runOneShot(cmd, {
    fetch: (client, config) => client.getLogs({
      page: (opts.page ?? 1) - 1,
      pageSize: opts.pageSize ?? config.pageSize,
      level: opts.level ?? null,
      logger: opts.logger || null,
      search,
    }),
    render: (page) => renderLogPage(page, search),
  });
}
