import { describe, it, expect, vi, afterEach } from 'vitest';
import { PollingLogSource, formatLogEntry } from 'artnet-shared';
import type { LogApi, LogTailBatch, TailQuery } from 'artnet-shared';
import { FILTER_NOTICE, LogTailController, describeFilters } from './LogTailController';
import { FakeLogSource, makeEntry, makeHost } from '../testing/fakes';

function flush(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0));
}

afterEach(() => {
  vi.useRealTimers();
});

describe('describeFilters', () => {
  it('lists the active filters', () => {
    expect(describeFilters({})).toBe('no filters');
    expect(describeFilters({ level: 'WARNING', logger: 'bridge.dmx' })).toBe('level>=WARNING logger=bridge.dmx');
  });
});

describe('LogTailController', () => {
  it('prints a header and tails matching entries', async () => {
    const source = new FakeLogSource();
    const host = makeHost();
    const tail = new LogTailController(host, { filters: { level: 'WARNING' }, source });
    tail.start();
    expect(host.appended[0]).toBe('{gray-fg}--- tailing logs (level>=WARNING), q or Esc to exit ---{/gray-fg}\n');

    const warning = makeEntry({ level: 'WARNING', message: 'queue depth high' });
    source.push(makeEntry({ level: 'DEBUG' }), warning);
    await flush();

    expect(host.appended.slice(1)).toEqual([`${formatLogEntry(warning)}\n`]);
    expect(source.subscribeCalls).toEqual([{ level: 'WARNING', logger: null }]);
    tail.stop();
  });

  it('stops appending once stopped', async () => {
    const source = new FakeLogSource();
    const host = makeHost();
    const tail = new LogTailController(host, { filters: {}, source });
    tail.start();
    tail.stop();
    source.push(makeEntry());
    await flush();
    expect(host.appended).toHaveLength(1);
    expect(tail.alive).toBe(false);
    await tail.settled();
  });

  it('reports a failed subscription and resubscribes after the retry delay', async () => {
    vi.useFakeTimers();
    const source = new FakeLogSource();
    const host = makeHost();
    const tail = new LogTailController(host, { filters: {}, source });
    tail.start();
    await vi.advanceTimersByTimeAsync(0);

    source.fail(new Error('bridge offline'));
    await vi.advanceTimersByTimeAsync(0);
    expect(host.appended[1]).toBe(
      '{red-fg}Log tail error: bridge offline{/red-fg} {gray-fg}(retrying in 5s){/gray-fg}\n',
    );
    expect(source.subscribeCalls).toHaveLength(1);
    expect(tail.alive).toBe(true);

    await vi.advanceTimersByTimeAsync(5000);
    expect(source.subscribeCalls).toHaveLength(2);
    tail.stop();
  });

  it('resumes from the last cursor after a failure without repeating lines', async () => {
    vi.useFakeTimers();
    const old = makeEntry({ message: 'universe 3 patched' });
    const fresh = makeEntry({ message: 'universe 4 patched' });
    let failed = false;
    const tailLogs = vi.fn(async (query: TailQuery): Promise<LogTailBatch> => {
      if (query.since === null) return { entries: [old], cursor: 'c1' };
      if (!failed) {
        failed = true;
        throw new Error('bridge offline');
      }
      return query.since === 'c1' ? { entries: [fresh], cursor: 'c2' } : { entries: [], cursor: 'c2' };
    });
    const client: LogApi = { tailLogs, getLogs: vi.fn() };
    const source = new PollingLogSource(client, { pageSize: 50, pollIntervalMs: 100 });
    const host = makeHost();
    const tail = new LogTailController(host, { filters: {}, source, retryDelayMs: 500 });
    tail.start();

    await vi.advanceTimersByTimeAsync(2000);
    tail.stop();

    const sinces = tailLogs.mock.calls.map(([query]) => query.since);
    expect(sinces.slice(0, 4)).toEqual([null, 'c1', 'c1', 'c2']);
    expect(sinces.slice(4).every(since => since === 'c2')).toBe(true);
    const lines = host.appended.slice(1);
    expect(lines.filter(line => line === `${formatLogEntry(old)}\n`)).toHaveLength(1);
    expect(lines.filter(line => line === `${formatLogEntry(fresh)}\n`)).toHaveLength(1);
    expect(lines).toContain('{red-fg}Log tail error: bridge offline{/red-fg} {gray-fg}(retrying in 1s){/gray-fg}\n');
  });

  it('f shows the filter notice', () => {
    const host = makeHost();
    const tail = new LogTailController(host, { filters: {}, source: new FakeLogSource() });
    expect(tail.handleKey('f')).toBe(true);
    expect(host.appended).toEqual([`{yellow-fg}${FILTER_NOTICE}{/yellow-fg}\n`]);
  });

  it('end re-enables follow-tail and jumps to the end', () => {
    const host = makeHost();
    const toEnd = vi.spyOn(host, 'logTailToEnd');
    const tail = new LogTailController(host, { filters: {}, source: new FakeLogSource() });
    tail.setFollowTail(false);
    expect(tail.handleKey('end')).toBe(true);
    expect(tail.followTail).toBe(true);
    expect(toEnd).toHaveBeenCalledTimes(1);
  });

  it('ignores other keys', () => {
    const tail = new LogTailController(makeHost(), { filters: {}, source: new FakeLogSource() });
    expect(tail.handleKey('l')).toBe(false);
  });
});
