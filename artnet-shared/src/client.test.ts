import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { BridgeClient } from './client';
import { ApiError } from './errors';

const ENDPOINT = 'http://127.0.0.1:8000/';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function makeClient(body: unknown, status = 200, apiKey: string | null = 'test-key') {
  const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(body, status));
  const client = new BridgeClient(ENDPOINT, { apiKey, fetchFn });
  return { client, fetchFn };
}

function requestedUrl(fetchFn: Mock<typeof fetch>): URL {
  const [input] = fetchFn.mock.calls[0];
  return new URL(String(input));
}

describe('BridgeClient', () => {
  it('strips trailing slashes from the endpoint', () => {
    const { client } = makeClient({});
    expect(client.endpoint).toBe('http://127.0.0.1:8000');
  });

  it('sends the API key header when configured', async () => {
    const { client, fetchFn } = makeClient({ status: 'ok' });
    await client.getHealth();
    const init = fetchFn.mock.calls[0][1];
    expect(init?.headers).toEqual({ 'Accept': 'application/json', 'X-API-Key': 'test-key' });
  });

  it('omits the API key header when none is configured', async () => {
    const { client, fetchFn } = makeClient({ status: 'ok' }, 200, null);
    await client.getHealth();
    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({ 'Accept': 'application/json' });
  });

  describe('getStatus', () => {
    it('maps snake_case fields onto the domain type', async () => {
      const { client } = makeClient({
        status: 'running',
        version: '1.4.0',
        uptime_seconds: 3600,
        device_count: 4,
        online_devices: 3,
        universes: [0, 1, 'bad'],
        packets_per_second: 44,
      });
      const status = await client.getStatus();
      expect(status).toEqual({
        status: 'running',
        version: '1.4.0',
        uptimeSeconds: 3600,
        deviceCount: 4,
        onlineDevices: 3,
        universes: [0, 1],
        packetsPerSecond: 44,
        queueDepth: undefined,
      });
    });
  });

  describe('getDevices', () => {
    it('accepts a bare array and skips malformed items', async () => {
      const { client } = makeClient([
        { id: 'AA:BB', name: 'Stage left', ip: '10.0.0.5', online: true, universe: 1, channel: 17 },
        { name: 'no id' },
        { id: 7 },
      ]);
      const devices = await client.getDevices();
      expect(devices).toHaveLength(2);
      expect(devices[0]).toEqual({
        id: 'AA:BB', name: 'Stage left', ip: '10.0.0.5', model: null,
        online: true, universe: 1, channel: 17,
      });
      expect(devices[1].id).toBe('7');
      expect(devices[1].online).toBe(false);
    });

    it('accepts an object with a devices field', async () => {
      const { client } = makeClient({ devices: [{ id: 'x' }] });
      const devices = await client.getDevices();
      expect(devices.map(d => d.id)).toEqual(['x']);
    });
  });

  describe('getLogs', () => {
    it('translates the page into offset and limit', async () => {
      const { client, fetchFn } = makeClient({ logs: [], total: 0 });
      await client.getLogs({ page: 2, pageSize: 50, level: 'ERROR', logger: null, search: 'dmx' });
      const url = requestedUrl(fetchFn);
      expect(url.pathname).toBe('/logs');
      expect(url.searchParams.get('offset')).toBe('100');
      expect(url.searchParams.get('limit')).toBe('50');
      expect(url.searchParams.get('level')).toBe('ERROR');
      expect(url.searchParams.has('logger')).toBe(false);
      expect(url.searchParams.get('search')).toBe('dmx');
    });

    it('computes page bounds from the total', async () => {
      const { client } = makeClient({
        logs: [{ timestamp: '2026-03-01T10:00:00Z', level: 'warn', logger: 'artnet', message: 'late frame' }],
        total: 120,
      });
      const page = await client.getLogs({ page: 1, pageSize: 50 });
      expect(page.totalPages).toBe(3);
      expect(page.hasPrev).toBe(true);
      expect(page.hasNext).toBe(true);
      expect(page.entries[0].level).toBe('WARNING');
    });

    it('reports a single empty page when there are no logs', async () => {
      const { client } = makeClient({ logs: [], total: 0 });
      const page = await client.getLogs({ page: 0, pageSize: 50 });
      expect(page.totalPages).toBe(1);
      expect(page.hasNext).toBe(false);
      expect(page.hasPrev).toBe(false);
    });
  });

  describe('tailLogs', () => {
    it('passes the cursor and returns the new one', async () => {
      const { client, fetchFn } = makeClient({
        logs: [{ timestamp: 't', level: 'INFO', logger: 'api', message: 'hello' }],
        cursor: 'c-2',
      });
      const batch = await client.tailLogs({ since: 'c-1', level: 'INFO' });
      const url = requestedUrl(fetchFn);
      expect(url.pathname).toBe('/logs/tail');
      expect(url.searchParams.get('since')).toBe('c-1');
      expect(batch.cursor).toBe('c-2');
      expect(batch.entries).toHaveLength(1);
    });

    it('keeps the previous cursor when the server sends none', async () => {
      const { client } = makeClient({ logs: [] });
      const batch = await client.tailLogs({ since: 'c-9' });
      expect(batch.cursor).toBe('c-9');
    });
  });

  describe('errors', () => {
    it('throws ApiError with status and detail text', async () => {
      const { client } = makeClient({ detail: 'Invalid API key' }, 401);
      const err = await client.getStatus().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ status: 401, message: 'Invalid API key' });
    });

    it('falls back to the HTTP status when the body is not JSON', async () => {
      const fetchFn = vi.fn<typeof fetch>().mockResolvedValue(new Response('oops', { status: 502 }));
      const client = new BridgeClient(ENDPOINT, { fetchFn });
      await expect(client.getStatus()).rejects.toThrow('HTTP 502');
    });

    it('rejects when the caller aborts', async () => {
      const fetchFn = vi.fn<typeof fetch>((_input, init) => new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
      }));
      const client = new BridgeClient(ENDPOINT, { fetchFn });
      const controller = new AbortController();
      const pending = client.getStatus(controller.signal);
      controller.abort(new Error('cancelled'));
      await expect(pending).rejects.toThrow('cancelled');
    });
  });
});
