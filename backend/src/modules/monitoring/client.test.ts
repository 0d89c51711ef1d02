import { describe, it, expect, vi, afterEach } from 'vitest';
import { JsonRpcMonitoringClient } from './client.js';
import { UpstreamError } from '../../types/errors.js';

function rpcFetch(result: unknown, status = 200) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> =>
    new Response(JSON.stringify(result), { status }));
}

function sentBody(mock: ReturnType<typeof rpcFetch>, call = 0): unknown {
  return JSON.parse(String(mock.mock.calls[call][1]?.body));
}

const client = () => new JsonRpcMonitoringClient({ url: 'http://monitoring.test/api_jsonrpc.php', token: 'test-token', timeoutMs: 1000 });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('JsonRpcMonitoringClient', () => {
  it('lists connection items with their host', async () => {
    const fetchMock = rpcFetch({
      jsonrpc: '2.0',
      id: 1,
      result: [
        { itemid: '101', name: 'linux-network-connections', hosts: [{ host: 'web1' }] },
        { itemid: '102', name: 'linux-network-connections', hosts: [] },
      ],
    });
    vi.stubGlobal('fetch', fetchMock);

    expect(await client().getConnectionItems(['linux-network-connections'])).toEqual([
      { item_id: '101', host: 'web1', name: 'linux-network-connections' },
    ]);
    expect(sentBody(fetchMock)).toEqual({
      jsonrpc: '2.0',
      method: 'item.get',
      params: { output: ['itemid', 'name'], filter: { name: ['linux-network-connections'] }, selectHosts: ['host'] },
      id: 1,
    });
    expect(new Headers(fetchMock.mock.calls[0][1]?.headers).get('Authorization')).toBe('Bearer test-token');
  });

  it('flattens host interfaces', async () => {
    vi.stubGlobal('fetch', rpcFetch({
      jsonrpc: '2.0',
      id: 1,
      result: [{ host: 'db1', interfaces: [{ ip: '10.0.0.20' }, { ip: '192.168.0.20' }] }, { interfaces: [{ ip: '1.1.1.1' }] }],
    }));
    expect(await client().getHostInterfaces()).toEqual([
      { host: 'db1', ip: '10.0.0.20' },
      { host: 'db1', ip: '192.168.0.20' },
    ]);
  });

  it('asks for text history over a half-open range', async () => {
    const fetchMock = rpcFetch({
      jsonrpc: '2.0',
      id: 1,
      result: [{ clock: '1714528800', value: '{}' }, { clock: 'bad', value: '{}' }],
    });
    vi.stubGlobal('fetch', fetchMock);

    expect(await client().getHistory('101', 1714521600, 1714608000)).toEqual([
      { item_id: '101', timestamp: 1714528800, value: '{}' },
    ]);
    expect(sentBody(fetchMock)).toMatchObject({
      method: 'history.get',
      params: { history: 4, itemids: ['101'], time_from: 1714521600, time_till: 1714607999 },
    });
  });

  it('raises UpstreamError for RPC and HTTP errors', async () => {
    vi.stubGlobal('fetch', rpcFetch({ jsonrpc: '2.0', id: 1, error: { code: -32602, message: 'Invalid params' } }));
    await expect(client().getHostInterfaces()).rejects.toThrow(
      'monitoring: host.get: {"code":-32602,"message":"Invalid params"}',
    );

    vi.stubGlobal('fetch', rpcFetch('oops', 500));
    await expect(client().getHostInterfaces()).rejects.toBeInstanceOf(UpstreamError);
  });

  it('raises UpstreamError for a body that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn(async (): Promise<Response> => new Response('<html>maintenance</html>', { status: 200 })));
    const err: unknown = await client().getHostInterfaces().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toHaveProperty('message', 'monitoring: host.get: malformed response');
    expect(err).toMatchObject({ cause: expect.any(SyntaxError) });
  });
});
