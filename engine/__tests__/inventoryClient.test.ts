import type { InventoryServiceConfig } from '../config';
import { AssignError, FetchError } from '../errors';
import {
  buildInventorySnapshot,
  createRestInventoryClient,
  parseSites,
  type FetchLike
} from '../inventoryClient';

const config: InventoryServiceConfig = {
  apiToken: 'test-secret',
  orgId: 'org-1',
  baseUrl: 'https://inventory.test',
  requestTimeoutMs: 1000
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

function mockFetch(impl: () => Promise<Response>): jest.Mock<Promise<Response>, Parameters<FetchLike>> {
  return jest.fn<Promise<Response>, Parameters<FetchLike>>(impl);
}

describe('buildInventorySnapshot', () => {
  it('keys by trimmed serial and drops entries without one', () => {
    const snapshot = buildInventorySnapshot([
      { serial: ' SN-1 ', mac: 'aa:bb:cc:dd:ee:01', model: 'AP43', site_id: null },
      { serial: '', mac: 'aa:bb:cc:dd:ee:02' },
      { mac: 'aa:bb:cc:dd:ee:03' },
      'garbage',
      { serial: 'sn-1', mac: '' }
    ]);

    expect([...snapshot.keys()]).toEqual(['SN-1', 'sn-1']);
    expect(snapshot.get('SN-1')).toEqual({
      serial: 'SN-1',
      mac: 'aa:bb:cc:dd:ee:01',
      model: 'AP43',
      name: undefined,
      site_id: null
    });
  });
});

describe('parseSites', () => {
  it('sorts by name, case-insensitively, and skips entries without an id', () => {
    const sites = parseSites([
      { id: 's2', name: 'warehouse' },
      { id: 's1', name: 'HQ' },
      { name: 'orphan' },
      { id: 's3', name: 'Annex' }
    ]);

    expect(sites).toEqual([
      { id: 's3', name: 'Annex' },
      { id: 's1', name: 'HQ' },
      { id: 's2', name: 'warehouse' }
    ]);
  });
});

describe('createRestInventoryClient', () => {
  it('fetches the org inventory with token auth', async () => {
    const fetchImpl = mockFetch(async () => jsonResponse([{ serial: 'SN-1', mac: 'aa:bb:cc:dd:ee:01' }]));
    const client = createRestInventoryClient(config, fetchImpl);

    const snapshot = await client.fetchInventory();

    expect(snapshot.has('SN-1')).toBe(true);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://inventory.test/api/v1/orgs/org-1/inventory');
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Authorization: 'Token test-secret',
      'Content-Type': 'application/json'
    });
  });

  it('raises FetchError with the status on a non-ok inventory response', async () => {
    const client = createRestInventoryClient(
      config,
      mockFetch(async () => new Response('forbidden', { status: 403 }))
    );

    const error = await client.fetchInventory().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      code: 'E301',
      status: 403,
      message: 'Failed to fetch inventory (HTTP 403): forbidden'
    });
  });

  it('raises FetchError when the network call itself fails', async () => {
    const client = createRestInventoryClient(
      config,
      mockFetch(async () => {
        throw new Error('ECONNREFUSED');
      })
    );

    await expect(client.fetchSites()).rejects.toMatchObject({
      code: 'E302',
      status: null,
      message: 'Failed to fetch sites: ECONNREFUSED'
    });
  });

  it('rejects a body that is not an array', async () => {
    const client = createRestInventoryClient(config, mockFetch(async () => jsonResponse({ items: [] })));

    await expect(client.fetchInventory()).rejects.toThrow('Failed to fetch inventory: expected a JSON array');
  });

  it('sends one MAC per assign call', async () => {
    const fetchImpl = mockFetch(async () => jsonResponse({}));
    const client = createRestInventoryClient(config, fetchImpl);

    await expect(client.assign('site-1', 'aa:bb:cc:dd:ee:01')).resolves.toEqual({ ok: true });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://inventory.test/api/v1/orgs/org-1/inventory');
    expect(init?.method).toBe('PUT');
    expect(init?.body).toBe('{"op":"assign","site_id":"site-1","macs":["aa:bb:cc:dd:ee:01"]}');
  });

  it('drains the body of a successful assign response', async () => {
    const response = jsonResponse({ updated: ['aa:bb:cc:dd:ee:01'] });
    const client = createRestInventoryClient(config, mockFetch(async () => response));

    await client.assign('site-1', 'aa:bb:cc:dd:ee:01');

    expect(response.bodyUsed).toBe(true);
  });

  it('returns the status and body text when the service rejects an assign', async () => {
    const client = createRestInventoryClient(
      config,
      mockFetch(async () => new Response('device locked', { status: 409 }))
    );

    await expect(client.assign('site-1', 'aa:bb:cc:dd:ee:01')).resolves.toEqual({
      ok: false,
      status: 409,
      message: 'Assign failed (HTTP 409): device locked'
    });
  });

  it('throws AssignError when the assign request never completes', async () => {
    const client = createRestInventoryClient(
      config,
      mockFetch(async () => {
        throw new Error('socket hang up');
      })
    );

    const error = await client.assign('site-1', 'aa:bb:cc:dd:ee:01').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AssignError);
    expect(error).toMatchObject({ code: 'E502', message: 'Assign request failed: socket hang up' });
  });
});
