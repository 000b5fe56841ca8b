import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { HttpShopDirectoryClient } from '@/services/shopDirectory';

interface StubRequest {
  ownerId: unknown;
  authorization: string | undefined;
}

/** In-process stand-in for the shop service; each test sets the reply. */
let reply: (res: express.Response) => void = (res) => res.json([]);
const received: StubRequest[] = [];
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const stub = express();
  stub.get('/api/shops/', (req, res) => {
    received.push({ ownerId: req.query.owner_id, authorization: req.headers.authorization });
    reply(res);
  });

  await new Promise<void>((resolve) => {
    server = stub.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('stub is not listening on a port');
  baseUrl = `http://127.0.0.1:${address.port}/api/shops/`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  received.length = 0;
});

const client = (timeoutMs = 1000) =>
  new HttpShopDirectoryClient({ shopService: { url: baseUrl, timeoutMs } });

describe('HttpShopDirectoryClient', () => {
  it('forwards the caller credential and owner id', async () => {
    reply = (res) => res.json([{ id: 3, name: 'Corner Shop', latitude: 6.9, longitude: 79.8 }]);

    await client().listOwnedShops('42', 'caller-token');

    expect(received).toEqual([{ ownerId: '42', authorization: 'Bearer caller-token' }]);
  });

  it('reads a bare list of shops in order', async () => {
    reply = (res) =>
      res.json([
        { id: 3, name: 'Corner Shop', latitude: 6.9, longitude: 79.8 },
        { id: 8, name: 'Second Shop', latitude: null, longitude: null },
      ]);

    expect(await client().listOwnedShops('42', 'caller-token')).toEqual({
      success: true,
      shops: [
        { id: 3, name: 'Corner Shop', latitude: 6.9, longitude: 79.8 },
        { id: 8, name: 'Second Shop', latitude: null, longitude: null },
      ],
    });
  });

  it('reads a paginated envelope and numeric strings', async () => {
    reply = (res) =>
      res.json({
        count: 1,
        next: null,
        previous: null,
        results: [{ id: '5', name: 'Harbour Shop', latitude: '6.9271', longitude: '79.8612' }],
      });

    expect(await client().listOwnedShops('42', 'caller-token')).toEqual({
      success: true,
      shops: [{ id: 5, name: 'Harbour Shop', latitude: 6.9271, longitude: 79.8612 }],
    });
  });

  it('treats missing coordinates as null', async () => {
    reply = (res) => res.json([{ id: 5, name: 'Harbour Shop' }]);

    const result = await client().listOwnedShops('42', 'caller-token');
    expect(result.success && result.shops[0]).toEqual({ id: 5, name: 'Harbour Shop', latitude: null, longitude: null });
  });

  it('reports an empty result as no shops found', async () => {
    reply = (res) => res.json({ results: [] });

    const result = await client().listOwnedShops('42', 'caller-token');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe('no_shops_found');
      expect(result.error.message).toBe('No shop found for this owner');
    }
  });

  it('reports a non-success status as unavailable', async () => {
    reply = (res) => res.status(500).json({ detail: 'boom' });

    const result = await client().listOwnedShops('42', 'caller-token');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.reason).toBe('directory_unavailable');
      expect(result.error.detail).toBe('status 500');
      expect(result.error.message).toBe('No shop found for this owner');
    }
  });

  it('reports a 201 as unavailable', async () => {
    reply = (res) => res.status(201).json([{ id: 1, name: 'Odd Shop' }]);

    const result = await client().listOwnedShops('42', 'caller-token');
    expect(result.success).toBe(false);
  });

  it('reports an unexpected body as unavailable', async () => {
    reply = (res) => res.json({ shops: [] });

    const result = await client().listOwnedShops('42', 'caller-token');
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.reason).toBe('directory_unavailable');
  });

  it.each([null, '', false, true, 'seven'])('rejects a record whose id is %j', async (id) => {
    reply = (res) => res.json([{ id, name: 'Ghost Shop' }]);

    const result = await client().listOwnedShops('42', 'caller-token');
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.reason).toBe('directory_unavailable');
  });

  it('accepts a numeric string id', async () => {
    reply = (res) => res.json([{ id: '12', name: 'String Shop' }]);

    expect(await client().listOwnedShops('42', 'caller-token')).toEqual({
      success: true,
      shops: [{ id: 12, name: 'String Shop', latitude: null, longitude: null }],
    });
  });

  it('gives up after the timeout', async () => {
    reply = (res) => {
      setTimeout(() => res.json([{ id: 1, name: 'Slow Shop' }]), 500);
    };

    const result = await client(50).listOwnedShops('42', 'caller-token');
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.reason).toBe('directory_unavailable');
  });

  it('reports a refused connection as unavailable', async () => {
    const closed = new HttpShopDirectoryClient({ shopService: { url: 'http://127.0.0.1:1/api/shops/', timeoutMs: 1000 } });

    const result = await closed.listOwnedShops('42', 'caller-token');
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.reason).toBe('directory_unavailable');
  });
});
