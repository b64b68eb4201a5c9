import { describe, expect, it, vi } from 'vitest';
import { BUILTIN_ENDPOINTS, Builtins } from '../api/builtins/index.js';
import { ok } from '../api/resource.js';
import { RestApiHandler } from '../api/RestApiHandler.js';
import { AppError, EndpointExistsError } from '../errors.js';
import { FakeConnection } from '../test-utils/fakeConnection.js';
import { withServer } from '../test-utils/http.js';

describe('RestApiHandler', () => {
  it('registers every built-in endpoint in table order', () => {
    const handler = new RestApiHandler(new FakeConnection(), { basePath: '' });
    new Builtins(handler);

    expect(handler.listEndpoints()).toEqual(BUILTIN_ENDPOINTS.map(([path]) => path));
    expect(handler.listEndpoints()).toEqual([
      '/send',
      '/receive',
      '/receive/all',
      '/get',
      '/send/get_first',
      '/get/wait',
      '/send/get',
    ]);
  });

  it('refuses to register a path twice', () => {
    const handler = new RestApiHandler(new FakeConnection(), { basePath: '' });
    new Builtins(handler);

    expect(() => new Builtins(handler)).toThrow(EndpointExistsError);
    expect(() => handler.addEndpoint('/send', {})).toThrow('Endpoint "/send" is already registered');
  });

  it('passes the shared connection to custom resources', async () => {
    const conn = new FakeConnection().receive('a', 1).receive('b', 2);
    const handler = new RestApiHandler(conn, { basePath: '' });
    handler.addEndpoint('/history/size', {
      get: async (connection) => ok({ size: connection.history.length }),
    });

    await withServer(handler.app, async (client) => {
      const res = await client.get('/history/size');
      expect(res.body).toEqual({ message: 'OK', size: 2 });
    });
  });

  it('answers unsupported methods with 405 and an Allow header', async () => {
    const handler = new RestApiHandler(new FakeConnection(), { basePath: '' });
    new Builtins(handler);

    await withServer(handler.app, async (client) => {
      const res = await client.get('/send');

      expect(res.status).toBe(405);
      expect(res.headers.get('allow')).toBe('POST');
      expect(res.body).toEqual({ message: 'The method is not allowed for the requested URL.' });
    });
  });

  it('answers unknown paths with a JSON 404', async () => {
    const handler = new RestApiHandler(new FakeConnection(), { basePath: '' });
    new Builtins(handler);

    await withServer(handler.app, async (client) => {
      const res = await client.get('/list_ports');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: 'The requested URL was not found on the server.' });
    });
  });

  it('mounts endpoints under the base path', async () => {
    const handler = new RestApiHandler(new FakeConnection(), { basePath: '/api/' });
    new Builtins(handler);

    expect(handler.config.basePath).toBe('/api');

    await withServer(handler.app, async (client) => {
      expect((await client.get('/api/receive')).status).toBe(200);
      expect((await client.get('/receive')).status).toBe(404);
    });
  });

  it('turns a throwing connection into a JSON 500', async () => {
    const conn = new FakeConnection();
    vi.spyOn(conn, 'receiveStr').mockRejectedValue(new Error('port closed'));
    const handler = new RestApiHandler(conn, { basePath: '' });
    new Builtins(handler);

    await withServer(handler.app, async (client) => {
      const res = await client.get('/receive');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ message: 'Internal server error' });
    });
  });

  it('answers oversized bodies with a 413', async () => {
    const handler = new RestApiHandler(new FakeConnection(), { basePath: '', bodyLimit: '10b' });
    new Builtins(handler);

    await withServer(handler.app, async (client) => {
      const res = await client.post('/send', { data: 'a much longer payload than ten bytes' });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ message: 'Request entity too large' });
    });
  });

  it('adds CORS headers for configured origins only', async () => {
    const withCors = new RestApiHandler(new FakeConnection(), {
      basePath: '',
      corsOrigins: ['http://localhost:3001'],
    });
    new Builtins(withCors);

    await withServer(withCors.app, async (client) => {
      const res = await client.request('/receive', {
        method: 'GET',
        headers: { origin: 'http://localhost:3001' },
      });
      expect(res.headers.get('access-control-allow-origin')).toBe('http://localhost:3001');
    });

    const withoutCors = new RestApiHandler(new FakeConnection(), { basePath: '', corsOrigins: [] });
    new Builtins(withoutCors);

    await withServer(withoutCors.app, async (client) => {
      const res = await client.request('/receive', {
        method: 'GET',
        headers: { origin: 'http://localhost:3001' },
      });
      expect(res.headers.get('access-control-allow-origin')).toBeNull();
    });
  });

  it('rejects a base path without a leading slash', () => {
    expect(() => new RestApiHandler(new FakeConnection(), { basePath: 'api' })).toThrow(AppError);
  });

  it('rejects a body limit that is not a byte size', () => {
    expect(() => new RestApiHandler(new FakeConnection(), { bodyLimit: 'lots' })).toThrow(
      'Invalid configuration: bodyLimit: Body limit must be a byte size such as "100kb"',
    );
  });

  it('puts the message first in success bodies', async () => {
    expect(Object.keys(ok({ data: 'x', size: 1 }).body)).toEqual(['message', 'data', 'size']);

    const handler = new RestApiHandler(new FakeConnection(), { basePath: '' });
    handler.addEndpoint('/status', { get: async () => ok({ size: 2 }) });

    await withServer(handler.app, async (client) => {
      const res = await client.get('/status');
      expect(JSON.stringify(res.body)).toBe('{"message":"OK","size":2}');
    });
  });
});
