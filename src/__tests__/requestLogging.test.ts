import { afterEach, describe, expect, it, vi } from 'vitest';
import { Builtins } from '../api/builtins/index.js';
import { RestApiHandler } from '../api/RestApiHandler.js';
import logger from '../logger.js';
import { FakeConnection } from '../test-utils/fakeConnection.js';
import { withServer } from '../test-utils/http.js';

function createHandler(conn: FakeConnection, basePath = '') {
  const handler = new RestApiHandler(conn, { basePath, corsOrigins: [] });
  new Builtins(handler);
  return handler;
}

describe('request logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    logger.level = 'info';
  });

  it('logs each registered endpoint at debug', () => {
    const debug = vi.spyOn(logger, 'debug').mockReturnValue(logger);

    createHandler(new FakeConnection(), '/api');

    expect(debug).toHaveBeenCalledTimes(7);
    expect(debug).toHaveBeenCalledWith('Registered endpoint', { path: '/api/send', methods: ['post'] });
  });

  it('logs completed requests at http', async () => {
    const http = vi.spyOn(logger, 'http').mockReturnValue(logger);
    const conn = new FakeConnection().receive('hello', 5);

    await withServer(createHandler(conn).app, async (client) => {
      expect((await client.get('/receive')).status).toBe(200);
    });

    await vi.waitFor(() => {
      expect(http).toHaveBeenCalledWith(
        'Request completed',
        expect.objectContaining({
          method: 'GET',
          path: '/receive',
          status: 200,
          durationMs: expect.any(Number),
        }),
      );
    });
  });

  it('logs a warning when the connection reports a failure', async () => {
    const warn = vi.spyOn(logger, 'warn').mockReturnValue(logger);
    const conn = new FakeConnection();
    conn.sendSucceeds = false;

    await withServer(createHandler(conn).app, async (client) => {
      expect((await client.post('/send', { data: 'x' })).status).toBe(502);
    });

    expect(warn).toHaveBeenCalledWith('Connection reported failure', {
      method: 'POST',
      path: '/send',
      status: 502,
      message: 'Failed to send',
    });
  });

  it('logs an error when a handler throws', async () => {
    const error = vi.spyOn(logger, 'error').mockReturnValue(logger);
    const conn = new FakeConnection();
    vi.spyOn(conn, 'receiveStr').mockRejectedValue(new Error('port closed'));

    await withServer(createHandler(conn).app, async (client) => {
      expect((await client.get('/receive')).status).toBe(500);
    });

    expect(error).toHaveBeenCalledWith(
      'API Error',
      expect.objectContaining({ method: 'GET', url: '/receive', error: 'port closed' }),
    );
  });

  it('does not warn on successful requests', async () => {
    const warn = vi.spyOn(logger, 'warn').mockReturnValue(logger);

    await withServer(createHandler(new FakeConnection()).app, async (client) => {
      expect((await client.post('/send', { data: 'x' })).status).toBe(200);
    });

    expect(warn).not.toHaveBeenCalled();
  });

  it('applies the configured log level', () => {
    new RestApiHandler(new FakeConnection(), { logLevel: 'debug' });

    expect(logger.level).toBe('debug');
  });
});
