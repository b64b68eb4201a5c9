import { once } from 'node:events';
import type { Express } from 'express';

export interface JsonResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

export interface TestClient {
  get(path: string): Promise<JsonResponse>;
  post(path: string, body?: unknown): Promise<JsonResponse>;
  request(path: string, init: RequestInit): Promise<JsonResponse>;
}

/**
 * Serve an Express app on an ephemeral loopback port for the duration of `run`.
 */
export async function withServer<T>(app: Express, run: (client: TestClient) => Promise<T>): Promise<T> {
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error('Test server did not bind to a TCP port');
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  const request = async (path: string, init: RequestInit): Promise<JsonResponse> => {
    const response = await fetch(`${baseUrl}${path}`, init);
    const text = await response.text();
    return {
      status: response.status,
      headers: response.headers,
      body: text.length > 0 ? JSON.parse(text) : null,
    };
  };

  const client: TestClient = {
    get: (path) => request(path, { method: 'GET' }),
    post: (path, body) =>
      request(path, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      }),
    request,
  };

  try {
    return await run(client);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
