import express from 'express';

export interface TestResponse {
  status: number;
  headers: Headers;
  text: string;
  body: unknown;
}

/** Issue one GET against the app on an ephemeral port. */
export async function request(
  app: express.Application,
  path: string,
  headers?: Record<string, string>,
): Promise<TestResponse> {
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new Error('Expected a TCP address');
  }
  const { port } = address;

  try {
    const res = await fetch(`http://127.0.0.1:${port}${path}`, { headers });
    const text = await res.text();
    let body: unknown = undefined;
    if ((res.headers.get('content-type') ?? '').startsWith('application/json')) {
      body = JSON.parse(text);
    }
    return { status: res.status, headers: res.headers, text, body };
  } finally {
    server.closeAllConnections();
    server.close();
  }
}

export const JSON_ACCEPT = { Accept: 'application/json' };
