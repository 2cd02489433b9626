/**
 * In-process HTTP server for end-to-end tests. Listens on an ephemeral
 * 127.0.0.1 port and answers from a route table.
 */
import { createServer, type IncomingMessage, type Server } from 'node:http';

export interface TestRoute {
  status?: number;
  body?: unknown;
  delayMs?: number;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: IncomingMessage['headers'];
  body: string;
}

export interface TestServer {
  baseUrl: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

/** Routes are keyed by `METHOD /path`; unmatched requests get a 404. */
export async function startTestServer(routes: Record<string, TestRoute>): Promise<TestServer> {
  const requests: RecordedRequest[] = [];

  const server: Server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const url = req.url ?? '/';
      const method = req.method ?? 'GET';
      requests.push({ method, url, headers: req.headers, body: Buffer.concat(chunks).toString('utf8') });

      const route = routes[`${method} ${url.split('?')[0]}`];
      const respond = () => {
        if (!route) {
          res.writeHead(404, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ error: 'not found' }));
          return;
        }
        const body = typeof route.body === 'string' ? route.body : JSON.stringify(route.body ?? {});
        res.writeHead(route.status ?? 200, { 'Content-Type': 'application/json' });
        res.end(body);
      };

      if (route?.delayMs) {
        setTimeout(respond, route.delayMs);
      } else {
        respond();
      }
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
