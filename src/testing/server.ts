import http from 'node:http';

export type Route = {
  status?: number;
  body?: string | Uint8Array;
  contentType?: string;
  delayMs?: number;
};

export type TestServer = {
  url: string; // origin, no trailing slash
  hits: Map<string, number>;
  close(): Promise<void>;
};

/** Loopback HTTP server answering from a fixed route table; unknown paths get 404. */
export async function startServer(routes: Record<string, Route>): Promise<TestServer> {
  const hits = new Map<string, number>();
  const timers = new Set<NodeJS.Timeout>();

  const server = http.createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    hits.set(pathname, (hits.get(pathname) ?? 0) + 1);
    const route = routes[pathname];

    const send = () => {
      if (!route) {
        res.writeHead(404, { 'content-type': 'text/plain' });
        res.end('not found');
        return;
      }
      res.writeHead(route.status ?? 200, { 'content-type': route.contentType ?? 'text/html' });
      res.end(route.body ?? '');
    };

    if (route?.delayMs) {
      const t = setTimeout(() => {
        timers.delete(t);
        send();
      }, route.delayMs);
      timers.add(t);
    } else {
      send();
    }
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('test server has no port');

  return {
    url: `http://127.0.0.1:${addr.port}`,
    hits,
    close: async () => {
      for (const t of timers) clearTimeout(t);
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  };
}
