import http from 'node:http';

export type RouteHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export type TestServer = {
  origin: string;
  hits: Map<string, number>;
  close(): Promise<void>;
};

/**
 * In-process HTTP server on the loopback interface. Requests are counted per
 * path; unknown paths answer 404.
 */
export async function startServer(routes: Record<string, RouteHandler>): Promise<TestServer> {
  const hits = new Map<string, number>();
  const server = http.createServer((req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    hits.set(pathname, (hits.get(pathname) ?? 0) + 1);
    const handler = routes[pathname];
    if (handler) {
      handler(req, res);
    } else {
      res.writeHead(404, { 'content-type': 'text/plain' });
      res.end('not found');
    }
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('test server has no port');

  return {
    origin: `http://127.0.0.1:${address.port}`,
    hits,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
}

export function send(status: number, contentType: string, body: string): RouteHandler {
  return (_req, res) => {
    res.writeHead(status, { 'content-type': contentType });
    res.end(body);
  };
}

/** Writes `parts` one every `intervalMs`, then ends the response. */
export function trickle(contentType: string, parts: string[], intervalMs: number): RouteHandler {
  return (_req, res) => {
    res.writeHead(200, { 'content-type': contentType });
    let next = 0;
    const timer = setInterval(() => {
      res.write(parts[next++]);
      if (next === parts.length) {
        clearInterval(timer);
        res.end();
      }
    }, intervalMs);
    res.on('close', () => clearInterval(timer));
  };
}

/**
 * The first `stalls` requests get the headers and the first bytes of `body`,
 * then nothing more. Later requests get the whole body.
 */
export function stallFirst(stalls: number, contentType: string, body: string): RouteHandler {
  let calls = 0;
  return (_req, res) => {
    calls++;
    res.writeHead(200, { 'content-type': contentType });
    if (calls <= stalls) {
      res.write(body.slice(0, 3));
      return;
    }
    res.end(body);
  };
}
