import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { errorResponse, json } from './json.js';

export type Handler = (req: Request) => Promise<Response>;

export interface ServeOptions {
  port: number;
  hostname?: string;
  /** Component tag used in log lines */
  name: string;
  /** Larger request bodies are answered with 413; defaults to 10 MiB */
  maxBodyBytes?: number;
  onListen?: (address: { hostname: string; port: number }) => void;
}

const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

/**
 * Collect the body up to `limit` bytes. Past the limit the rest is read and
 * dropped so the connection can still carry the 413.
 */
function readRequestBody(req: IncomingMessage, limit: number): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer | string) => {
      const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      size += bytes.length;
      if (size > limit) {
        chunks.length = 0;
        return;
      }
      chunks.push(bytes);
    });
    req.on('end', () => {
      if (size > limit) reject(new BodyTooLargeError(limit));
      else resolve(new Uint8Array(Buffer.concat(chunks)));
    });
    req.on('error', reject);
  });
}

async function toRequest(req: IncomingMessage, origin: string, maxBodyBytes: number): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }

  const method = req.method ?? 'GET';
  const body = method === 'GET' || method === 'HEAD' ? undefined : await readRequestBody(req, maxBodyBytes);

  return new Request(new URL(req.url ?? '/', origin), { method, headers, body });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(response.status, headers);
  res.end(Buffer.from(await response.arrayBuffer()));
}

/**
 * Host a fetch-style handler on node:http. Handlers are plain
 * `(Request) => Promise<Response>` functions so tests can call them directly.
 */
export function serve(handler: Handler, options: ServeOptions): Server {
  const hostname = options.hostname ?? '0.0.0.0';
  const origin = `http://${hostname}:${options.port}`;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  const server = createServer((req, res) => {
    toRequest(req, origin, maxBodyBytes)
      .then(handler)
      .catch((err: unknown) => {
        if (err instanceof BodyTooLargeError) {
          console.warn(`[${options.name}] Rejected ${req.method} ${req.url}: ${err.message}`);
          return errorResponse({ kind: 'ProtocolError', message: err.message }, 413);
        }
        console.error(`[${options.name}] Unhandled error:`, err);
        return json({ status: 'error', message: err instanceof Error ? err.message : 'Internal server error' }, 500);
      })
      .then((response) => writeResponse(res, response))
      .catch((err: unknown) => {
        console.error(`[${options.name}] Failed to write response:`, err);
        res.destroy();
      });
  });

  server.listen(options.port, hostname, () => {
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : options.port;
    console.log(`[${options.name}] Listening on http://${hostname}:${port}`);
    options.onListen?.({ hostname, port });
  });

  return server;
}
