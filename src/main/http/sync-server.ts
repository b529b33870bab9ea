import http, { IncomingMessage, ServerResponse } from 'node:http';
import type { Readable } from 'node:stream';
import { ValidationError } from '../../shared/errors';
import { routeSyncRequest, type SyncResponse, type SyncRouteDeps } from './sync-routes';

interface SyncServerOptions {
  host?: string;
  port?: number;
}

const MAX_BODY_BYTES = 2 * 1024 * 1024;

export function createSyncServer(deps: SyncRouteDeps, options: SyncServerOptions = {}): http.Server {
  const host = options.host || '127.0.0.1';
  const port = options.port ?? 8080;

  const server = http.createServer((req, res) => {
    handleRequest(req, deps)
      .then((response) => sendJson(res, response.status, response.payload))
      .catch((error: unknown) => {
        const status = error instanceof ValidationError ? 400 : 500;
        const message = error instanceof Error ? error.message : 'Internal server error';
        if (status === 500) deps.logger.error('unhandled request error', { error: message });
        sendJson(res, status, { ok: false, error: message });
      });
  });

  server.listen(port, host, () => {
    deps.logger.info(`listening on http://${host}:${port}`);
  });

  server.on('error', (error) => {
    deps.logger.error('failed to start', { error: error.message });
  });

  return server;
}

async function handleRequest(req: IncomingMessage, deps: SyncRouteDeps): Promise<SyncResponse> {
  const url = new URL(req.url || '/', 'http://localhost');
  const method = (req.method || 'GET').toUpperCase();
  const body = method === 'POST' ? await readJsonBody(req) : undefined;

  return routeSyncRequest(deps, {
    method,
    path: url.pathname,
    query: url.searchParams,
    body,
    authorization: req.headers.authorization,
  });
}

export function readJsonBody(req: Readable, maxBytes = MAX_BODY_BYTES): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      received += buffer.length;
      if (received > maxBytes) {
        reject(new ValidationError('Payload too large'));
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      const data = Buffer.concat(chunks).toString('utf8');
      if (!data) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(data));
      } catch {
        reject(new ValidationError('Invalid JSON'));
      }
    });

    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(body);
}
