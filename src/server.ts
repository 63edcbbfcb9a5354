import * as crypto from 'crypto';
import http from 'http';
import os from 'os';

import { OutboundMessage, UiState } from './ui/presenter';
import { renderPage } from './ui/page';
import { Logger } from './util/logger';

export const MAX_BODY_BYTES = 64 * 1024;
export const TOKEN_HEADER = 'x-shellwright-token';

export interface MessageHandler {
  snapshot(): UiState;
  handleMessage(raw: unknown): Promise<OutboundMessage[]>;
}

export interface RequestHeaders {
  host?: string;
  origin?: string;
  contentType?: string;
  token?: string;
}

export interface RouteRequest {
  method: string;
  path: string;
  body: string;
  headers: RequestHeaders;
}

export interface RouteResponse {
  status: number;
  contentType: string;
  body: string;
}

/**
 * Per-launch request guard. Only pages served by this process know the token,
 * and only Host headers naming the bound address are answered.
 */
export interface RequestGuard {
  token: string;
  allowedHosts: ReadonlySet<string>;
}

export interface ServerInstance {
  port: number;
  url: string;
  token: string;
  cleanup: () => Promise<void>;
}

export interface ServerOptions {
  host: string;
  port: number;
  presenter: MessageHandler;
  logger: Logger;
  token?: string;
}

class PayloadTooLarge extends Error {}

function json(status: number, value: unknown): RouteResponse {
  return { status, contentType: 'application/json; charset=utf-8', body: JSON.stringify(value) };
}

function mediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

function sameToken(expected: string, given: string | undefined): boolean {
  if (given === undefined) {
    return false;
  }
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export async function routeRequest(
  presenter: MessageHandler,
  request: RouteRequest,
  guard: RequestGuard
): Promise<RouteResponse> {
  const { method, path, headers } = request;
  const host = (headers.host ?? '').toLowerCase();
  if (!guard.allowedHosts.has(host)) {
    return json(403, { error: 'Unknown host' });
  }
  if (method === 'GET' && path === '/') {
    return {
      status: 200,
      contentType: 'text/html; charset=utf-8',
      body: renderPage(presenter.snapshot(), guard.token),
    };
  }
  if (method === 'GET' && path === '/api/state') {
    return json(200, presenter.snapshot());
  }
  if (path === '/api/message') {
    if (method !== 'POST') {
      return json(405, { error: 'Method not allowed' });
    }
    if (mediaType(headers.contentType) !== 'application/json') {
      return json(415, { error: 'Content-Type must be application/json' });
    }
    if (headers.origin !== undefined && headers.origin.toLowerCase() !== `http://${host}`) {
      return json(403, { error: 'Cross-origin request refused' });
    }
    if (!sameToken(guard.token, headers.token)) {
      return json(403, { error: 'Missing or invalid session token' });
    }
    let payload: unknown;
    try {
      payload = JSON.parse(request.body);
    } catch {
      return json(400, { error: 'Body is not valid JSON' });
    }
    return json(200, await presenter.handleMessage(payload));
  }
  return json(404, { error: 'Not found' });
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function formatHost(address: string, port: number): string {
  return address.includes(':') ? `[${address}]:${port}` : `${address}:${port}`;
}

/** Host headers a browser sends when it reaches this server by a local name or bound address. */
export function allowedHostsFor(host: string, port: number): Set<string> {
  const names = new Set(['localhost', '127.0.0.1', '::1', host.toLowerCase()]);
  if (host === '0.0.0.0' || host === '::') {
    for (const entries of Object.values(os.networkInterfaces())) {
      for (const entry of entries ?? []) {
        names.add(entry.address.toLowerCase());
      }
    }
  }
  return new Set([...names].map((name) => formatHost(name, port)));
}

function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        // keep draining so the 413 can still be written
        reject(new PayloadTooLarge(`Body exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (size <= limit) {
        resolve(Buffer.concat(chunks).toString('utf8'));
      }
    });
    req.on('error', reject);
  });
}

/**
 * Serves the UI on host:port. Port 0 picks a free port; the bound one is returned.
 */
export async function startServer(options: ServerOptions): Promise<ServerInstance> {
  const { presenter, logger } = options;
  const token = options.token ?? crypto.randomUUID();
  let guard: RequestGuard = { token, allowedHosts: new Set() };

  const server = http.createServer((req, res) => {
    const started = Date.now();
    const method = req.method ?? 'GET';
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    const headers: RequestHeaders = {
      host: req.headers.host,
      origin: req.headers.origin,
      contentType: req.headers['content-type'],
      token: headerValue(req.headers[TOKEN_HEADER]),
    };

    const send = (response: RouteResponse): void => {
      res.writeHead(response.status, {
        'Content-Type': response.contentType,
        'Cache-Control': 'no-store',
        'X-Content-Type-Options': 'nosniff',
      });
      res.end(response.body);
      logger.debug(`[HTTP] ${method} ${path} ${response.status} ${Date.now() - started}ms`);
    };

    readBody(req, MAX_BODY_BYTES)
      .then((body) => routeRequest(presenter, { method, path, body, headers }, guard))
      .then(send)
      .catch((err: unknown) => {
        if (err instanceof PayloadTooLarge) {
          send(json(413, { error: 'Request body too large' }));
          return;
        }
        logger.error(`request failed: ${method} ${path}`, err);
        send(json(500, { error: 'Internal error' }));
      });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : options.port;
  guard = { token, allowedHosts: allowedHostsFor(options.host, port) };
  const displayHost = options.host === '0.0.0.0' || options.host === '::' ? 'localhost' : options.host;
  const url = `http://${formatHost(displayHost, port)}`;
  logger.info(`server listening on ${url}`);

  return {
    port,
    url,
    token,
    cleanup: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}
