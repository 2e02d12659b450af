/**
 * Static document server for the `static` launch variant.
 *
 * Serves the files of an ArtifactSet below a document root straight from
 * memory. `GET` and `HEAD` only; a directory path serves its
 * `index.html`; anything else is 404.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { posix } from 'node:path';
import { FailureKind } from '../../types/errors.js';
import { normalizeContainerPath } from '../../types/pipeline.js';
import type { ArtifactSet } from '../artifact-set.js';
import { toContainerPath } from '../artifact-set.js';
import { createLogger, type Logger } from '../logger.js';
import { PipelineError, errorMessage } from '../pipeline-error.js';
import { TimeoutError, withTimeout } from '../timing.js';

// ---------------------------------------------------------------------------
// Content types
// ---------------------------------------------------------------------------

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.json': 'application/json',
  '.map': 'application/json',
  '.txt': 'text/plain; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.ico': 'image/x-icon',
  '.webp': 'image/webp',
  '.wasm': 'application/wasm',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
  '.otf': 'font/otf',
};

export function contentTypeFor(path: string): string {
  return CONTENT_TYPES[posix.extname(path).toLowerCase()] ?? 'application/octet-stream';
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export interface StaticResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

function textResponse(status: number, message: string, headers?: Record<string, string>): StaticResponse {
  const body = Buffer.from(`${message}\n`);
  return {
    status,
    headers: { 'Content-Type': 'text/plain; charset=utf-8', 'Content-Length': String(body.byteLength), ...headers },
    body,
  };
}

/** Files below `documentRoot`, keyed by URL path (`/index.html`). */
export function siteFiles(artifacts: ArtifactSet, documentRoot: string): Map<string, Uint8Array> {
  const root = normalizeContainerPath(documentRoot);
  const files = new Map<string, Uint8Array>();
  for (const [relPath, bytes] of artifacts.under(root)) {
    const containerPath = toContainerPath(relPath);
    const urlPath = root === '/' ? containerPath : containerPath.slice(root.length);
    if (urlPath.startsWith('/')) {
      files.set(urlPath, bytes);
    }
  }
  return files;
}

/** Answer one request against the site's files. */
export function routeStatic(
  files: ReadonlyMap<string, Uint8Array>,
  method: string,
  rawUrl: string,
): StaticResponse {
  if (method !== 'GET' && method !== 'HEAD') {
    return textResponse(405, 'Method Not Allowed', { Allow: 'GET, HEAD' });
  }

  let path: string;
  try {
    path = decodeURIComponent(new URL(rawUrl, 'http://localhost').pathname);
  } catch {
    return textResponse(400, 'Bad Request');
  }
  path = posix.normalize(path);

  const candidates = path.endsWith('/')
    ? [`${path}index.html`]
    : [path, `${path}/index.html`];
  for (const candidate of candidates) {
    const body = files.get(candidate);
    if (body !== undefined) {
      return {
        status: 200,
        headers: { 'Content-Type': contentTypeFor(candidate), 'Content-Length': String(body.byteLength) },
        body: method === 'HEAD' ? new Uint8Array() : body,
      };
    }
  }
  return textResponse(404, 'Not Found');
}

// ---------------------------------------------------------------------------
// StaticSiteServer
// ---------------------------------------------------------------------------

export interface StaticSiteOptions {
  artifacts: ArtifactSet;
  documentRoot: string;
  host: string;
  /** Host ports to bind. 0 picks a free port. */
  ports: readonly number[];
  logger?: Logger;
}

export class StaticSiteServer {
  private readonly files: Map<string, Uint8Array>;
  private readonly host: string;
  private readonly ports: readonly number[];
  private readonly logger: Logger;
  private readonly servers: Server[] = [];

  constructor(options: StaticSiteOptions) {
    this.files = siteFiles(options.artifacts, options.documentRoot);
    this.host = options.host;
    this.ports = options.ports;
    this.logger = options.logger ?? createLogger('static-server');
  }

  /** Number of files being served. */
  get fileCount(): number {
    return this.files.size;
  }

  /** Whether every server is still accepting connections. */
  get listening(): boolean {
    return this.servers.length > 0 && this.servers.every((s) => s.listening);
  }

  /**
   * Bind every port. On failure, servers already bound are closed.
   *
   * @returns The bound ports, in declaration order.
   * @throws PipelineError (LaunchFailure) when a port cannot be bound.
   */
  async listen(): Promise<number[]> {
    const bound: number[] = [];
    for (const port of this.ports) {
      const server = createServer((req, res) => this.handle(req, res));
      try {
        bound.push(await this.bind(server, port));
      } catch (err) {
        await this.close(0);
        throw new PipelineError({
          kind: FailureKind.LaunchFailure,
          message: `Cannot bind ${this.host}:${port}: ${errorMessage(err)}`,
          cause: err,
        });
      }
      this.servers.push(server);
    }

    this.logger.info('static site listening', { ports: bound, files: this.files.size });
    return bound;
  }

  /**
   * Stop accepting connections, let in-flight requests finish for at most
   * `graceMs`, then drop whatever is still open.
   */
  async close(graceMs: number): Promise<void> {
    const servers = this.servers.splice(0);
    await Promise.all(servers.map((server) => this.closeServer(server, graceMs)));
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private bind(server: Server, port: number): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, this.host, () => {
        server.off('error', reject);
        const address = server.address();
        resolve(typeof address === 'object' && address !== null ? address.port : port);
      });
    });
  }

  private handle(req: IncomingMessage, res: ServerResponse): void {
    const method = req.method ?? 'GET';
    const response = routeStatic(this.files, method, req.url ?? '/');
    res.writeHead(response.status, response.headers);
    res.end(response.body);
    this.logger.debug('request', { method, url: req.url, status: response.status });
  }

  private async closeServer(server: Server, graceMs: number): Promise<void> {
    const closed = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    server.closeIdleConnections();

    try {
      await withTimeout(closed, graceMs, 'Static server drain');
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      this.logger.warn('drain timed out, closing open connections', { grace_ms: graceMs });
      server.closeAllConnections();
      await closed;
    }
  }
}
