import { describe, it, expect, afterEach } from 'vitest';
import { FailureKind } from '../../types/errors.js';
import { ArtifactSet } from '../artifact-set.js';
import { StaticSiteServer, contentTypeFor, routeStatic, siteFiles } from './static-server.js';

function site(): ArtifactSet {
  return ArtifactSet.fromEntries(
    Object.entries({
      'usr/share/nginx/html/index.html': '<h1>home</h1>',
      'usr/share/nginx/html/assets/app.js': 'console.log(1);',
      'usr/share/nginx/html/docs/index.html': '<h1>docs</h1>',
      'usr/share/nginx/html-old/index.html': 'stale',
      'etc/nginx/nginx.conf': 'worker_processes 1;',
    }).map(([path, content]) => [path, Buffer.from(content)] as const),
  );
}

const ROOT = '/usr/share/nginx/html';

function text(body: Uint8Array): string {
  return Buffer.from(body).toString('utf-8');
}

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

describe('siteFiles', () => {
  it('maps files below the document root to URL paths', () => {
    expect([...siteFiles(site(), ROOT).keys()]).toEqual(['/assets/app.js', '/docs/index.html', '/index.html']);
  });

  it('serves the whole set from a root of /', () => {
    expect(siteFiles(site(), '/').has('/etc/nginx/nginx.conf')).toBe(true);
  });

  it('accepts a document root with a trailing slash', () => {
    expect(siteFiles(site(), `${ROOT}/`).size).toBe(3);
  });
});

describe('routeStatic', () => {
  const files = siteFiles(site(), ROOT);

  it('serves index.html for /', () => {
    const res = routeStatic(files, 'GET', '/');
    expect(res.status).toBe(200);
    expect(res.headers['Content-Type']).toBe('text/html; charset=utf-8');
    expect(text(res.body)).toBe('<h1>home</h1>');
  });

  it('serves a directory index without a trailing slash', () => {
    expect(text(routeStatic(files, 'GET', '/docs').body)).toBe('<h1>docs</h1>');
    expect(text(routeStatic(files, 'GET', '/docs/').body)).toBe('<h1>docs</h1>');
  });

  it('ignores the query string', () => {
    const res = routeStatic(files, 'GET', '/assets/app.js?v=3');
    expect(res.status).toBe(200);
    expect(res.headers['Content-Type']).toBe('text/javascript; charset=utf-8');
  });

  it('answers HEAD with headers and an empty body', () => {
    const res = routeStatic(files, 'HEAD', '/index.html');
    expect(res.status).toBe(200);
    expect(res.headers['Content-Length']).toBe('13');
    expect(res.body.byteLength).toBe(0);
  });

  it('returns 404 for unknown paths', () => {
    const res = routeStatic(files, 'GET', '/nope.html');
    expect(res.status).toBe(404);
    expect(text(res.body)).toBe('Not Found\n');
  });

  it('returns 405 with Allow for other methods', () => {
    const res = routeStatic(files, 'POST', '/');
    expect(res.status).toBe(405);
    expect(res.headers.Allow).toBe('GET, HEAD');
  });

  it('returns 400 for a malformed escape', () => {
    expect(routeStatic(files, 'GET', '/%E0%A4%A').status).toBe(400);
  });
});

describe('contentTypeFor', () => {
  it('knows common web types', () => {
    expect(contentTypeFor('/main.dart.js')).toBe('text/javascript; charset=utf-8');
    expect(contentTypeFor('/canvaskit.WASM')).toBe('application/wasm');
  });

  it('falls back to octet-stream', () => {
    expect(contentTypeFor('/app.bin')).toBe('application/octet-stream');
  });
});

// ---------------------------------------------------------------------------
// StaticSiteServer
// ---------------------------------------------------------------------------

describe('StaticSiteServer', () => {
  const servers: StaticSiteServer[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((s) => s.close(50)));
  });

  function server(ports: number[]): StaticSiteServer {
    const s = new StaticSiteServer({ artifacts: site(), documentRoot: ROOT, host: '127.0.0.1', ports });
    servers.push(s);
    return s;
  }

  it('serves files over HTTP on every bound port', async () => {
    const s = server([0, 0]);
    const ports = await s.listen();
    expect(ports).toHaveLength(2);
    expect(s.listening).toBe(true);

    for (const port of ports) {
      const res = await fetch(`http://127.0.0.1:${port}/`);
      expect(res.status).toBe(200);
      expect(await res.text()).toBe('<h1>home</h1>');
    }

    const missing = await fetch(`http://127.0.0.1:${ports[0]}/missing`);
    expect(missing.status).toBe(404);
    await missing.text();
  });

  it('stops listening after close', async () => {
    const s = server([0]);
    await s.listen();
    await s.close(50);
    expect(s.listening).toBe(false);
  });

  it('fails with LaunchFailure when a port is taken and releases the ports it bound', async () => {
    const first = server([0]);
    const [taken] = await first.listen();

    const second = server([0, taken]);
    await expect(second.listen()).rejects.toMatchObject({ kind: FailureKind.LaunchFailure });
    await expect(second.listen()).rejects.toThrow(`Cannot bind 127.0.0.1:${taken}`);
    expect(second.listening).toBe(false);
  });
});
