import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { downloadFile } from '../src/adapters/download';
import { makeTempDir } from './helpers';

/**
 * Local archive server:
 *   /hop/N    redirects to /hop/N-1, /hop/0 serves the archive
 *   /loop     redirects to itself
 *   /stall    sends half the body and never finishes
 *   anything else is a 404
 */
function handler(req: http.IncomingMessage, res: http.ServerResponse): void {
  const url = req.url ?? '/';
  const hop = /^\/hop\/(\d+)$/.exec(url);

  if (hop) {
    const remaining = Number(hop[1]);
    if (remaining === 0) {
      res.writeHead(200, { 'Content-Length': '7' });
      res.end('archive');
      return;
    }
    res.writeHead(302, { Location: `/hop/${remaining - 1}` });
    res.end();
    return;
  }

  if (url === '/loop') {
    res.writeHead(301, { Location: '/loop' });
    res.end();
    return;
  }

  if (url === '/stall') {
    res.writeHead(200, { 'Content-Length': '100' });
    res.write('partial');
    return;
  }

  res.writeHead(404);
  res.end('not found');
}

describe('downloadFile', () => {
  let root: string;
  let dest: string;
  let server: http.Server;
  let baseUrl: string;

  beforeEach(async () => {
    root = makeTempDir();
    dest = path.join(root, 'caddy.tar.gz');
    server = http.createServer(handler);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('saves the body of a 200 response', async () => {
    await downloadFile(`${baseUrl}/hop/0`, dest, { timeoutMs: 2000 });

    expect(fs.readFileSync(dest, 'utf-8')).toBe('archive');
  });

  it('follows up to five redirects', async () => {
    await downloadFile(`${baseUrl}/hop/5`, dest, { timeoutMs: 2000 });

    expect(fs.readFileSync(dest, 'utf-8')).toBe('archive');
  });

  it('rejects a sixth redirect', async () => {
    await expect(downloadFile(`${baseUrl}/hop/6`, dest, { timeoutMs: 2000 }))
      .rejects.toThrow(`Too many redirects fetching ${baseUrl}/hop/6`);
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('rejects a redirect loop', async () => {
    await expect(downloadFile(`${baseUrl}/loop`, dest, { timeoutMs: 2000 }))
      .rejects.toThrow('Too many redirects');
  });

  it('rejects a non-200 status', async () => {
    await expect(downloadFile(`${baseUrl}/missing`, dest, { timeoutMs: 2000 }))
      .rejects.toThrow('Download failed with status 404');
    expect(fs.existsSync(dest)).toBe(false);
  });

  it('times out a stalled body and removes the partial file', async () => {
    await expect(downloadFile(`${baseUrl}/stall`, dest, { timeoutMs: 200 }))
      .rejects.toThrow('Download timed out');
    expect(fs.existsSync(dest)).toBe(false);
  });
});
