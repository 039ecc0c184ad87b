import * as http from 'http';
import * as https from 'https';
import * as fs from 'fs';
import { VERSION } from '../version';

const MAX_REDIRECTS = 5;

export interface DownloadOptions {
  timeoutMs: number;
}

/**
 * Fetch a URL into a local file. Rejects on anything but a final 200.
 */
export type Downloader = (url: string, dest: string, options: DownloadOptions) => Promise<void>;

export const downloadFile: Downloader = (url, dest, options) => {
  return new Promise((resolve, reject) => {
    let file: fs.WriteStream | undefined;
    // Any failure after the body started drops the partial file first
    const fail = (error: Error) => {
      if (!file) {
        reject(error);
        return;
      }
      file.destroy();
      fs.rm(dest, { force: true }, () => reject(error));
    };

    const doDownload = (downloadUrl: string, redirects: number) => {
      const client = downloadUrl.startsWith('http:') ? http : https;
      const req = client.get(downloadUrl, {
        headers: { 'User-Agent': `caddy-provision/${VERSION}` },
      }, (res) => {
        // Follow redirects
        if (res.statusCode === 301 || res.statusCode === 302 || res.statusCode === 307 || res.statusCode === 308) {
          const location = res.headers.location;
          res.resume();
          if (!location) {
            reject(new Error(`Redirect from ${downloadUrl} without a location`));
            return;
          }
          if (redirects >= MAX_REDIRECTS) {
            reject(new Error(`Too many redirects fetching ${url}`));
            return;
          }
          doDownload(new URL(location, downloadUrl).toString(), redirects + 1);
          return;
        }

        if (res.statusCode !== 200) {
          res.resume();
          reject(new Error(`Download failed with status ${res.statusCode}`));
          return;
        }

        const totalSize = Number(res.headers['content-length'] ?? 0);
        const out = fs.createWriteStream(dest);
        file = out;
        let downloaded = 0;

        res.on('data', (chunk: Buffer) => {
          downloaded += chunk.length;
          if (totalSize > 0 && process.stdout.isTTY) {
            const pct = Math.round((downloaded / totalSize) * 100);
            process.stdout.write(`\r  Downloading... ${pct}%`);
          }
        });

        res.pipe(out);

        out.on('finish', () => {
          if (process.stdout.isTTY) process.stdout.write('\r  Downloading... done\n');
          resolve();
        });

        res.on('error', fail);
        out.on('error', fail);
      });

      req.on('error', fail);
      req.setTimeout(options.timeoutMs, () => {
        const error = new Error('Download timed out');
        fail(error);
        req.destroy(error);
      });
    };

    doDownload(url, 0);
  });
};
