import fs from 'fs/promises';
import http from 'http';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createApp } from '../app';
import { CatalogIndex } from '../catalog';
import { MediaFileHandle } from '../fileReader';
import type { ScanResult } from '../types';
import { closeServer, listenOnLoopback, makeTempDir, patternBytes, writeFile } from './helpers';

const config = {
  chunkSize: 65536,
  maxRanges: 32,
  corsOrigin: '*',
  mediaRateLimit: 10000,
  apiRateLimit: 1000,
};

describe('HTTP app', () => {
  let root: string;
  let catalog: CatalogIndex;
  let server: http.Server;
  let baseUrl: string;
  const clip = patternBytes(5000);
  const episode = patternBytes(3000);

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    root = await makeTempDir();
    await writeFile(root, 'Movies/clip.mp4', clip);
    await writeFile(root, 'Shows/ep.mkv', episode);
    catalog = new CatalogIndex(root);
    await catalog.scan();
    server = http.createServer(createApp(catalog, config));
    baseUrl = await listenOnLoopback(server);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await closeServer(server);
    await fs.rm(root, { recursive: true, force: true });
  });

  const body = async (res: Response): Promise<Buffer> => Buffer.from(await res.arrayBuffer());

  describe('GET /media/<key>', () => {
    it('streams the whole file without a Range header', async () => {
      const res = await fetch(`${baseUrl}/media/Movies/clip.mp4`);

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('video/mp4');
      expect(res.headers.get('content-length')).toBe('5000');
      expect(res.headers.get('accept-ranges')).toBe('bytes');
      expect((await body(res)).equals(clip)).toBe(true);
    });

    it('serves a byte range', async () => {
      const res = await fetch(`${baseUrl}/media/Movies/clip.mp4`, { headers: { Range: 'bytes=1000-1999' } });

      expect(res.status).toBe(206);
      expect(res.headers.get('content-range')).toBe('bytes 1000-1999/5000');
      expect(res.headers.get('content-length')).toBe('1000');
      expect((await body(res)).equals(clip.subarray(1000, 2000))).toBe(true);
    });

    it('rebuilds the file from consecutive ranges', async () => {
      const parts: Buffer[] = [];
      for (let start = 0; start < clip.length; start += 1500) {
        const end = Math.min(start + 1499, clip.length - 1);
        const res = await fetch(`${baseUrl}/media/Movies/clip.mp4`, { headers: { Range: `bytes=${start}-${end}` } });
        expect(res.status).toBe(206);
        parts.push(await body(res));
      }
      expect(Buffer.concat(parts).equals(clip)).toBe(true);
    });

    it('serves a suffix range', async () => {
      const res = await fetch(`${baseUrl}/media/Shows/ep.mkv`, { headers: { Range: 'bytes=-500' } });

      expect(res.status).toBe(206);
      expect(res.headers.get('content-type')).toBe('video/x-matroska');
      expect(res.headers.get('content-range')).toBe('bytes 2500-2999/3000');
      expect((await body(res)).equals(episode.subarray(2500))).toBe(true);
    });

    it('answers 416 for a range past the end', async () => {
      const res = await fetch(`${baseUrl}/media/Movies/clip.mp4`, { headers: { Range: 'bytes=6000-7000' } });

      expect(res.status).toBe(416);
      expect(res.headers.get('content-range')).toBe('bytes */5000');
      expect((await body(res)).length).toBe(0);
    });

    it('ignores a malformed Range header', async () => {
      const res = await fetch(`${baseUrl}/media/Movies/clip.mp4`, { headers: { Range: 'bytes=banana' } });

      expect(res.status).toBe(200);
      expect((await body(res)).length).toBe(5000);
    });

    it('answers several ranges with a multipart body', async () => {
      const res = await fetch(`${baseUrl}/media/Movies/clip.mp4`, { headers: { Range: 'bytes=0-99,200-299' } });

      expect(res.status).toBe(206);
      const contentType = res.headers.get('content-type') ?? '';
      const boundary = /^multipart\/byteranges; boundary=([0-9a-f]+)$/.exec(contentType)?.[1];
      expect(boundary).toBeDefined();

      const expected = Buffer.concat([
        Buffer.from(`--${boundary}\r\nContent-Type: video/mp4\r\nContent-Range: bytes 0-99/5000\r\n\r\n`),
        clip.subarray(0, 100),
        Buffer.from(`\r\n--${boundary}\r\nContent-Type: video/mp4\r\nContent-Range: bytes 200-299/5000\r\n\r\n`),
        clip.subarray(200, 300),
        Buffer.from(`\r\n--${boundary}--\r\n`),
      ]);
      const received = await body(res);
      expect(res.headers.get('content-length')).toBe(String(expected.length));
      expect(received.equals(expected)).toBe(true);
    });

    it('answers HEAD with headers only', async () => {
      const res = await fetch(`${baseUrl}/media/Movies/clip.mp4`, { method: 'HEAD' });

      expect(res.status).toBe(200);
      expect(res.headers.get('content-length')).toBe('5000');
      expect((await body(res)).length).toBe(0);
    });

    it('applies If-Range against the current entity tag', async () => {
      const etag = (await fetch(`${baseUrl}/media/Movies/clip.mp4`, { method: 'HEAD' })).headers.get('etag') ?? '';
      expect(etag).toMatch(/^"1388-[0-9a-f]+"$/);

      const matching = await fetch(`${baseUrl}/media/Movies/clip.mp4`, {
        headers: { Range: 'bytes=0-9', 'If-Range': etag },
      });
      expect(matching.status).toBe(206);
      expect((await body(matching)).equals(clip.subarray(0, 10))).toBe(true);

      const stale = await fetch(`${baseUrl}/media/Movies/clip.mp4`, {
        headers: { Range: 'bytes=0-9', 'If-Range': '"stale"' },
      });
      expect(stale.status).toBe(200);
      expect((await body(stale)).equals(clip)).toBe(true);
    });

    describe('when the client disconnects mid-stream', () => {
      const large = patternBytes(16 * 1024 * 1024);

      const abortAfterFirstChunk = async (headers: Record<string, string>) => {
        const controller = new AbortController();
        const res = await fetch(`${baseUrl}/media/Movies/large.mp4`, { headers, signal: controller.signal });
        expect(res.status).toBe(headers.Range ? 206 : 200);
        const reader = res.body?.getReader();
        expect(reader).toBeDefined();
        const first = await reader?.read();
        expect(first?.done).toBe(false);
        controller.abort();
      };

      beforeEach(async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        await writeFile(root, 'Movies/large.mp4', large);
      });

      it('closes the file of a plain response', async () => {
        const close = vi.spyOn(MediaFileHandle.prototype, 'close');

        await abortAfterFirstChunk({});

        await vi.waitFor(() => expect(close).toHaveBeenCalledTimes(1));
      });

      it('closes the file of a multipart response', async () => {
        const close = vi.spyOn(MediaFileHandle.prototype, 'close');

        await abortAfterFirstChunk({ Range: 'bytes=0-8388607,8388608-16777215' });

        await vi.waitFor(() => expect(close).toHaveBeenCalledTimes(1));
      });
    });

    it('decodes percent-encoded keys', async () => {
      const film = patternBytes(64);
      await writeFile(root, 'Movies/My Film.mp4', film);

      const res = await fetch(`${baseUrl}/media/Movies/My%20Film.mp4`);

      expect(res.status).toBe(200);
      expect((await body(res)).equals(film)).toBe(true);
    });

    it('answers 404 for unknown keys, deleted files and escapes from the root', async () => {
      await fs.rm(path.join(root, 'Shows', 'ep.mkv'));

      const unknown = await fetch(`${baseUrl}/media/Movies/none.mp4`);
      expect(unknown.status).toBe(404);
      expect(await unknown.json()).toEqual({ error: 'Media not found' });

      expect((await fetch(`${baseUrl}/media/Shows/ep.mkv`)).status).toBe(404);
      expect((await fetch(`${baseUrl}/media/..%2F..%2Fetc%2Fpasswd`)).status).toBe(404);
      expect((await fetch(`${baseUrl}/media/%E0%A4%A`)).status).toBe(404);
    });
  });

  describe('catalog API', () => {
    it('lists media without absolute paths', async () => {
      const res = await fetch(`${baseUrl}/api/v1/videos`);

      expect(res.status).toBe(200);
      expect(res.headers.get('access-control-allow-origin')).toBe('*');
      expect(await res.json()).toEqual({
        count: 2,
        videos: [
          {
            key: 'Movies/clip.mp4',
            name: 'clip',
            kind: 'mp4',
            size: 5000,
            sizeHuman: '4.88 KB',
            lastModified: expect.any(String),
            library: 'Movies',
            quality: null,
          },
          {
            key: 'Shows/ep.mkv',
            name: 'ep',
            kind: 'mkv',
            size: 3000,
            sizeHuman: '2.93 KB',
            lastModified: expect.any(String),
            library: 'Shows',
            quality: null,
          },
        ],
      });
    });

    it('sorts the listing', async () => {
      const res = await fetch(`${baseUrl}/api/v1/videos?sort=size&order=asc`);

      expect(await res.json()).toMatchObject({
        videos: [{ key: 'Shows/ep.mkv' }, { key: 'Movies/clip.mp4' }],
      });
    });

    it('returns one entry with fresh metadata', async () => {
      await fs.appendFile(path.join(root, 'Shows', 'ep.mkv'), patternBytes(100));

      const res = await fetch(`${baseUrl}/api/v1/videos/Shows/ep.mkv`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ key: 'Shows/ep.mkv', kind: 'mkv', size: 3100, library: 'Shows', name: 'ep' });
      expect((await fetch(`${baseUrl}/api/v1/videos/Shows/none.mkv`)).status).toBe(404);
    });

    it('reports library stats', async () => {
      const res = await fetch(`${baseUrl}/api/v1/stats`);

      expect(await res.json()).toEqual({ totalVideos: 2, totalBytes: 8000, formats: { mp4: 1, mkv: 1 } });
    });

    it('starts a background scan and rejects a second one', async () => {
      await writeFile(root, 'Movies/new.mp4', patternBytes(10));

      const res = await fetch(`${baseUrl}/api/scan`, { method: 'POST' });
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true, message: 'Scan started in background.' });

      await catalog.scan();
      const status = await fetch(`${baseUrl}/api/scan-status`);
      expect(await status.json()).toMatchObject({ isRunning: false, step: 'Complete', entryCount: 3 });
    });

    it('answers 409 while a scan is running', async () => {
      let release: (result: ScanResult) => void = () => undefined;
      const blocked = new CatalogIndex(root, () => new Promise<ScanResult>(resolve => (release = resolve)));
      const blockedServer = http.createServer(createApp(blocked, config));
      const url = await listenOnLoopback(blockedServer);
      try {
        const pending = blocked.scan();

        const res = await fetch(`${url}/api/scan`, { method: 'POST' });

        expect(res.status).toBe(409);
        expect(await res.json()).toEqual({ error: 'Scan already in progress.' });
        release({ files: [], failures: [] });
        await pending;
      } finally {
        await closeServer(blockedServer);
      }
    });

    it('reports health', async () => {
      const res = await fetch(`${baseUrl}/health`);

      expect(await res.json()).toEqual({ status: 'healthy', service: 'homereel' });
    });
  });
});
