import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { CatalogIndex } from './catalog';
import type { AppConfig } from './config';
import type { SortField, SortOrder } from './types';
import { describeError } from './errors';
import { planMediaResponse, sendMediaResponse } from './responder';
import { toSummary } from './utils/mediaUtils';

const FIFTEEN_MINUTES = 15 * 60 * 1000;
const MEDIA_PREFIX = '/media/';
const VIDEO_PREFIX = '/api/v1/videos/';
// Regex routes carry no params; keyFromPath does the decoding.
const MEDIA_ROUTE = /^\/media\/.+/;
const VIDEO_ROUTE = /^\/api\/v1\/videos\/.+/;

export type ServerConfig = Pick<AppConfig, 'chunkSize' | 'maxRanges' | 'corsOrigin' | 'mediaRateLimit' | 'apiRateLimit'>;

// Query values and headers are strings unless repeated.
const singleValue = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const parseSort = (value: unknown): SortField => {
  const sort = singleValue(value);
  return sort === 'date' || sort === 'size' ? sort : 'name';
};

const parseOrder = (value: unknown): SortOrder => (singleValue(value)?.toLowerCase() === 'desc' ? 'desc' : 'asc');

// "/media/Movies/The%20Film.mp4" -> "Movies/The Film.mp4"
export const keyFromPath = (requestPath: string, prefix: string): string | null => {
  if (!requestPath.startsWith(prefix)) return null;
  try {
    return requestPath
      .slice(prefix.length)
      .split('/')
      .map(segment => decodeURIComponent(segment))
      .join('/');
  } catch {
    return null;
  }
};

export function createApp(catalog: CatalogIndex, config: ServerConfig) {
  const app = express();

  app.set('trust proxy', 1);
  app.disable('x-powered-by');

  // --- LIMITERS ---
  const apiLimiter = rateLimit({ windowMs: FIFTEEN_MINUTES, limit: config.apiRateLimit, message: { error: 'Too many requests.' } });
  const scanLimiter = rateLimit({ windowMs: 60 * 1000, limit: 6, message: { error: 'Scanning too frequently. Please wait.' } });
  const mediaLimiter = rateLimit({ windowMs: FIFTEEN_MINUTES, limit: config.mediaRateLimit, message: { error: 'Too many media requests.' } });

  app.use('/api', cors({ origin: config.corsOrigin }), apiLimiter);

  app.get('/health', (req, res) => {
    res.json({ status: 'healthy', service: 'homereel' });
  });

  // --- CATALOG API ---
  app.get('/api/v1/videos', (req, res) => {
    const videos = catalog.list(parseSort(req.query.sort), parseOrder(req.query.order)).map(toSummary);
    res.json({ videos, count: videos.length });
  });

  app.get(VIDEO_ROUTE, async (req, res, next) => {
    try {
      const key = keyFromPath(req.path, VIDEO_PREFIX);
      const entry = key === null ? null : await catalog.resolve(key);
      if (!entry) {
        res.status(404).json({ error: 'Video not found' });
        return;
      }
      res.json(toSummary(entry));
    } catch (e) {
      next(e);
    }
  });

  app.get('/api/v1/stats', (req, res) => {
    res.json(catalog.stats());
  });

  app.get('/api/scan-status', (req, res) => {
    res.json(catalog.status());
  });

  app.post('/api/scan', scanLimiter, (req, res) => {
    if (catalog.isScanning()) {
      res.status(409).json({ error: 'Scan already in progress.' });
      return;
    }
    catalog.scan().catch((e: unknown) => console.error('[Server] Background scan failed:', describeError(e)));
    res.json({ success: true, message: 'Scan started in background.' });
  });

  // --- PLAYBACK (GET and HEAD) ---
  app.get(MEDIA_ROUTE, mediaLimiter, async (req, res, next) => {
    try {
      const key = keyFromPath(req.path, MEDIA_PREFIX);
      if (key === null) {
        res.status(404).json({ error: 'Media not found' });
        return;
      }
      const plan = await planMediaResponse(
        catalog,
        key,
        { range: req.headers.range, ifRange: singleValue(req.headers['if-range']) },
        { maxRanges: config.maxRanges }
      );
      await sendMediaResponse(res, plan, { method: req.method, chunkSize: config.chunkSize });
    } catch (e) {
      next(e);
    }
  });

  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    console.error(`[Server] ${req.method} ${req.path} failed:`, describeError(err));
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
