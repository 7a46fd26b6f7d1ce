import path from 'path';
import { ConfigError } from './errors';
import { clampChunkSize, DEFAULT_CHUNK_SIZE } from './fileReader';
import { DEFAULT_MAX_RANGES } from './range';

export interface AppConfig {
  mediaRoot: string;
  host: string;
  port: number;
  scanCron: string;
  initialScanDelayMs: number;
  chunkSize: number;
  maxRanges: number;
  corsOrigin: string;
  mediaRateLimit: number;
  apiRateLimit: number;
}

type Env = Record<string, string | undefined>;

const readInt = (env: Env, name: string, fallback: number, min = 0): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
};

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    mediaRoot: path.resolve(env.MEDIA_ROOT || '/media'),
    host: env.HOST || '0.0.0.0',
    port: readInt(env, 'PORT', 5000),
    scanCron: env.SCAN_CRON || '0 * * * *',
    initialScanDelayMs: readInt(env, 'INITIAL_SCAN_DELAY_MS', 0),
    chunkSize: clampChunkSize(readInt(env, 'CHUNK_SIZE', DEFAULT_CHUNK_SIZE, 1)),
    maxRanges: readInt(env, 'MAX_RANGES', DEFAULT_MAX_RANGES, 1),
    corsOrigin: env.CORS_ORIGIN || '*',
    mediaRateLimit: readInt(env, 'MEDIA_RATE_LIMIT', 10000, 1),
    apiRateLimit: readInt(env, 'API_RATE_LIMIT', 1000, 1),
  };
}
