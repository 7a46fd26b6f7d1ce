import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      mediaRoot: path.resolve('/media'),
      host: '0.0.0.0',
      port: 5000,
      scanCron: '0 * * * *',
      initialScanDelayMs: 0,
      chunkSize: 1048576,
      maxRanges: 32,
      corsOrigin: '*',
      mediaRateLimit: 10000,
      apiRateLimit: 1000,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      MEDIA_ROOT: 'library',
      PORT: '8080',
      SCAN_CRON: '*/5 * * * *',
      MAX_RANGES: '4',
      CHUNK_SIZE: '131072',
    });

    expect(config).toMatchObject({
      mediaRoot: path.resolve('library'),
      port: 8080,
      scanCron: '*/5 * * * *',
      maxRanges: 4,
      chunkSize: 131072,
    });
  });

  it('clamps the chunk size', () => {
    expect(loadConfig({ CHUNK_SIZE: '1' }).chunkSize).toBe(65536);
    expect(loadConfig({ CHUNK_SIZE: '10485760' }).chunkSize).toBe(1048576);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ MAX_RANGES: '0' })).toThrow('MAX_RANGES must be an integer >= 1, got "0"');
    expect(() => loadConfig({ PORT: '-1' })).toThrow(ConfigError);
  });
});
