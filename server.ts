import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { CatalogIndex } from './catalog';
import { createApp } from './app';
import { loadConfig } from './config';
import { describeError } from './errors';

const config = loadConfig();
const catalog = new CatalogIndex(config.mediaRoot);
const app = createApp(catalog, config);

const runScan = async () => {
  try {
    await catalog.scan();
  } catch (e) {
    console.error('[Scanner] Error:', describeError(e));
  }
};

// --- SCHEDULING ---
const initialScan = setTimeout(() => void runScan(), config.initialScanDelayMs);

let task: ScheduledTask | null = null;
if (cron.validate(config.scanCron)) {
  task = cron.schedule(config.scanCron, () => void runScan());
} else {
  console.warn(`[Server] Invalid SCAN_CRON "${config.scanCron}", scheduled rescans disabled.`);
}

const server = app.listen(config.port, config.host, () => {
  console.log(`[Server] Serving ${config.mediaRoot} on http://${config.host}:${config.port}`);
});
// Long-running streams must not hit the default socket timeout.
server.setTimeout(0);

const shutdown = (signal: string) => {
  console.log(`[Server] ${signal} received, shutting down.`);
  clearTimeout(initialScan);
  task?.stop();
  server.close(err => {
    if (err) console.error('[Server] Close failed:', describeError(err));
    process.exit(err ? 1 : 0);
  });
  server.closeAllConnections();
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
