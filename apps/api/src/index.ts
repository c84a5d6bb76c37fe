import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Load root .env if present
dotenv.config({ path: path.join(__dirname, '../../../.env') });
// Fallback to local .env
dotenv.config();

import { createApp } from './app';
import { loadConfig } from './config';
import { createEngine } from './db';
import { StagingService } from './service';
import { FileStore } from './store';

const config = loadConfig();
const engine = createEngine(config);
const service = new StagingService(engine, new FileStore(config.dataDir), {
  anchorCountry: config.anchorCountry,
  worldBankUrl: config.worldBankUrl
});

const app = createApp(service, { accessLog: 'combined' });

const server = app.listen(config.port, () => {
  console.log(`[api] project staging API running on ${config.port} (${config.db.driver})`);
});

const shutdown = (signal: string) => {
  console.log(`[api] ${signal} received, shutting down`);
  server.close(() => {
    engine.close().then(
      () => process.exit(0),
      err => {
        console.error('[api] failed to close database', err);
        process.exit(1);
      }
    );
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
