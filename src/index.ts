// src/index.ts
import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { ensureStore, type IngestStage } from './ingest.js';
import { closeStore, getStore } from './store.js';

// daily trend days are computed on local dates
process.env.TZ = 'UTC';

const config = loadConfig();

const logProgress = (percent: number, stage: IngestStage) => {
  console.log(`[ingest] ${String(percent).padStart(3)}% ${stage}`);
};

try {
  const summary = ensureStore({
    csvPath: config.csvPath,
    dbPath: config.dbPath,
    schema: config.schema,
    onProgress: logProgress,
  });
  if (summary) console.log('[ingest] store created from CSV', summary);
} catch (e: unknown) {
  console.error('[ingest] cannot build the store, not starting', e);
  process.exit(1);
}

const app = createApp({ getStore: () => getStore(config.dbPath), apiKeys: config.apiKeys });

const server = app.listen(config.port, () => {
  console.log(`Zone Monitor API listening on :${config.port} (store ${config.dbPath})`);
});

const shutdown = () => {
  server.close(() => {
    closeStore();
    process.exit(0);
  });
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
