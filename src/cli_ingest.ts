#!/usr/bin/env node
// src/cli_ingest.ts: rebuild the store from the CSV, whether or not one exists
import 'dotenv/config';

import { loadConfig } from './config.js';
import { ingestCsvFile } from './ingest.js';

process.env.TZ = 'UTC';

try {
  const config = loadConfig();
  console.log(`[ingest] ${config.csvPath} -> ${config.dbPath} (dataset ${config.schema.name})`);
  const summary = ingestCsvFile({
    csvPath: config.csvPath,
    dbPath: config.dbPath,
    schema: config.schema,
    onProgress: (percent, stage) => console.log(`[ingest] ${String(percent).padStart(3)}% ${stage}`),
  });
  console.log('[ingest] done', summary);
} catch (e: unknown) {
  console.error('[ingest] failed', e);
  process.exitCode = 1;
}
