// src/config.ts
import { resolve } from 'node:path';
import { z } from 'zod';
import { getPreset, loadDatasetSchema, type DatasetSchema } from './datasets.js';
import { ConfigError } from './errors.js';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  CSV_PATH: z.string().min(1).default('Net_zero_house_data.csv'),
  DB_PATH: z.string().min(1).default('Net_zero_house_data.db'),
  DATASET: z.string().min(1).default('net_zero_house'),
  DATASET_SCHEMA_PATH: z.string().min(1).optional(),
  API_KEYS: z.string().optional().default(''),
});

export interface AppConfig {
  port: number;
  csvPath: string;
  dbPath: string;
  schema: DatasetSchema;
  apiKeys: string[];
}

/** Builds the config from an env map (process.env by default); paths resolve against cwd. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // treat VAR= as unset
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid environment: ${msg}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    csvPath: resolve(e.CSV_PATH),
    dbPath: resolve(e.DB_PATH),
    schema: e.DATASET_SCHEMA_PATH ? loadDatasetSchema(resolve(e.DATASET_SCHEMA_PATH)) : getPreset(e.DATASET),
    apiKeys: e.API_KEYS.split(',').map((s) => s.trim()).filter(Boolean),
  };
}
