import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { NET_ZERO_HOUSE } from '../datasets.js';
import { ingestCsvFile } from '../ingest.js';

// Z1 temp 20,22,24 / Z1 CO2 400,600,500 / Z2 temp 18,19,17 / Air 2,4,6,10 / Wind 3,-,5,1
export const HOUSE_CSV = [
  'Timestamp,Z1_temp,Z1_CO2,Z2_temp,Air_temperature,Wind_speed,Notes',
  '2024-01-01 00:00:00,20,400,18,2,3,ok',
  '2024-01-01 01:00:00,22,,19,4,,',
  '2024-01-01 02:00:00,,600,,6,5,door open',
  '2024-01-02 00:00:00,24,500,17,10,1,',
].join('\n');

// Z1 has no temp on the 2nd and 4th
export const GAP_CSV = [
  'Timestamp,Z1_temp,Air_temperature',
  '2024-03-01 10:00:00,20,1',
  '2024-03-02 10:00:00,,3',
  '2024-03-03 10:00:00,22,5',
  '2024-03-04 10:00:00,,7',
].join('\n');

export interface TempStore {
  dir: string;
  csvPath: string;
  dbPath: string;
  cleanup: () => void;
}

export function tempDir(): TempStore {
  const dir = mkdtempSync(join(tmpdir(), 'zone-monitor-'));
  return {
    dir,
    csvPath: join(dir, 'data.csv'),
    dbPath: join(dir, 'store.db'),
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/** Writes `csv` into a fresh temp dir and ingests it with the built-in dataset. */
export function buildStore(csv: string): TempStore {
  const t = tempDir();
  writeFileSync(t.csvPath, csv);
  ingestCsvFile({ csvPath: t.csvPath, dbPath: t.dbPath, schema: NET_ZERO_HOUSE });
  return t;
}
