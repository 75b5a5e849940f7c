// src/ingest.ts
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync } from 'node:fs';
import { dirname, basename, join } from 'node:path';
import Database from 'better-sqlite3';
import { readSourceCsv } from './csv.js';
import type { DatasetSchema } from './datasets.js';
import { SourceFileMissingError, StoreWriteError, errorMessage } from './errors.js';
import { normalizeDataset } from './normalize.js';
import {
  CREATE_REFERENCE_TABLES_SQL,
  DROP_TABLES_SQL,
  createOutdoorTableSql,
  insertOutdoorSql,
} from './schema.js';
import type { IngestSummary, NormalizedDataset } from './types.js';

export type IngestStage = 'read' | 'normalize' | 'reference' | 'outdoor' | 'done';

export interface IngestOptions {
  csvPath: string;
  dbPath: string;
  schema: DatasetSchema;
  onProgress?: (percent: number, stage: IngestStage) => void;
}

/**
 * Writes the whole dataset into a fresh file beside `dbPath` in one
 * transaction, then renames it over `dbPath`. On failure the temp file is
 * removed and whatever was at `dbPath` stays as it was.
 */
export function writeStore(
  dataset: NormalizedDataset,
  schema: DatasetSchema,
  dbPath: string,
  onProgress?: IngestOptions['onProgress'],
): void {
  const tmpPath = join(dirname(dbPath), `.${basename(dbPath)}.${process.pid}.tmp`);
  rmSync(tmpPath, { force: true });

  let db: Database.Database | null = null;
  try {
    mkdirSync(dirname(dbPath), { recursive: true });
    db = new Database(tmpPath);
    db.pragma('foreign_keys = ON');
    const conn = db;

    conn.transaction(() => {
      conn.exec(DROP_TABLES_SQL);
      conn.exec(CREATE_REFERENCE_TABLES_SQL);
      conn.exec(createOutdoorTableSql(schema.outdoorColumns));

      const insertZone = conn.prepare('INSERT INTO Zones (ZoneID, ZoneName, ZoneDescription) VALUES (?, ?, ?)');
      for (const z of dataset.zones) insertZone.run(z.id, z.name, z.description);
      const insertMeasurement = conn.prepare('INSERT INTO Measurements (MeasurementID, MeasurementName, Unit) VALUES (?, ?, ?)');
      for (const m of dataset.measurements) insertMeasurement.run(m.id, m.name, m.unit);
      onProgress?.(60, 'reference');

      const insertOutdoor = conn.prepare(insertOutdoorSql(dataset.outdoorColumns));
      for (const r of dataset.outdoorReadings) {
        insertOutdoor.run(r.ts, ...dataset.outdoorColumns.map((c) => r.values[c] ?? null));
      }
      onProgress?.(80, 'outdoor');

      const insertReading = conn.prepare(
        'INSERT INTO ZoneReadings (Timestamp, ZoneID, MeasurementID, Value) VALUES (?, ?, ?, ?)',
      );
      for (const r of dataset.zoneReadings) insertReading.run(r.ts, r.zone_id, r.measurement_id, r.value);
    })();

    conn.close();
    db = null;
    renameSync(tmpPath, dbPath);
  } catch (e: unknown) {
    if (db) db.close();
    rmSync(tmpPath, { force: true });
    rmSync(`${tmpPath}-journal`, { force: true });
    throw new StoreWriteError(`cannot write store ${dbPath}: ${errorMessage(e)}`, e);
  }
}

export function summarize(dataset: NormalizedDataset, rows: number): IngestSummary {
  return {
    rows,
    zones: dataset.zones.length,
    measurements: dataset.measurements.length,
    outdoor_readings: dataset.outdoorReadings.length,
    zone_readings: dataset.zoneReadings.length,
    skipped_cells: dataset.skippedCells,
    ignored_columns: dataset.ignoredColumns,
  };
}

/** CSV → store. Throws before touching the store if the CSV is missing or malformed. */
export function ingestCsvFile(opts: IngestOptions): IngestSummary {
  const { csvPath, dbPath, schema, onProgress } = opts;
  if (!existsSync(csvPath)) throw new SourceFileMissingError(csvPath);

  const table = readSourceCsv(readFileSync(csvPath, 'utf8'), schema.timestampColumn);
  onProgress?.(20, 'read');

  const dataset = normalizeDataset(table, schema);
  onProgress?.(40, 'normalize');

  writeStore(dataset, schema, dbPath, onProgress);
  onProgress?.(100, 'done');

  return summarize(dataset, table.rows.length);
}

/**
 * Builds the store only when it does not exist yet. Returns the ingest
 * summary, or null when an existing store was kept.
 */
export function ensureStore(opts: IngestOptions): IngestSummary | null {
  if (existsSync(opts.dbPath)) return null;
  return ingestCsvFile(opts);
}
