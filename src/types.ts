// src/types.ts

export interface Zone {
  id: number;
  name: string;
  description: string;
}

export interface Measurement {
  id: number;
  name: string;
  unit: string;        // '' when the name has no known unit
}

export interface OutdoorReading {
  ts: string;          // yyyy-MM-dd HH:mm:ss
  values: Record<string, number | null>;
}

export interface ZoneReading {
  ts: string;
  zone_id: number;
  measurement_id: number;
  value: number;
}

/** How the ingestor treats one header of the source file. */
export type ColumnKind =
  | { kind: 'zone'; column: string; zone: string; measurement: string }
  | { kind: 'outdoor'; column: string }
  | { kind: 'ignored'; column: string };

/** One parsed source row: normalized timestamp plus numeric cells (null = missing). */
export interface SourceRow {
  ts: string;
  cells: Record<string, number | null>;
}

export interface SourceTable {
  columns: string[];   // headers in file order, timestamp column excluded
  rows: SourceRow[];
}

export interface NormalizedDataset {
  zones: Zone[];
  measurements: Measurement[];
  outdoorColumns: string[];        // schema outdoor columns present in the source
  outdoorReadings: OutdoorReading[];
  zoneReadings: ZoneReading[];
  ignoredColumns: string[];
  skippedCells: number;            // zone cells with no value
}

export interface IngestSummary {
  rows: number;
  zones: number;
  measurements: number;
  outdoor_readings: number;
  zone_readings: number;
  skipped_cells: number;
  ignored_columns: string[];
}

export interface SeriesPoint {
  ReadingHour: string; // yyyy-MM-dd HH
  Value: number | null;
}

export interface Aggregates {
  mean: number | null;
  max: number | null;
  count: number;
}

export interface DailyTrendPoint {
  day: string;         // yyyy-MM-dd
  zone: number | null;
  outdoor: number | null;
}
