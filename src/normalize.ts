// src/normalize.ts
import { classifyColumns } from './classify.js';
import type { DatasetSchema } from './datasets.js';
import type {
  ColumnKind,
  Measurement,
  NormalizedDataset,
  OutdoorReading,
  SourceTable,
  Zone,
  ZoneReading,
} from './types.js';

type ZoneColumn = Extract<ColumnKind, { kind: 'zone' }>;

const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export function zoneDescription(zone: string, siteName: string): string {
  return `Zone ${zone} in ${siteName}`;
}

/** Zones observed in the header, named in code-unit order, IDs from 1. */
export function buildZones(columns: ZoneColumn[], siteName: string): Zone[] {
  const names = Array.from(new Set(columns.map((c) => c.zone))).sort(byName);
  return names.map((name, i) => ({ id: i + 1, name, description: zoneDescription(name, siteName) }));
}

/** Observed measurements plus every name of the unit table; unknown units are ''. */
export function buildMeasurements(columns: ZoneColumn[], units: Record<string, string>): Measurement[] {
  const known = new Map(Object.entries(units));
  const names = new Set(columns.map((c) => c.measurement));
  for (const name of known.keys()) names.add(name);
  return Array.from(names)
    .sort(byName)
    .map((name, i) => ({ id: i + 1, name, unit: known.get(name) ?? '' }));
}

/**
 * Turns a parsed source table into the rows of the four store tables.
 * No I/O; the result is written to the store in one go.
 */
export function normalizeDataset(table: SourceTable, schema: DatasetSchema): NormalizedDataset {
  const kinds = classifyColumns(table.columns, schema);

  const zoneColumns: ZoneColumn[] = [];
  const outdoorPresent = new Set<string>();
  const ignoredColumns: string[] = [];
  for (const k of kinds) {
    if (k.kind === 'zone') zoneColumns.push(k);
    else if (k.kind === 'outdoor') outdoorPresent.add(k.column);
    else ignoredColumns.push(k.column);
  }
  // schema order, not file order
  const outdoorColumns = schema.outdoorColumns.filter((c) => outdoorPresent.has(c));

  const zones = buildZones(zoneColumns, schema.siteName);
  const measurements = buildMeasurements(zoneColumns, schema.units);

  const zoneIds = new Map(zones.map((z) => [z.name, z.id] as const));
  const measurementIds = new Map(measurements.map((m) => [m.name, m.id] as const));

  const resolved = zoneColumns.map((c) => ({
    column: c.column,
    zone_id: zoneIds.get(c.zone),
    measurement_id: measurementIds.get(c.measurement),
  }));

  const outdoorReadings: OutdoorReading[] = [];
  const zoneReadings: ZoneReading[] = [];
  let skippedCells = 0;

  for (const row of table.rows) {
    const values: Record<string, number | null> = {};
    for (const col of outdoorColumns) values[col] = row.cells[col] ?? null;
    outdoorReadings.push({ ts: row.ts, values });

    for (const c of resolved) {
      const value = row.cells[c.column];
      if (value === null || value === undefined || c.zone_id === undefined || c.measurement_id === undefined) {
        skippedCells++;
        continue;
      }
      zoneReadings.push({ ts: row.ts, zone_id: c.zone_id, measurement_id: c.measurement_id, value });
    }
  }

  return { zones, measurements, outdoorColumns, outdoorReadings, zoneReadings, ignoredColumns, skippedCells };
}
