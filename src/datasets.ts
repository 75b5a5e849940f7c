// src/datasets.ts
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';

/** Outdoor variables become columns of OutdoorReadings, so they must be plain identifiers. */
const SqlIdentifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

// columns every OutdoorReadings table already has; SQLite names are case-insensitive
const RESERVED_COLUMNS = new Set(['readingid', 'timestamp']);

export const DatasetSchemaSchema = z.object({
  name: z.string().min(1),
  siteName: z.string().min(1),
  timestampColumn: z.string().min(1).default('Timestamp'),
  separator: z.string().min(1).default('_'),
  zonePrefixes: z.array(z.string().min(1)).min(1),
  outdoorColumns: z.array(SqlIdentifier)
    .refine((cols) => cols.every((c) => !RESERVED_COLUMNS.has(c.toLowerCase())), 'ReadingID and Timestamp are reserved')
    .refine(
      (cols) => new Set(cols.map((c) => c.toLowerCase())).size === cols.length,
      'outdoor columns must be unique, ignoring case',
    ),
  units: z.record(z.string().min(1), z.string()),
});

export type DatasetSchema = z.infer<typeof DatasetSchemaSchema>;

export const NET_ZERO_HOUSE: DatasetSchema = {
  name: 'net_zero_house',
  siteName: 'Net-Zero House',
  timestampColumn: 'Timestamp',
  separator: '_',
  zonePrefixes: ['Z'],
  outdoorColumns: [
    'Air_temperature',
    'Relative_humidity',
    'Wind_speed',
    'Wind_direction',
    'Barometric_pressure',
    'Precipitation',
    'Solar_radiation',
    'Outdoor_CO2',
  ],
  units: {
    temp: '°C',
    humidity: '%',
    CO2: 'ppm',
    Air_temperature: '°C',
    Relative_humidity: '%',
    Wind_speed: 'm/s',
    Wind_direction: '°',
    Barometric_pressure: 'hPa',
    Precipitation: 'mm',
    Solar_radiation: 'W/m²',
    Outdoor_CO2: 'ppm',
  },
};

export const PRESETS: Record<string, DatasetSchema> = {
  [NET_ZERO_HOUSE.name]: NET_ZERO_HOUSE,
};

export function getPreset(name: string): DatasetSchema {
  const preset = PRESETS[name];
  if (!preset) {
    throw new ConfigError(`unknown dataset preset "${name}" (known: ${Object.keys(PRESETS).join(', ')})`);
  }
  return preset;
}

/** Reads a dataset schema from a JSON file; defaults fill the optional fields. */
export function loadDatasetSchema(path: string): DatasetSchema {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (e: unknown) {
    throw new ConfigError(`cannot read dataset schema ${path}: ${errorMessage(e)}`);
  }
  const parsed = DatasetSchemaSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`invalid dataset schema ${path}: ${msg}`);
  }
  return parsed.data;
}
