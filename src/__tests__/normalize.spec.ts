import { describe, it, expect } from 'vitest';
import { readSourceCsv } from '../csv.js';
import { NET_ZERO_HOUSE } from '../datasets.js';
import { buildMeasurements, buildZones, normalizeDataset } from '../normalize.js';
import { HOUSE_CSV } from './fixtures.js';

const normalize = (csv: string) => normalizeDataset(readSourceCsv(csv, 'Timestamp'), NET_ZERO_HOUSE);

describe('normalizeDataset', () => {
  it('emits a zone reading only for present values', () => {
    const ds = normalize('Timestamp,Z1_temp,Z1_CO2,Air_temperature\n2024-01-01 00:00:00,21.5,,5.0');

    const temp = ds.measurements.find((m) => m.name === 'temp');
    expect(ds.zones).toEqual([{ id: 1, name: 'Z1', description: 'Zone Z1 in Net-Zero House' }]);
    expect(temp).toEqual({ id: 11, name: 'temp', unit: '°C' });
    expect(ds.zoneReadings).toEqual([{ ts: '2024-01-01 00:00:00', zone_id: 1, measurement_id: 11, value: 21.5 }]);
    expect(ds.skippedCells).toBe(1);
    expect(ds.outdoorColumns).toEqual(['Air_temperature']);
    expect(ds.outdoorReadings).toEqual([{ ts: '2024-01-01 00:00:00', values: { Air_temperature: 5 } }]);
  });

  it('numbers measurements in name order over observed and known names', () => {
    const ds = normalize('Timestamp,Z1_VOC\n2024-01-01 00:00:00,1');
    expect(ds.measurements.map((m) => [m.id, m.name, m.unit])).toEqual([
      [1, 'Air_temperature', '°C'],
      [2, 'Barometric_pressure', 'hPa'],
      [3, 'CO2', 'ppm'],
      [4, 'Outdoor_CO2', 'ppm'],
      [5, 'Precipitation', 'mm'],
      [6, 'Relative_humidity', '%'],
      [7, 'Solar_radiation', 'W/m²'],
      [8, 'VOC', ''],
      [9, 'Wind_direction', '°'],
      [10, 'Wind_speed', 'm/s'],
      [11, 'humidity', '%'],
      [12, 'temp', '°C'],
    ]);
  });

  it('gives measurements named like object members an empty unit', () => {
    const ds = normalize('Timestamp,Z1_constructor,Z1_toString\n2024-01-01 00:00:00,1,2');
    expect(ds.measurements.find((m) => m.name === 'constructor')).toEqual({ id: 10, name: 'constructor', unit: '' });
    expect(ds.measurements.find((m) => m.name === 'toString')?.unit).toBe('');
  });

  it('lists each zone once, in name order', () => {
    const ds = normalize('Timestamp,Z2_temp,Z10_temp,Z2_CO2\n2024-01-01 00:00:00,1,2,3\n2024-01-01 01:00:00,4,5,6');
    expect(ds.zones.map((z) => [z.id, z.name])).toEqual([[1, 'Z10'], [2, 'Z2']]);
    expect(ds.zoneReadings).toHaveLength(6);
  });

  it('keeps measurement names that contain the separator', () => {
    const ds = normalize('Timestamp,Z1_CO2_avg\n2024-01-01 00:00:00,410');
    const m = ds.measurements.find((x) => x.name === 'CO2_avg');
    expect(m?.unit).toBe('');
    expect(ds.zoneReadings).toEqual([{ ts: '2024-01-01 00:00:00', zone_id: 1, measurement_id: m?.id, value: 410 }]);
  });

  it('reports ignored columns and orders outdoor columns by the dataset', () => {
    const ds = normalize(HOUSE_CSV);
    expect(ds.ignoredColumns).toEqual(['Notes']);
    expect(ds.outdoorColumns).toEqual(['Air_temperature', 'Wind_speed']);
    expect(ds.outdoorReadings[1]).toEqual({ ts: '2024-01-01 01:00:00', values: { Air_temperature: 4, Wind_speed: null } });
    expect(ds.zoneReadings).toHaveLength(9);
    expect(ds.skippedCells).toBe(3);
  });

  it('decomposes every zone reading back to its source column', () => {
    const ds = normalize(HOUSE_CSV);
    const zones = new Map(ds.zones.map((z) => [z.id, z.name]));
    const measurements = new Map(ds.measurements.map((m) => [m.id, m.name]));
    const columns = new Set(ds.zoneReadings.map((r) => `${zones.get(r.zone_id)}_${measurements.get(r.measurement_id)}`));
    expect(Array.from(columns).sort()).toEqual(['Z1_CO2', 'Z1_temp', 'Z2_temp']);
  });

  it('is deterministic', () => {
    expect(normalize(HOUSE_CSV)).toEqual(normalize(HOUSE_CSV));
  });
});

describe('reference builders', () => {
  it('build zones and measurements from zone columns', () => {
    const cols = [
      { kind: 'zone' as const, column: 'B_x', zone: 'B', measurement: 'x' },
      { kind: 'zone' as const, column: 'A_x', zone: 'A', measurement: 'x' },
    ];
    expect(buildZones(cols, 'Lab')).toEqual([
      { id: 1, name: 'A', description: 'Zone A in Lab' },
      { id: 2, name: 'B', description: 'Zone B in Lab' },
    ]);
    expect(buildMeasurements(cols, { y: 'kg' })).toEqual([
      { id: 1, name: 'x', unit: '' },
      { id: 2, name: 'y', unit: 'kg' },
    ]);
  });
});
