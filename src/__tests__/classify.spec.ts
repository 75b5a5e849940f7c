import { describe, it, expect } from 'vitest';
import { classifyColumn, classifyColumns } from '../classify.js';
import { NET_ZERO_HOUSE } from '../datasets.js';

describe('classifyColumn', () => {
  it('splits zone columns on the first separator', () => {
    expect(classifyColumn('Z1_temp', NET_ZERO_HOUSE)).toEqual({
      kind: 'zone', column: 'Z1_temp', zone: 'Z1', measurement: 'temp',
    });
    expect(classifyColumn('Z2_CO2_ppm', NET_ZERO_HOUSE)).toEqual({
      kind: 'zone', column: 'Z2_CO2_ppm', zone: 'Z2', measurement: 'CO2_ppm',
    });
  });

  it('recognises known outdoor columns', () => {
    expect(classifyColumn('Air_temperature', NET_ZERO_HOUSE)).toEqual({ kind: 'outdoor', column: 'Air_temperature' });
    expect(classifyColumn('Outdoor_CO2', NET_ZERO_HOUSE)).toEqual({ kind: 'outdoor', column: 'Outdoor_CO2' });
  });

  it('ignores the timestamp, unknown columns and incomplete zone names', () => {
    for (const col of ['Timestamp', 'Notes', 'Dew_point', 'Z1', 'Z1_']) {
      expect(classifyColumn(col, NET_ZERO_HOUSE)).toEqual({ kind: 'ignored', column: col });
    }
  });

  it('takes prefixes and separator from the schema', () => {
    const schema = {
      timestampColumn: 'time',
      separator: '.',
      zonePrefixes: ['Room', 'Z'],
      outdoorColumns: ['Z_wind', 'rain'],
    };
    expect(classifyColumns(['time', 'Room3.humidity', 'Room3_humidity', 'rain', 'Z.wind', 'Z_wind'], schema)).toEqual([
      { kind: 'ignored', column: 'time' },
      { kind: 'zone', column: 'Room3.humidity', zone: 'Room3', measurement: 'humidity' },
      { kind: 'ignored', column: 'Room3_humidity' },
      { kind: 'outdoor', column: 'rain' },
      { kind: 'zone', column: 'Z.wind', zone: 'Z', measurement: 'wind' },
      { kind: 'outdoor', column: 'Z_wind' },
    ]);
  });

  it('prefers zone over outdoor when a column matches both', () => {
    const schema = { ...NET_ZERO_HOUSE, outdoorColumns: ['Z9_temp'] };
    expect(classifyColumn('Z9_temp', schema).kind).toBe('zone');
  });
});
