// src/queries.ts
import { eachDayOfInterval, format, parseISO } from 'date-fns';
import { z } from 'zod';
import { StoreReadError, UnknownVariableError, ZoneMonitorError, errorMessage } from './errors.js';
import { quoteIdent } from './schema.js';
import type { Store } from './store.js';
import type { Aggregates, DailyTrendPoint, SeriesPoint } from './types.js';

const ZoneRowSchema = z.object({
  ZoneID: z.number().int(),
  ZoneName: z.string(),
  ZoneDescription: z.string().nullable(),
});
export type ZoneRow = z.infer<typeof ZoneRowSchema>;

const MeasurementRowSchema = z.object({
  MeasurementID: z.number().int(),
  MeasurementName: z.string(),
  Unit: z.string().nullable(),
});
export type MeasurementRow = z.infer<typeof MeasurementRowSchema>;

const SeriesRowSchema = z.object({
  ReadingHour: z.string(),
  Value: z.number().nullable(),
});

const AggregatesRowSchema = z.object({
  mean: z.number().nullable(),
  max: z.number().nullable(),
  count: z.number().int(),
});

const DailyRowSchema = z.object({
  day: z.string(),
  value: z.number().nullable(),
});

const ColumnInfoSchema = z.object({ name: z.string() });

/** The KPI panel: outdoor temperature, zone temperature, zone CO2. */
export const KPI_NAMES = {
  outdoorTemperature: 'Air_temperature',
  temperature: 'temp',
  co2: 'CO2',
} as const;

export interface ZoneKpis {
  avg_outdoor_temp: number | null;
  avg_zone_temp: number | null;
  max_zone_co2: number | null;
}

const HOUR = `strftime('%Y-%m-%d %H', Timestamp)`;

// every read failure that is not already ours is a store failure
function read<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (e: unknown) {
    if (e instanceof ZoneMonitorError) throw e;
    throw new StoreReadError(`${what}: ${errorMessage(e)}`, e);
  }
}

export function listZones(db: Store): ZoneRow[] {
  return read('list zones', () =>
    ZoneRowSchema.array().parse(
      db.prepare('SELECT ZoneID, ZoneName, ZoneDescription FROM Zones ORDER BY ZoneName').all(),
    ),
  );
}

export function listMeasurements(db: Store): MeasurementRow[] {
  return read('list measurements', () =>
    MeasurementRowSchema.array().parse(
      db.prepare('SELECT MeasurementID, MeasurementName, Unit FROM Measurements ORDER BY MeasurementName').all(),
    ),
  );
}

export function findZone(db: Store, name: string): ZoneRow | null {
  return read('find zone', () => {
    const row = db.prepare('SELECT ZoneID, ZoneName, ZoneDescription FROM Zones WHERE ZoneName = ?').get(name);
    return row === undefined ? null : ZoneRowSchema.parse(row);
  });
}

export function findMeasurement(db: Store, name: string): MeasurementRow | null {
  return read('find measurement', () => {
    const row = db
      .prepare('SELECT MeasurementID, MeasurementName, Unit FROM Measurements WHERE MeasurementName = ?')
      .get(name);
    return row === undefined ? null : MeasurementRowSchema.parse(row);
  });
}

/** Outdoor variable columns of the store, in table order. */
export function outdoorVariables(db: Store): string[] {
  return read('list outdoor variables', () =>
    ColumnInfoSchema.array()
      .parse(db.pragma('table_info(OutdoorReadings)'))
      .map((c) => c.name)
      .filter((n) => n !== 'ReadingID' && n !== 'Timestamp'),
  );
}

// variable ends up in SQL text, so it must be an actual column
function assertVariable(db: Store, variable: string): string {
  if (!outdoorVariables(db).includes(variable)) throw new UnknownVariableError(variable);
  return quoteIdent(variable);
}

export function outdoorHourlySeries(db: Store, variable: string): SeriesPoint[] {
  const col = assertVariable(db, variable);
  return read('outdoor series', () =>
    SeriesRowSchema.array().parse(
      db
        .prepare(`SELECT ${HOUR} AS ReadingHour, ${col} AS Value FROM OutdoorReadings ORDER BY ReadingHour, ReadingID`)
        .all(),
    ),
  );
}

export function zoneHourlySeries(db: Store, zoneId: number, measurementId: number): SeriesPoint[] {
  return read('zone series', () =>
    SeriesRowSchema.array().parse(
      db
        .prepare(
          `SELECT ${HOUR} AS ReadingHour, Value FROM ZoneReadings
           WHERE ZoneID = ? AND MeasurementID = ?
           ORDER BY ReadingHour, ReadingID`,
        )
        .all(zoneId, measurementId),
    ),
  );
}

export function zoneAggregates(db: Store, zoneId: number, measurementId: number): Aggregates {
  return read('zone aggregates', () =>
    AggregatesRowSchema.parse(
      db
        .prepare(
          `SELECT AVG(Value) AS mean, MAX(Value) AS max, COUNT(Value) AS count
           FROM ZoneReadings WHERE ZoneID = ? AND MeasurementID = ?`,
        )
        .get(zoneId, measurementId),
    ),
  );
}

export function outdoorAggregates(db: Store, variable: string): Aggregates {
  const col = assertVariable(db, variable);
  return read('outdoor aggregates', () =>
    AggregatesRowSchema.parse(
      db
        .prepare(`SELECT AVG(${col}) AS mean, MAX(${col}) AS max, COUNT(${col}) AS count FROM OutdoorReadings`)
        .get(),
    ),
  );
}

/** Missing measurements or outdoor columns give null, not an error. */
export function zoneKpis(db: Store, zoneId: number): ZoneKpis {
  const outdoor = outdoorVariables(db).includes(KPI_NAMES.outdoorTemperature)
    ? outdoorAggregates(db, KPI_NAMES.outdoorTemperature).mean
    : null;
  const temp = findMeasurement(db, KPI_NAMES.temperature);
  const co2 = findMeasurement(db, KPI_NAMES.co2);
  return {
    avg_outdoor_temp: outdoor,
    avg_zone_temp: temp ? zoneAggregates(db, zoneId, temp.MeasurementID).mean : null,
    max_zone_co2: co2 ? zoneAggregates(db, zoneId, co2.MeasurementID).max : null,
  };
}

/**
 * Daily means of a zone measurement next to daily means of an outdoor
 * variable. Covers each day both series span, with null on days a series
 * has no value.
 */
export function dailyTrend(db: Store, zoneId: number, measurementId: number, variable: string): DailyTrendPoint[] {
  const col = assertVariable(db, variable);
  const [zoneDays, outdoorDays] = read('daily trend', () => [
    DailyRowSchema.array().parse(
      db
        .prepare(
          `SELECT substr(Timestamp, 1, 10) AS day, AVG(Value) AS value FROM ZoneReadings
           WHERE ZoneID = ? AND MeasurementID = ? GROUP BY day ORDER BY day`,
        )
        .all(zoneId, measurementId),
    ),
    DailyRowSchema.array().parse(
      db
        .prepare(`SELECT substr(Timestamp, 1, 10) AS day, AVG(${col}) AS value FROM OutdoorReadings GROUP BY day ORDER BY day`)
        .all(),
    ),
  ] as const);

  const zFirst = zoneDays[0];
  const zLast = zoneDays[zoneDays.length - 1];
  const oFirst = outdoorDays[0];
  const oLast = outdoorDays[outdoorDays.length - 1];
  if (!zFirst || !zLast || !oFirst || !oLast) return [];

  const start = zFirst.day > oFirst.day ? zFirst.day : oFirst.day;
  const end = zLast.day < oLast.day ? zLast.day : oLast.day;
  if (start > end) return [];

  const zone = new Map(zoneDays.map((d) => [d.day, d.value] as const));
  const outdoor = new Map(outdoorDays.map((d) => [d.day, d.value] as const));

  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map((d) => {
    const day = format(d, 'yyyy-MM-dd');
    return { day, zone: zone.get(day) ?? null, outdoor: outdoor.get(day) ?? null };
  });
}
