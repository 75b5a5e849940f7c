// src/schema.ts
// Store tables. OutdoorReadings gets one REAL column per outdoor variable of the dataset.

export const DROP_TABLES_SQL = `
DROP TABLE IF EXISTS OutdoorReadings;
DROP TABLE IF EXISTS ZoneReadings;
DROP TABLE IF EXISTS Zones;
DROP TABLE IF EXISTS Measurements;
`;

export const CREATE_REFERENCE_TABLES_SQL = `
CREATE TABLE Zones (
  ZoneID INTEGER PRIMARY KEY,
  ZoneName TEXT NOT NULL UNIQUE,
  ZoneDescription TEXT
);

CREATE TABLE Measurements (
  MeasurementID INTEGER PRIMARY KEY,
  MeasurementName TEXT NOT NULL UNIQUE,
  Unit TEXT
);

CREATE TABLE ZoneReadings (
  ReadingID INTEGER PRIMARY KEY AUTOINCREMENT,
  Timestamp TEXT NOT NULL,
  ZoneID INTEGER NOT NULL REFERENCES Zones(ZoneID),
  MeasurementID INTEGER NOT NULL REFERENCES Measurements(MeasurementID),
  Value REAL
);

CREATE INDEX idx_zone_readings_pair ON ZoneReadings (ZoneID, MeasurementID, Timestamp);
`;

/** Double-quotes a column name checked by the dataset schema, so keywords such as `Order` work. */
export const quoteIdent = (name: string) => `"${name}"`;

export function createOutdoorTableSql(outdoorColumns: string[]): string {
  const cols = outdoorColumns.map((c) => `,\n  ${quoteIdent(c)} REAL`).join('');
  return `
CREATE TABLE OutdoorReadings (
  ReadingID INTEGER PRIMARY KEY AUTOINCREMENT,
  Timestamp TEXT NOT NULL${cols}
);

CREATE INDEX idx_outdoor_readings_ts ON OutdoorReadings (Timestamp);
`;
}

export function insertOutdoorSql(presentColumns: string[]): string {
  const cols = ['Timestamp', ...presentColumns.map(quoteIdent)];
  return `INSERT INTO OutdoorReadings (${cols.join(', ')}) VALUES (${cols.map(() => '?').join(', ')})`;
}
