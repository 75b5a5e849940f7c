// src/classify.ts
import type { DatasetSchema } from './datasets.js';
import type { ColumnKind } from './types.js';

type ClassifierSchema = Pick<DatasetSchema, 'timestampColumn' | 'separator' | 'zonePrefixes' | 'outdoorColumns'>;

/**
 * Decides what a source header holds.
 *
 * `Z1_temp` with prefix `Z` is zone `Z1`, measurement `temp`. Only the first
 * separator splits, so `Z2_CO2_ppm` is zone `Z2`, measurement `CO2_ppm`.
 * Zone columns win over outdoor ones; anything else is ignored.
 */
export function classifyColumn(column: string, schema: ClassifierSchema): ColumnKind {
  if (column === schema.timestampColumn) return { kind: 'ignored', column };

  const sep = schema.separator;
  const at = column.indexOf(sep);
  if (at >= 0 && schema.zonePrefixes.some((p) => column.startsWith(p))) {
    const zone = column.slice(0, at);
    const measurement = column.slice(at + sep.length);
    if (zone && measurement) return { kind: 'zone', column, zone, measurement };
    return { kind: 'ignored', column };
  }

  if (schema.outdoorColumns.includes(column)) return { kind: 'outdoor', column };

  return { kind: 'ignored', column };
}

export function classifyColumns(columns: string[], schema: ClassifierSchema): ColumnKind[] {
  return columns.map((c) => classifyColumn(c, schema));
}
