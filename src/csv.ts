// src/csv.ts
import Papa from 'papaparse';
import { isExists } from 'date-fns';
import { SourceParseError } from './errors.js';
import type { SourceRow, SourceTable } from './types.js';

// yyyy-MM-dd[( |T)HH:mm[:ss]], yyyy/MM/dd HH:mm:ss, dd.MM.yyyy HH:mm
const ACCEPTED_TS_LAYOUTS = [
  /^(?<y>\d{4})-(?<m>\d{1,2})-(?<d>\d{1,2})(?:[ T](?<H>\d{1,2}):(?<M>\d{1,2})(?::(?<S>\d{1,2}))?)?$/,
  /^(?<y>\d{4})\/(?<m>\d{1,2})\/(?<d>\d{1,2}) (?<H>\d{1,2}):(?<M>\d{1,2}):(?<S>\d{1,2})$/,
  /^(?<d>\d{1,2})\.(?<m>\d{1,2})\.(?<y>\d{4}) (?<H>\d{1,2}):(?<M>\d{1,2})$/,
];

const MISSING = new Set(['', 'na', 'nan', 'null', 'none']);

const pad = (n: number, width = 2) => String(n).padStart(width, '0');
const num = (v: string | undefined) => Number(v ?? 0);

/**
 * Parses a source timestamp and renders it as `yyyy-MM-dd HH:mm:ss`, or null if no layout fits.
 * Wall-clock fields are copied as they are, never through a local-time Date.
 */
export function normalizeTimestamp(raw: string): string | null {
  const s = raw.trim();
  if (!s) return null;
  for (const layout of ACCEPTED_TS_LAYOUTS) {
    const g = layout.exec(s)?.groups;
    if (!g) continue;
    const y = num(g.y);
    const m = num(g.m);
    const d = num(g.d);
    const H = num(g.H);
    const M = num(g.M);
    const S = num(g.S);
    if (!isExists(y, m - 1, d) || H > 23 || M > 59 || S > 59) return null;
    return `${pad(y, 4)}-${pad(m)}-${pad(d)} ${pad(H)}:${pad(M)}:${pad(S)}`;
  }
  return null;
}

/** Missing markers and anything that is not a finite number read as null. */
export function parseCell(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const s = raw.trim();
  if (MISSING.has(s.toLowerCase())) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/**
 * Reads a wide-format CSV: one row per timestamp, one column per variable.
 * Any malformed row or timestamp fails the whole read.
 */
export function readSourceCsv(text: string, timestampColumn: string): SourceTable {
  const res = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    dynamicTyping: false,
    delimiter: ',',
    transformHeader: (h) => h.trim(),
  });

  const firstError = res.errors[0];
  if (firstError) {
    // papaparse rows are 0-based data rows
    throw new SourceParseError(firstError.message, firstError.row === undefined ? undefined : firstError.row + 1);
  }

  const headers = res.meta.fields ?? [];
  if (!headers.includes(timestampColumn)) {
    throw new SourceParseError(`missing timestamp column "${timestampColumn}"`);
  }
  const columns = headers.filter((h) => h !== timestampColumn);

  const rows: SourceRow[] = res.data.map((raw, i) => {
    const tsRaw = raw[timestampColumn] ?? '';
    const ts = normalizeTimestamp(tsRaw);
    if (!ts) throw new SourceParseError(`cannot parse ${timestampColumn} "${tsRaw}"`, i + 1);

    const cells: Record<string, number | null> = {};
    for (const col of columns) cells[col] = parseCell(raw[col]);
    return { ts, cells };
  });

  return { columns, rows };
}
