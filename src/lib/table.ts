/**
 * Row tables for persisted pipeline state.
 *
 * One row per feature: a `geometry` column with the GeoJSON geometry as text
 * and one column per property. The column set is the sorted union of property
 * keys across all rows; a row without a key leaves the cell empty.
 */
import fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { Properties, RecordFeature, Scalar } from './types';

const GEOMETRY_COLUMN = 'geometry';

const PositionSchema = z.array(z.number()).min(2);

const GeometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(PositionSchema)) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(z.array(PositionSchema))) }),
]);

// ==========================================
// WRITING
// ==========================================

function escapeCsv(value: Scalar | undefined): string {
  if (value === null || value === undefined) return '';
  const s = String(value);
  if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

export function tableColumns(rows: RecordFeature[]): string[] {
  const keys = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row.properties)) {
      if (key !== GEOMETRY_COLUMN) keys.add(key);
    }
  }
  return [GEOMETRY_COLUMN, ...Array.from(keys).sort()];
}

export function featuresToCsv(rows: RecordFeature[]): string {
  const columns = tableColumns(rows);
  const lines = [columns.join(',')];
  for (const row of rows) {
    lines.push(
      columns
        .map((column) => escapeCsv(column === GEOMETRY_COLUMN ? JSON.stringify(row.geometry) : row.properties[column]))
        .join(',')
    );
  }
  return lines.join('\n') + '\n';
}

export async function writeTable(filePath: string, rows: RecordFeature[]): Promise<void> {
  await fs.writeFile(filePath, featuresToCsv(rows), 'utf-8');
  console.log(`[Table] Wrote ${rows.length} rows to ${filePath}`);
}

// ==========================================
// READING
// ==========================================

/** Split CSV text into records of raw fields, honouring quotes */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => !(r.length === 1 && r[0] === ''));
}

export function parseScalar(raw: string): Scalar {
  if (raw === '') return null;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  const n = Number(raw);
  return Number.isFinite(n) && raw.trim() !== '' ? n : raw;
}

export function csvToFeatures(text: string, source = 'table'): RecordFeature[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  const geometryIndex = header.indexOf(GEOMETRY_COLUMN);
  if (geometryIndex === -1) {
    throw new ConfigurationError(`${source} has no "${GEOMETRY_COLUMN}" column`);
  }

  return rows.map((fields, line) => {
    const geometry = GeometrySchema.safeParse(JSON.parse(fields[geometryIndex] ?? 'null'));
    if (!geometry.success) {
      throw new ConfigurationError(`${source} row ${line + 1}: invalid geometry (${geometry.error.message})`);
    }
    const properties: Properties = {};
    header.forEach((column, i) => {
      if (i !== geometryIndex) properties[column] = parseScalar(fields[i] ?? '');
    });
    return { type: 'Feature', geometry: geometry.data, properties };
  });
}

export async function readTable(filePath: string): Promise<RecordFeature[]> {
  const rows = csvToFeatures(await fs.readFile(filePath, 'utf-8'), filePath);
  console.log(`[Table] Loaded ${rows.length} rows from ${filePath}`);
  return rows;
}
