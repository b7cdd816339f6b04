export type CellValue = string | number | boolean | Date | null;

export type HyperColumnType = 'BOOL' | 'BIGINT' | 'DOUBLE PRECISION' | 'TIMESTAMP' | 'TEXT';

export interface HyperColumn {
  name: string;
  type: HyperColumnType;
}

export const EXTRACT_ALIAS = 'extract';
export const EXTRACT_SCHEMA = 'Extract';
export const EXTRACT_TABLE = 'Extract';
export const INSERT_BATCH_SIZE = 500;

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/** Blank headers become `Unnamed: <i>`; repeats become `<name>.<n>`. */
export function normalizeHeaders(raw: readonly unknown[], width: number): string[] {
  const used = new Set<string>();
  const headers: string[] = [];
  for (let i = 0; i < width; i++) {
    const value = raw[i];
    const base = value === null || value === undefined || String(value).trim() === '' ? `Unnamed: ${i}` : String(value);
    let name = base;
    for (let n = 1; used.has(name); n++) {
      name = `${base}.${n}`;
    }
    used.add(name);
    headers.push(name);
  }
  return headers;
}

export function inferColumnType(values: readonly CellValue[]): HyperColumnType {
  const present = values.filter((v): v is Exclude<CellValue, null> => v !== null);
  if (present.length === 0) return 'TEXT';
  if (present.every((v) => typeof v === 'boolean')) return 'BOOL';
  if (present.every((v) => typeof v === 'number' && Number.isSafeInteger(v))) return 'BIGINT';
  if (present.every((v) => typeof v === 'number' && Number.isFinite(v))) return 'DOUBLE PRECISION';
  if (present.every((v) => v instanceof Date && !isNaN(v.getTime()))) return 'TIMESTAMP';
  return 'TEXT';
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** Wall-clock fields, since the reader builds date cells in local time. */
function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
  return `${day} ${time}`;
}

export function formatValue(value: CellValue, type: HyperColumnType): string {
  if (value === null) return 'NULL';
  switch (type) {
    case 'BOOL':
      return value ? 'TRUE' : 'FALSE';
    case 'BIGINT':
    case 'DOUBLE PRECISION':
      return String(value);
    case 'TIMESTAMP':
      return value instanceof Date ? quoteLiteral(formatTimestamp(value)) : 'NULL';
    case 'TEXT':
      return quoteLiteral(value instanceof Date ? formatTimestamp(value) : String(value));
  }
}

export function tableName(): string {
  return [EXTRACT_ALIAS, EXTRACT_SCHEMA, EXTRACT_TABLE].map(quoteIdentifier).join('.');
}

export function createTableStatement(columns: readonly HyperColumn[]): string {
  const definitions = columns.map((col) => `${quoteIdentifier(col.name)} ${col.type}`);
  return `CREATE TABLE ${tableName()} (${definitions.join(', ')})`;
}

export function insertStatements(
  columns: readonly HyperColumn[],
  rows: readonly (readonly CellValue[])[],
  batchSize: number = INSERT_BATCH_SIZE,
): string[] {
  const statements: string[] = [];
  const columnList = columns.map((col) => quoteIdentifier(col.name)).join(', ');
  for (let start = 0; start < rows.length; start += batchSize) {
    const tuples = rows
      .slice(start, start + batchSize)
      .map((row) => `(${columns.map((col, i) => formatValue(row[i] ?? null, col.type)).join(', ')})`);
    statements.push(`INSERT INTO ${tableName()} (${columnList}) VALUES ${tuples.join(', ')}`);
  }
  return statements;
}

/** Full statement sequence that (re)creates the extract file at `databasePath`. */
export function extractStatements(
  databasePath: string,
  columns: readonly HyperColumn[],
  rows: readonly (readonly CellValue[])[],
): string[] {
  const database = quoteIdentifier(databasePath);
  const alias = quoteIdentifier(EXTRACT_ALIAS);
  return [
    `DROP DATABASE IF EXISTS ${database}`,
    `CREATE DATABASE ${database}`,
    `ATTACH DATABASE ${quoteLiteral(databasePath)} AS ${alias}`,
    `CREATE SCHEMA ${alias}.${quoteIdentifier(EXTRACT_SCHEMA)}`,
    createTableStatement(columns),
    ...insertStatements(columns, rows),
    `DETACH DATABASE ${alias}`,
  ];
}
