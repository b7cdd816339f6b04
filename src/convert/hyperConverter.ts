import { readFile } from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import { createLogger } from '../logger.js';
import type { HyperConnector } from './hyperConnection.js';
import { extractStatements, inferColumnType, normalizeHeaders } from './hyperSql.js';
import type { CellValue, HyperColumn } from './hyperSql.js';

const log = createLogger('Converter');

export interface ConversionResult {
  input_file: string;
  output_file: string;
  rows: number;
  columns: number;
  column_names: string[];
}

export interface ExtractConverter {
  /** Writes `<dir>/<stem>.hyper` beside the source unless `outputPath` is given. */
  convert(sourcePath: string, outputPath?: string): Promise<ConversionResult>;
}

export interface SheetData {
  columns: string[];
  rows: CellValue[][];
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return String(value);
}

/** First sheet of a workbook (or the CSV), first row as header. */
export async function readSheet(sourcePath: string): Promise<SheetData> {
  const workbook = XLSX.read(await readFile(sourcePath), { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new Error(`No sheets found in ${sourcePath}`);
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: null, blankrows: false });
  if (matrix.length === 0) {
    throw new Error(`No data found in ${sourcePath}`);
  }

  const width = matrix.reduce((max, row) => Math.max(max, row.length), 0);
  const [header = [], ...body] = matrix;
  const rows = body
    .map((row) => Array.from({ length: width }, (_, i) => toCell(row[i])))
    .filter((row) => row.some((cell) => cell !== null));

  return { columns: normalizeHeaders(header, width), rows };
}

export async function convertToHyper(
  sourcePath: string,
  outputPath: string | undefined,
  connect: HyperConnector,
): Promise<ConversionResult> {
  const target = outputPath ?? path.join(path.dirname(sourcePath), `${path.parse(sourcePath).name}.hyper`);
  const { columns, rows } = await readSheet(sourcePath);

  const typed: HyperColumn[] = columns.map((name, i) => ({
    name,
    type: inferColumnType(rows.map((row) => row[i] ?? null)),
  }));

  log.info({ action: 'convert.started', source: sourcePath, target, rows: rows.length, columns: columns.length }, 'Converting to Hyper');

  const connection = await connect();
  try {
    for (const statement of extractStatements(target, typed, rows)) {
      await connection.query(statement);
    }
  } finally {
    await connection.close();
  }

  log.info({ action: 'convert.completed', target }, 'Hyper extract written');

  return {
    input_file: sourcePath,
    output_file: target,
    rows: rows.length,
    columns: columns.length,
    column_names: columns,
  };
}

export class HyperConverter implements ExtractConverter {
  constructor(private readonly connect: HyperConnector) {}

  convert(sourcePath: string, outputPath?: string): Promise<ConversionResult> {
    return convertToHyper(sourcePath, outputPath, this.connect);
  }
}
