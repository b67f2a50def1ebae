import { Readable } from 'node:stream';
import ExcelJS from 'exceljs';
import mammoth from 'mammoth';

export const SUPPORTED_EXTENSIONS = ['pdf', 'docx', 'txt', 'csv', 'xlsx'] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export type ExtractionResult = {
  text: string;
  error?: string;
};

type Cell = string | number | boolean | Date | null;

export type Table = {
  columns: string[];
  rows: Cell[][];
};

const SAMPLE_ROWS = 5;

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : '';
}

function isSupported(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

function normalizeCell(value: ExcelJS.CellValue): Cell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if ('richText' in value) return value.richText.map((run) => run.text).join('');
  if ('hyperlink' in value) return value.text;
  if ('result' in value) {
    const result = value.result;
    if (result === undefined || (typeof result === 'object' && !(result instanceof Date))) {
      return null;
    }
    return result;
  }
  if ('error' in value) return null;
  return null;
}

export function worksheetToTable(worksheet: ExcelJS.Worksheet): Table {
  const columnCount = worksheet.columnCount;
  const header = worksheet.getRow(1);
  const columns = Array.from({ length: columnCount }, (_, index) => {
    const label = normalizeCell(header.getCell(index + 1).value);
    return label === null ? `Column ${index + 1}` : String(label).trim();
  });

  const rows: Cell[][] = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber += 1) {
    const row = worksheet.getRow(rowNumber);
    const cells = columns.map((_, index) => normalizeCell(row.getCell(index + 1).value));
    if (cells.some((cell) => cell !== null && cell !== '')) {
      rows.push(cells);
    }
  }

  return { columns, rows };
}

function formatCell(cell: Cell): string {
  if (cell === null) return '';
  if (cell instanceof Date) return cell.toISOString().slice(0, 10);
  return String(cell);
}

function round(value: number): string {
  return Number.isFinite(value) ? String(Number(value.toFixed(2))) : 'NaN';
}

function quantile(sorted: number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function describeNumbers(values: number[]): string {
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = sorted.reduce((sum, value) => sum + value, 0) / count;
  const variance =
    count > 1 ? sorted.reduce((sum, value) => sum + (value - mean) ** 2, 0) / (count - 1) : Number.NaN;
  return [
    `count=${count}`,
    `mean=${round(mean)}`,
    `std=${round(Math.sqrt(variance))}`,
    `min=${round(sorted[0])}`,
    `25%=${round(quantile(sorted, 0.25))}`,
    `50%=${round(quantile(sorted, 0.5))}`,
    `75%=${round(quantile(sorted, 0.75))}`,
    `max=${round(sorted[count - 1])}`,
  ].join(', ');
}

function numericColumn(table: Table, index: number): number[] | null {
  const values: number[] = [];
  for (const row of table.rows) {
    const cell = row[index];
    if (cell === null || cell === '') continue;
    if (typeof cell !== 'number') return null;
    values.push(cell);
  }
  return values.length > 0 ? values : null;
}

export function summarizeTable(table: Table): string {
  const lines = [
    'Data Summary:',
    `Shape: ${table.rows.length} rows, ${table.columns.length} columns`,
    `Columns: ${table.columns.join(', ')}`,
    '',
    'Sample Data:',
    table.columns.join(' | '),
    ...table.rows.slice(0, SAMPLE_ROWS).map((row) => row.map(formatCell).join(' | ')),
  ];

  const stats = table.columns.flatMap((column, index) => {
    const values = numericColumn(table, index);
    return values ? [`${column}: ${describeNumbers(values)}`] : [];
  });
  if (stats.length > 0) {
    lines.push('', 'Numeric Statistics:', ...stats);
  }

  return lines.join('\n');
}

async function readSpreadsheet(bytes: Buffer, extension: 'csv' | 'xlsx'): Promise<Table> {
  const workbook = new ExcelJS.Workbook();
  if (extension === 'csv') {
    const worksheet = await workbook.csv.read(Readable.from(bytes));
    return worksheetToTable(worksheet);
  }
  await workbook.xlsx.load(bytes);
  const worksheet = workbook.worksheets[0];
  if (!worksheet) {
    throw new Error('Workbook contains no worksheets');
  }
  return worksheetToTable(worksheet);
}

async function readPdf(bytes: Buffer): Promise<string> {
  const { default: pdfParse } = await import('pdf-parse');
  const result = await pdfParse(bytes);
  return result.text;
}

async function extract(bytes: Buffer, extension: SupportedExtension): Promise<string> {
  switch (extension) {
    case 'pdf':
      return readPdf(bytes);
    case 'docx': {
      const result = await mammoth.extractRawText({ buffer: bytes });
      return result.value;
    }
    case 'txt':
      return bytes.toString('utf-8');
    case 'csv':
    case 'xlsx':
      return summarizeTable(await readSpreadsheet(bytes, extension));
  }
}

/**
 * Turns an uploaded supporting document into plain text for the prompt.
 * Problems never throw: the caller gets an empty string and a message to show.
 */
export async function extractDocumentText(bytes: Buffer, fileName: string): Promise<ExtractionResult> {
  const extension = fileExtension(fileName);
  if (!isSupported(extension)) {
    return { text: '', error: `Unsupported file type: ${extension || 'unknown'}` };
  }

  try {
    return { text: await extract(bytes, extension) };
  } catch (err) {
    console.warn(`[extraction] failed to read ${fileName}`, err);
    const message = err instanceof Error ? err.message : String(err);
    return { text: '', error: `Error processing file: ${message}` };
  }
}
