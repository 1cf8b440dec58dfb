import fs from 'fs/promises';
import path from 'path';

export type CsvValue = string | number | boolean | null | undefined;

function formatValue(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvLine(values: CsvValue[]): string {
  return values.map(formatValue).join(',');
}

export function toCsv<T extends object>(columns: (keyof T & string)[], rows: T[]): string {
  const lines = [toCsvLine(columns)];
  for (const row of rows) {
    lines.push(toCsvLine(columns.map((column) => csvValue(row[column]))));
  }
  return `${lines.join('\n')}\n`;
}

function csvValue(value: unknown): CsvValue {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return JSON.stringify(value);
}

export async function writeCsv<T extends object>(filePath: string, columns: (keyof T & string)[], rows: T[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, toCsv(columns, rows));
}

/**
 * Appends rows, writing the header first when the file is new.
 */
export async function appendCsv<T extends object>(filePath: string, columns: (keyof T & string)[], rows: T[]): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  let exists = true;
  try {
    await fs.access(filePath);
  } catch {
    exists = false;
  }
  const body = rows.map((row) => toCsvLine(columns.map((column) => csvValue(row[column])))).join('\n');
  const header = exists ? '' : `${toCsvLine(columns)}\n`;
  await fs.appendFile(filePath, `${header}${body}${body ? '\n' : ''}`);
}

export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }
  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export function parseCsvRecords(text: string): Record<string, string>[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];
  return rows.map((row) => Object.fromEntries(header.map((column, i): [string, string] => [column, row[i] ?? ''])));
}
