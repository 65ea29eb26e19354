import { createReadStream } from 'node:fs';
import csvParser from 'csv-parser';

type CsvRow = Record<string, string>;

export function readCsvRows(path: string): Promise<CsvRow[]> {
  return new Promise((resolve, reject) => {
    const rows: CsvRow[] = [];

    createReadStream(path)
      .on('error', reject)
      .pipe(
        csvParser({
          mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
        }),
      )
      .on('data', (row: CsvRow) => rows.push(row))
      .on('end', () => resolve(rows))
      .on('error', reject);
  });
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [header, ...rows].map((fields) =>
    fields.map(escapeCsvField).join(','),
  );
  return `${lines.join('\n')}\n`;
}

export type { CsvRow };
