import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { escapeCsvField, formatCsv, readCsvRows } from './csv.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-csv');

describe('csv utils', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('quotes fields with separators, quotes or line breaks', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });

  it('formats a header and rows with a trailing newline', () => {
    expect(formatCsv(['EID', 'Status'], [['A', 'success'], ['B,C', 'fail']])).toBe(
      'EID,Status\nA,success\n"B,C",fail\n',
    );
  });

  it('reads rows keyed by trimmed header without the byte order mark', async () => {
    const file = join(TEST_DIR, 'table.csv');
    writeFileSync(file, '\uFEFF EID ,Title\n2-s2.0-1,"Graph, Theory"\n');

    await expect(readCsvRows(file)).resolves.toEqual([
      { EID: '2-s2.0-1', Title: 'Graph, Theory' },
    ]);
  });

  it('rejects when the file is missing', async () => {
    await expect(readCsvRows(join(TEST_DIR, 'missing.csv'))).rejects.toThrow('ENOENT');
  });
});
