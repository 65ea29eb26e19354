import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { StatusLedger } from './status-ledger.js';
import type { WorkUnit } from './types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-status-ledger');

function unit(parentKey: string, unitKey: string): WorkUnit {
  return { parentKey, unitKey, attributes: {} };
}

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe('StatusLedger', () => {
  let ledger: StatusLedger;

  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
    ledger = new StatusLedger({
      root: TEST_DIR,
      parentColumn: 'Cited',
      unitColumn: 'Miscited',
      artifactExtension: '.csv',
    });
  });

  afterEach(() => {
    cleanup();
  });

  it('reports not_started when the location is missing', () => {
    expect(ledger.outcomeOf(unit('A', 'x'))).toBe('not_started');
  });

  it('reports fail for a location without markers', () => {
    ledger.ensureLocation(unit('A', 'x'));

    expect(ledger.outcomeOf(unit('A', 'x'))).toBe('fail');
    expect(ledger.isTerminal(unit('A', 'x'))).toBe(false);
  });

  it('reports success and empty from markers', () => {
    ledger.ensureLocation(unit('A', 'x'));
    ledger.ensureLocation(unit('A', 'y'));

    expect(ledger.markSuccess(unit('A', 'x'))).toBe(true);
    expect(ledger.markEmpty(unit('A', 'y'))).toBe(true);

    expect(ledger.outcomeOf(unit('A', 'x'))).toBe('success');
    expect(ledger.outcomeOf(unit('A', 'y'))).toBe('empty');
    expect(ledger.isTerminal(unit('A', 'y'))).toBe(true);
  });

  it('success wins when both markers exist', () => {
    ledger.ensureLocation(unit('A', 'x'));
    ledger.markEmpty(unit('A', 'x'));
    ledger.markSuccess(unit('A', 'x'));

    expect(ledger.outcomeOf(unit('A', 'x'))).toBe('success');
  });

  it('marking twice keeps the existing marker contents', () => {
    const location = ledger.ensureLocation(unit('A', 'x'));
    writeFileSync(join(location, 'success.txt'), 'kept');

    expect(ledger.markSuccess(unit('A', 'x'))).toBe(true);
    expect(readFileSync(join(location, 'success.txt'), 'utf-8')).toBe('kept');
  });

  it('returns false when the marker cannot be written', () => {
    expect(ledger.markSuccess(unit('B', 'missing'))).toBe(false);
    expect(ledger.outcomeOf(unit('B', 'missing'))).toBe('not_started');
  });

  it('places artifacts under the unit location', () => {
    expect(ledger.artifactPath(unit('A', 'x'))).toBe(
      join(TEST_DIR, 'A', 'x', 'x.csv'),
    );
  });

  it('snapshot writes one row per unit in order', () => {
    ledger.ensureLocation(unit('A', 'x'));
    ledger.markSuccess(unit('A', 'x'));
    ledger.ensureLocation(unit('A', 'y'));

    const rows = ledger.snapshot([unit('A', 'x'), unit('A', 'y'), unit('B', 'z')]);

    expect(rows).toEqual([
      { parentKey: 'A', unitKey: 'x', status: 'success' },
      { parentKey: 'A', unitKey: 'y', status: 'fail' },
      { parentKey: 'B', unitKey: 'z', status: 'not_started' },
    ]);
    expect(readFileSync(ledger.reportPath, 'utf-8')).toBe(
      'Cited,Miscited,Status\nA,x,success\nA,y,fail\nB,z,not_started\n',
    );
    expect(existsSync(`${ledger.reportPath}.tmp`)).toBe(false);
  });

  it('snapshot reflects later marker changes', () => {
    ledger.ensureLocation(unit('A', 'x'));
    ledger.snapshot([unit('A', 'x')]);

    ledger.markEmpty(unit('A', 'x'));
    ledger.snapshot([unit('A', 'x')]);

    expect(readFileSync(ledger.reportPath, 'utf-8')).toBe(
      'Cited,Miscited,Status\nA,x,empty\n',
    );
  });

  it('readSnapshot parses the written report', async () => {
    ledger.ensureLocation(unit('A', 'x'));
    ledger.markEmpty(unit('A', 'x'));
    ledger.snapshot([unit('A', 'x'), unit('A', 'y')]);

    await expect(ledger.readSnapshot()).resolves.toEqual([
      { parentKey: 'A', unitKey: 'x', status: 'empty' },
      { parentKey: 'A', unitKey: 'y', status: 'not_started' },
    ]);
  });

  it('readSnapshot returns an empty list without a report', async () => {
    await expect(ledger.readSnapshot()).resolves.toEqual([]);
  });

  it('single-key layout has no parent column', () => {
    const single = new StatusLedger({
      root: TEST_DIR,
      unitColumn: 'EID',
      artifactExtension: '.txt',
      reportFileName: 'titles_status.csv',
    });
    const eid: WorkUnit = { unitKey: '2-s2.0-1', attributes: {} };
    single.ensureLocation(eid);
    single.markSuccess(eid);

    single.snapshot([eid]);

    expect(single.locationOf(eid)).toBe(join(TEST_DIR, '2-s2.0-1'));
    expect(readFileSync(join(TEST_DIR, 'titles_status.csv'), 'utf-8')).toBe(
      'EID,Status\n2-s2.0-1,success\n',
    );
  });
});
