import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { crawlArgsSchema } from './crawl.js';
import { countOutcomes, formatStatus, runStatusAction, statusArgsSchema } from './status.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-status-action');

describe('status action', () => {
  beforeEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('counts outcomes', () => {
    expect(countOutcomes(['success', 'fail', 'success', 'not_started'])).toEqual({
      not_started: 1,
      success: 2,
      empty: 0,
      fail: 1,
    });
  });

  it('formats the counts', () => {
    expect(
      formatStatus('citing', { not_started: 1, success: 2, empty: 0, fail: 1 }, 'live'),
    ).toBe(
      [
        'Stage citing: 4 units (live)',
        '  success:     2',
        '  empty:       0',
        '  fail:        1',
        '  not_started: 1',
      ].join('\n'),
    );
  });

  it('requires a known stage', () => {
    const parsed = statusArgsSchema.safeParse({ stage: 'combine' });

    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.message).toBe(
      'Missing or invalid --stage. Use one of: titles, miscited, citing, references.',
    );
  });

  it('reads live markers for discovered units', async () => {
    const parent = join(TEST_DIR, 'miscited_downloads', 'C1');
    mkdirSync(parent, { recursive: true });
    writeFileSync(join(parent, 'C1.csv'), 'EID\nM1\nM2\nM3\n');
    const done = join(TEST_DIR, 'citing_downloads', 'C1', 'M1');
    mkdirSync(done, { recursive: true });
    writeFileSync(join(done, 'success.txt'), '');
    mkdirSync(join(TEST_DIR, 'citing_downloads', 'C1', 'M2'), { recursive: true });
    const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const exitCode = await runStatusAction(
      { stage: 'citing', dataDir: TEST_DIR, logLevel: 'silent' },
      {},
    );

    expect(exitCode).toBe(0);
    expect(output).toHaveBeenCalledWith(
      formatStatus('citing', { not_started: 1, success: 1, empty: 0, fail: 1 }, 'live'),
    );
  });

  it('falls back to the last report when the input is gone', async () => {
    const root = join(TEST_DIR, 'references_of_citing_download');
    mkdirSync(root, { recursive: true });
    writeFileSync(join(root, 'status.csv'), 'CitingEID,Status\nK1,success\nK2,empty\n');
    const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const exitCode = await runStatusAction(
      { stage: 'references', dataDir: TEST_DIR, logLevel: 'silent' },
      {},
    );

    expect(exitCode).toBe(0);
    expect(output).toHaveBeenCalledWith(
      formatStatus(
        'references',
        { not_started: 0, success: 1, empty: 1, fail: 0 },
        join(root, 'status.csv'),
      ),
    );
  });

  it('exits with 1 on invalid configuration', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const exitCode = await runStatusAction(
      { stage: 'titles', dataDir: TEST_DIR },
      { CRAWLER_CONCURRENCY: 'many' },
    );

    expect(exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith(
      'Invalid configuration: CRAWLER_CONCURRENCY: Invalid concurrency. Provide an integer.',
    );
  });
});

describe('crawl arguments', () => {
  it('coerces numbers and booleans from option strings', () => {
    expect(
      crawlArgsSchema.parse({ concurrency: '3', chunkSize: '50', headless: 'FALSE', logLevel: 'Debug' }),
    ).toEqual({ concurrency: 3, chunkSize: 50, headless: false, logLevel: 'debug' });
  });

  it('rejects a non-positive concurrency', () => {
    const parsed = crawlArgsSchema.safeParse({ concurrency: '0' });

    expect(parsed.error?.issues[0]?.message).toBe('Invalid --concurrency. Provide an integer >= 1.');
  });

  it('drops a blank data directory', () => {
    expect(crawlArgsSchema.parse({ dataDir: '  ' })).toEqual({});
  });
});
