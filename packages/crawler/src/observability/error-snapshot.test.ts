import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  existsSync,
  mkdirSync,
  rmSync,
  readdirSync,
  readFileSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import {
  FailureSnapshotWriter,
  type FailureSnapshotData,
} from './error-snapshot.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-failure-snapshots');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

function makeSnapshotData(
  overrides?: Partial<FailureSnapshotData>,
): FailureSnapshotData {
  return {
    parentKey: 'A',
    unitKey: 'x',
    attempts: 5,
    errorClass: 'auth',
    errorMessage: 'Forbidden',
    timestamp: 1_700_000_000_000,
    ...overrides,
  };
}

function jsonFiles(dir: string): string[] {
  return readdirSync(dir).filter((file) => file.endsWith('.json'));
}

describe('FailureSnapshotWriter', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('writes a JSON file named after the unit and timestamp', () => {
    const writer = new FailureSnapshotWriter({ directory: TEST_DIR });
    writer.initialize();

    expect(writer.write('A/x', makeSnapshotData())).toBe(true);

    expect(jsonFiles(TEST_DIR)).toEqual(['A_x-1700000000000.json']);
    const content: unknown = JSON.parse(
      readFileSync(join(TEST_DIR, 'A_x-1700000000000.json'), 'utf-8'),
    );
    expect(content).toEqual(makeSnapshotData());
  });

  it('stops writing at the cap', () => {
    const writer = new FailureSnapshotWriter({
      directory: TEST_DIR,
      maxSnapshots: 3,
    });
    writer.initialize();

    for (let index = 0; index < 5; index++) {
      writer.write(`unit-${index}`, makeSnapshotData({ unitKey: `unit-${index}` }));
    }

    expect(jsonFiles(TEST_DIR)).toHaveLength(3);
    expect(writer.getSnapshotCount()).toBe(3);
  });

  it('counts snapshots left by earlier runs toward the cap', () => {
    writeFileSync(join(TEST_DIR, 'old-1.json'), '{}');
    writeFileSync(join(TEST_DIR, 'old-2.json'), '{}');
    const writer = new FailureSnapshotWriter({
      directory: TEST_DIR,
      maxSnapshots: 2,
    });
    writer.initialize();

    expect(writer.write('new', makeSnapshotData())).toBe(false);
  });

  it('creates the directory on first write', () => {
    const nestedDir = join(TEST_DIR, 'deep', '.errors');
    const writer = new FailureSnapshotWriter({ directory: nestedDir });
    writer.initialize();

    writer.write('auto', makeSnapshotData());

    expect(jsonFiles(nestedDir)).toHaveLength(1);
  });

  it('returns false when the directory cannot be created', () => {
    const blocker = join(TEST_DIR, 'blocker');
    writeFileSync(blocker, '');
    const writer = new FailureSnapshotWriter({ directory: join(blocker, 'errors') });

    expect(writer.write('fail', makeSnapshotData())).toBe(false);
  });
});
