import { existsSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import type { WorkUnit } from '../pipeline/types.js';
import { readCsvRows, type CsvRow } from '../utils/csv.js';
import { isSafePathSegment, unitId } from '../utils/work-unit.js';

const log = createLogger('Discovery');

type TableDiscoveryOptions = {
  /** Column holding the unit key, e.g. `EID`. */
  keyColumn: string;
  /** Extra columns carried on each unit as attributes. */
  attributeColumns?: readonly string[];
};

/**
 * Ordered, de-duplicated accumulator; first occurrence of a unit wins.
 */
class WorkUnitCollector {
  private readonly seen: Set<string>;
  private readonly units: WorkUnit[];

  constructor() {
    this.seen = new Set();
    this.units = [];
  }

  add(unit: WorkUnit): boolean {
    const id = unitId(unit);
    if (this.seen.has(id)) {
      return false;
    }

    this.seen.add(id);
    this.units.push(unit);
    return true;
  }

  get size(): number {
    return this.units.length;
  }

  toArray(): WorkUnit[] {
    return [...this.units];
  }
}

function pickAttributes(
  row: CsvRow,
  columns: readonly string[] | undefined,
): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const column of columns ?? []) {
    attributes[column] = (row[column] ?? '').trim();
  }
  return attributes;
}

function listChildDirectories(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort();
}

async function collectRows(
  collector: WorkUnitCollector,
  file: string,
  options: TableDiscoveryOptions,
  parentKey?: string,
): Promise<void> {
  let rows: CsvRow[];
  try {
    rows = await readCsvRows(file);
  } catch (error) {
    log.warn(`Could not read ${file}, skipping:`, errorMessage(error));
    return;
  }

  for (const row of rows) {
    const unitKey = (row[options.keyColumn] ?? '').trim();
    if (!unitKey) {
      continue;
    }

    if (!isSafePathSegment(unitKey)) {
      log.warn(`Skipping key that is not a plain path segment: "${unitKey}"`);
      continue;
    }

    collector.add({
      ...(parentKey === undefined ? {} : { parentKey }),
      unitKey,
      attributes: pickAttributes(row, options.attributeColumns),
    });
  }
}

/**
 * Units listed in a single table (single-key stages).
 */
export async function discoverFromTable(
  file: string,
  options: TableDiscoveryOptions,
): Promise<WorkUnit[]> {
  if (!existsSync(file)) {
    log.warn(`Input table '${file}' not found. Nothing to do.`);
    return [];
  }

  const collector = new WorkUnitCollector();
  await collectRows(collector, file, options);

  log.info(`Discovered ${collector.size} units in ${file}`);
  return collector.toArray();
}

/**
 * Scans `root/<ParentKey>/<ParentKey>.csv` and yields (ParentKey, UnitKey)
 * units, parents in name order and rows in file order.
 */
export async function discoverFromParentTables(
  root: string,
  options: TableDiscoveryOptions,
): Promise<WorkUnit[]> {
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    log.warn(`No '${root}' folder found. Nothing to do.`);
    return [];
  }

  const collector = new WorkUnitCollector();

  for (const parentKey of listChildDirectories(root)) {
    const file = join(root, parentKey, `${parentKey}.csv`);
    if (!existsSync(file)) {
      continue;
    }

    await collectRows(collector, file, options, parentKey);
  }

  log.info(`Discovered ${collector.size} (parent, unit) pairs under ${root}`);
  return collector.toArray();
}

/**
 * Scans `root/<ParentKey>/<UnitKey>/<UnitKey>.csv` (the layout a two-level
 * stage leaves behind) and flattens every listed key into a single-key unit.
 */
export async function discoverFromUnitTables(
  root: string,
  options: TableDiscoveryOptions,
): Promise<WorkUnit[]> {
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    log.warn(`No '${root}' folder found. Nothing to do.`);
    return [];
  }

  const collector = new WorkUnitCollector();

  for (const parentKey of listChildDirectories(root)) {
    for (const childKey of listChildDirectories(join(root, parentKey))) {
      const file = join(root, parentKey, childKey, `${childKey}.csv`);
      if (!existsSync(file)) {
        log.debug(`No table at ${file}, skipping`);
        continue;
      }

      await collectRows(collector, file, options);
    }
  }

  log.info(`Discovered ${collector.size} units under ${root}`);
  return collector.toArray();
}

export { WorkUnitCollector };
export type { TableDiscoveryOptions };
