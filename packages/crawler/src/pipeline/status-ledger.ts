import {
  existsSync,
  mkdirSync,
  renameSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import { formatCsv, readCsvRows } from '../utils/csv.js';
import { unitLabel } from '../utils/work-unit.js';
import type { LedgerLayout, StatusRow, UnitOutcome, WorkUnit } from './types.js';

const log = createLogger('StatusLedger');

const SUCCESS_MARKER = 'success.txt';
const EMPTY_MARKER = 'empty.txt';
const DEFAULT_REPORT_FILE = 'status.csv';
const STATUS_COLUMN = 'Status';

const OUTCOMES: readonly UnitOutcome[] = ['not_started', 'success', 'empty', 'fail'];

function isUnitOutcome(value: string): value is UnitOutcome {
  return OUTCOMES.some((outcome) => outcome === value);
}

/**
 * Filesystem-backed record of each unit's terminal state. Nothing is cached:
 * every query re-reads the markers.
 */
export class StatusLedger {
  private readonly layout: LedgerLayout;

  constructor(layout: LedgerLayout) {
    this.layout = layout;
  }

  get root(): string {
    return this.layout.root;
  }

  get reportPath(): string {
    return join(this.layout.root, this.layout.reportFileName ?? DEFAULT_REPORT_FILE);
  }

  locationOf(unit: WorkUnit): string {
    return unit.parentKey === undefined
      ? join(this.layout.root, unit.unitKey)
      : join(this.layout.root, unit.parentKey, unit.unitKey);
  }

  artifactPath(unit: WorkUnit): string {
    return join(
      this.locationOf(unit),
      `${unit.unitKey}${this.layout.artifactExtension}`,
    );
  }

  outcomeOf(unit: WorkUnit): UnitOutcome {
    const location = this.locationOf(unit);
    if (!existsSync(location)) {
      return 'not_started';
    }

    if (existsSync(join(location, SUCCESS_MARKER))) {
      return 'success';
    }

    if (existsSync(join(location, EMPTY_MARKER))) {
      return 'empty';
    }

    return 'fail';
  }

  isTerminal(unit: WorkUnit): boolean {
    const outcome = this.outcomeOf(unit);
    return outcome === 'success' || outcome === 'empty';
  }

  ensureLocation(unit: WorkUnit): string {
    const location = this.locationOf(unit);
    mkdirSync(location, { recursive: true });
    return location;
  }

  markSuccess(unit: WorkUnit): boolean {
    return this.touchMarker(unit, SUCCESS_MARKER);
  }

  markEmpty(unit: WorkUnit): boolean {
    return this.touchMarker(unit, EMPTY_MARKER);
  }

  /**
   * Rewrites the whole report from current marker state (temp file + rename).
   */
  snapshot(units: readonly WorkUnit[]): StatusRow[] {
    const rows: StatusRow[] = units.map((unit) => ({
      ...(unit.parentKey === undefined ? {} : { parentKey: unit.parentKey }),
      unitKey: unit.unitKey,
      status: this.outcomeOf(unit),
    }));

    const header = this.reportHeader();
    const content = formatCsv(
      header,
      rows.map((row) =>
        this.layout.parentColumn === undefined
          ? [row.unitKey, row.status]
          : [row.parentKey ?? '', row.unitKey, row.status],
      ),
    );

    const reportPath = this.reportPath;
    const tmpPath = `${reportPath}.tmp`;

    try {
      mkdirSync(this.layout.root, { recursive: true });
      writeFileSync(tmpPath, content, 'utf-8');
      renameSync(tmpPath, reportPath);
      log.info(`Wrote ${rows.length} rows to ${reportPath}`);
    } catch (error) {
      log.error(`Could not write ${reportPath}:`, errorMessage(error));
    }

    return rows;
  }

  async readSnapshot(): Promise<StatusRow[]> {
    if (!existsSync(this.reportPath)) {
      return [];
    }

    const rows: StatusRow[] = [];
    for (const record of await readCsvRows(this.reportPath)) {
      const unitKey = record[this.layout.unitColumn];
      const status = record[STATUS_COLUMN];
      if (!unitKey || !status || !isUnitOutcome(status)) {
        continue;
      }

      const parentKey =
        this.layout.parentColumn === undefined
          ? undefined
          : record[this.layout.parentColumn];

      rows.push({
        ...(parentKey === undefined ? {} : { parentKey }),
        unitKey,
        status,
      });
    }

    return rows;
  }

  private reportHeader(): string[] {
    return this.layout.parentColumn === undefined
      ? [this.layout.unitColumn, STATUS_COLUMN]
      : [this.layout.parentColumn, this.layout.unitColumn, STATUS_COLUMN];
  }

  private touchMarker(unit: WorkUnit, marker: string): boolean {
    const markerPath = join(this.locationOf(unit), marker);

    try {
      // 'a' creates the file when absent and leaves an existing one untouched.
      writeFileSync(markerPath, '', { flag: 'a' });
      return true;
    } catch (error) {
      log.error(
        `${unitLabel(unit)} Could not write ${marker}:`,
        errorMessage(error),
      );
      return false;
    }
  }
}

export { EMPTY_MARKER, SUCCESS_MARKER, isUnitOutcome };
