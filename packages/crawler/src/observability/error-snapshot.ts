import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import type { ErrorClass } from '../anti-blocking/types.js';
import { errorMessage } from '../errors.js';

const log = createLogger('FailureSnapshots');

type FailureSnapshotData = {
  parentKey?: string;
  unitKey: string;
  attempts: number;
  /** Absent when the executor reported the failure itself. */
  errorClass?: ErrorClass;
  errorMessage: string;
  timestamp: number;
};

type FailureSnapshotConfig = {
  directory: string;
  maxSnapshots: number;
};

const DEFAULT_CONFIG: FailureSnapshotConfig = {
  directory: '.errors',
  maxSnapshots: 500,
};

/**
 * One JSON file per failed unit, capped so a broken run cannot fill the disk.
 */
export class FailureSnapshotWriter {
  private readonly config: FailureSnapshotConfig;
  private snapshotCount: number;

  constructor(config?: Partial<FailureSnapshotConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.snapshotCount = 0;
  }

  initialize(): void {
    this.snapshotCount = this.countExistingSnapshots();
  }

  write(id: string, data: FailureSnapshotData): boolean {
    if (this.snapshotCount >= this.config.maxSnapshots) {
      return false;
    }

    try {
      if (!existsSync(this.config.directory)) {
        mkdirSync(this.config.directory, { recursive: true });
      }

      const baseName = `${this.sanitizeFilename(id)}-${data.timestamp}`;
      const jsonPath = join(this.config.directory, `${baseName}.json`);
      writeFileSync(jsonPath, JSON.stringify(data, null, 2), 'utf-8');

      this.snapshotCount += 1;
      return true;
    } catch (error) {
      log.warn(`Could not write failure snapshot for ${id}:`, errorMessage(error));
      return false;
    }
  }

  getSnapshotCount(): number {
    return this.snapshotCount;
  }

  private countExistingSnapshots(): number {
    if (!existsSync(this.config.directory)) {
      return 0;
    }

    try {
      return readdirSync(this.config.directory).filter((file) =>
        file.endsWith('.json'),
      ).length;
    } catch (error) {
      log.warn(`Could not list ${this.config.directory}:`, errorMessage(error));
      return 0;
    }
  }

  private sanitizeFilename(value: string): string {
    return value.replace(/[^a-zA-Z0-9._-]/g, '_').slice(0, 100);
  }
}

export type { FailureSnapshotData, FailureSnapshotConfig };
