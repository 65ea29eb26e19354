import type { UnitArtifact, UnitResult } from './types.js';

export function success(artifact: UnitArtifact): UnitResult {
  return { status: 'success', artifact };
}

export function empty(reason?: string): UnitResult {
  return reason === undefined ? { status: 'empty' } : { status: 'empty', reason };
}

export function failure(reason: string): UnitResult {
  return { status: 'failure', reason };
}
