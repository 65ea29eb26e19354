import type { WorkUnit } from '../pipeline/types.js';

export function unitId(unit: WorkUnit): string {
  return unit.parentKey === undefined
    ? unit.unitKey
    : `${unit.parentKey}/${unit.unitKey}`;
}

export function unitLabel(unit: WorkUnit): string {
  return unit.parentKey === undefined
    ? `[${unit.unitKey}]`
    : `[${unit.parentKey} -> ${unit.unitKey}]`;
}

/**
 * Keys become directory names, so only plain single segments are accepted.
 */
export function isSafePathSegment(value: string): boolean {
  if (value.length === 0 || value === '.' || value === '..') {
    return false;
  }

  return !/[/\\\0]/.test(value);
}
