/**
 * One crawl task, keyed by (ParentKey, UnitKey) or by UnitKey alone for
 * single-key stages. Never mutated after discovery.
 */
type WorkUnit = {
  readonly parentKey?: string;
  readonly unitKey: string;
  readonly attributes: Readonly<Record<string, string>>;
};

type UnitOutcome = 'not_started' | 'success' | 'empty' | 'fail';

type StatusRow = {
  parentKey?: string;
  unitKey: string;
  status: UnitOutcome;
};

type LedgerLayout = {
  root: string;
  /** Report header for the parent key; omitted for single-key stages. */
  parentColumn?: string;
  unitColumn: string;
  /** Extension of the fetched result file, e.g. `.csv`. */
  artifactExtension: string;
  reportFileName?: string;
};

export type { LedgerLayout, StatusRow, UnitOutcome, WorkUnit };
