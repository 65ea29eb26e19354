import type { ExecutionContext } from '@workspace/browser-session';
import type { Logger } from '@workspace/logger';
import type { WorkUnit } from '../pipeline/types.js';

/**
 * A file left in the staging directory, or content the scheduler writes out.
 */
type UnitArtifact =
  | { kind: 'file'; path: string }
  | { kind: 'text'; content: string };

type UnitResult =
  | { status: 'success'; artifact: UnitArtifact }
  | { status: 'empty'; reason?: string }
  | { status: 'failure'; reason: string };

/**
 * Answer of a "does this page have results" probe. `indeterminate` means the
 * page never settled into either state and is treated as a failure.
 */
type ProbeResult = 'has-results' | 'no-results' | 'indeterminate';

type ExecutionRequest<C extends ExecutionContext> = {
  context: C;
  /** Aborted when the attempt times out or the run is torn down. */
  signal: AbortSignal;
  /** Fresh, empty directory owned by this attempt. */
  stagingPath: string;
  attempt: number;
  log: Logger;
};

/**
 * Performs the page action for one unit. Auth rejections are reported by
 * throwing `AuthRejectedError`; other throws count as failed attempts.
 */
interface WorkExecutor<C extends ExecutionContext> {
  execute(unit: WorkUnit, request: ExecutionRequest<C>): Promise<UnitResult>;
}

export type {
  ExecutionRequest,
  ProbeResult,
  UnitArtifact,
  UnitResult,
  WorkExecutor,
};
