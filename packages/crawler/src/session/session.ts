import type { ExecutionContext } from '@workspace/browser-session';
import type { SessionInfo } from './types.js';

/**
 * Lease bookkeeping around one shared execution context.
 */
export class Session<C extends ExecutionContext> {
  readonly id: string;
  readonly context: C;
  private inFlight: number;
  private usageCount: number;
  private readonly createdAt: number;
  private lastUsedAt: number;

  constructor(context: C) {
    this.id = context.id;
    this.context = context;
    this.inFlight = 0;
    this.usageCount = 0;
    this.createdAt = Date.now();
    this.lastUsedAt = Date.now();
  }

  lease(): void {
    this.inFlight += 1;
    this.usageCount += 1;
    this.lastUsedAt = Date.now();
  }

  release(): void {
    if (this.inFlight > 0) {
      this.inFlight -= 1;
    }
  }

  get activeLeases(): number {
    return this.inFlight;
  }

  get info(): SessionInfo {
    return {
      id: this.id,
      inFlight: this.inFlight,
      usageCount: this.usageCount,
      createdAt: this.createdAt,
      lastUsedAt: this.lastUsedAt,
    };
  }
}
