import { EngineError } from '../errors/EngineError.js';

/**
 * Process-wide held/free flag around the engine's mutating entry points.
 *
 * Not per-account: while any operation is in flight (including while it is
 * suspended on a collaborator call), every other mutating call is rejected.
 */
export class ReentrancyGuard {
  private holder: string | null = null;

  get isHeld(): boolean {
    return this.holder !== null;
  }

  /**
   * Run `work` while holding the flag; released on every exit path
   */
  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    if (this.holder !== null) {
      throw new EngineError(
        'Reentrancy',
        `${operation} rejected: ${this.holder} is already executing`
      );
    }

    this.holder = operation;
    try {
      return await work();
    } finally {
      this.holder = null;
    }
  }
}
