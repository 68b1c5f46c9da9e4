/**
 * UnitOfWork: all-or-nothing execution of one public engine operation.
 *
 * Three journals are kept while an operation runs:
 * - pending balance writes, an overlay on the committed maps that only reads
 *   made through this unit see; merged into the maps on commit
 * - deferred collaborator effects, applied only once every in-memory check
 *   of the operation has passed
 * - staged events, published only after the effects have all succeeded
 *
 * Effects with a compensation are applied before the ones without, each
 * group in registration order, so nothing irreversible has happened while
 * a reversible effect can still fail. When an effect fails, the effects
 * already applied are compensated in reverse order and the pending writes
 * are dropped.
 */

import type { StagedEvent } from '../types/index.js';

export interface CollaboratorEffect {
  /** Stable label used in logs and metrics, e.g. 'custody.transferIn' */
  name: string;
  apply(): Promise<void>;
  /** Reverses a successful `apply`; omitted when the effect is always last */
  compensate?: () => Promise<void>;
}

export interface CompensationFailure {
  effect: string;
  error: unknown;
}

export type CompensationFailureHandler = (failure: CompensationFailure) => void;

/** A committed balance map the unit can stage writes against */
export type BalanceMap = Map<string, bigint>;

export class UnitOfWork {
  private readonly writes = new Map<BalanceMap, Map<string, bigint>>();
  private readonly effects: CollaboratorEffect[] = [];
  private readonly staged: StagedEvent[] = [];
  private state: 'open' | 'committed' | 'rolled_back' = 'open';

  constructor(private readonly onCompensationFailure?: CompensationFailureHandler) {}

  /**
   * Pending value of `key` in `target`, or undefined when this unit has not
   * written it
   */
  read(target: BalanceMap, key: string): bigint | undefined {
    return this.writes.get(target)?.get(key);
  }

  /**
   * Stage `value` for `key` in `target`; the map itself is untouched until commit
   */
  write(target: BalanceMap, key: string, value: bigint): void {
    this.assertOpen();
    let pending = this.writes.get(target);
    if (!pending) {
      pending = new Map();
      this.writes.set(target, pending);
    }
    pending.set(key, value);
  }

  defer(effect: CollaboratorEffect): void {
    this.assertOpen();
    this.effects.push(effect);
  }

  stage(event: StagedEvent): void {
    this.assertOpen();
    this.staged.push(event);
  }

  /**
   * Effect names in the order `settle` applies them
   */
  get pendingEffects(): readonly string[] {
    return this.settleOrder().map((effect) => effect.name);
  }

  /**
   * Apply deferred effects. On the first failure the applied ones are
   * compensated (last first) and the failure is rethrown; the caller still
   * owns the rollback.
   */
  async settle(): Promise<void> {
    this.assertOpen();
    const applied: CollaboratorEffect[] = [];

    for (const effect of this.settleOrder()) {
      try {
        await effect.apply();
      } catch (error) {
        await this.compensate(applied);
        throw error;
      }
      applied.push(effect);
    }
  }

  /**
   * Merge pending writes into their maps and hand back the events to publish.
   * Synchronous, so no other caller observes a partial merge.
   */
  commit(): StagedEvent[] {
    this.assertOpen();
    this.state = 'committed';

    for (const [target, pending] of this.writes) {
      for (const [key, value] of pending) {
        target.set(key, value);
      }
    }
    this.writes.clear();
    return [...this.staged];
  }

  /**
   * Drop pending writes and staged events
   */
  rollback(): void {
    if (this.state !== 'open') return;
    this.state = 'rolled_back';

    this.writes.clear();
    this.staged.length = 0;
  }

  private settleOrder(): CollaboratorEffect[] {
    const reversible = this.effects.filter((effect) => effect.compensate !== undefined);
    const final = this.effects.filter((effect) => effect.compensate === undefined);
    return [...reversible, ...final];
  }

  private async compensate(applied: CollaboratorEffect[]): Promise<void> {
    for (let i = applied.length - 1; i >= 0; i--) {
      const effect = applied[i];
      if (!effect.compensate) continue;

      try {
        await effect.compensate();
      } catch (error) {
        // Keep unwinding the remaining effects; the handler reports this one
        this.onCompensationFailure?.({ effect: effect.name, error });
      }
    }
  }

  private assertOpen(): void {
    if (this.state !== 'open') {
      throw new Error(`UnitOfWork already ${this.state}`);
    }
  }
}
