/**
 * Atomic Scope
 *
 * Transactional boundary for multi-step operations. Each mutation performed
 * inside a scope registers its inverse; commit discards the undo log and runs
 * the commit hooks (event publication), rollback replays the inverses in
 * reverse order and drops the hooks.
 *
 * Lifecycle:
 *
 *   open ────► committed
 *     │
 *     └──────► rolled_back
 */

export type AtomicScopeStatus = 'open' | 'committed' | 'rolled_back';

interface UndoEntry {
  label: string;
  undo: () => void;
}

export class AtomicScope {
  private readonly undoLog: UndoEntry[] = [];
  private readonly commitHooks: Array<() => void> = [];
  private currentStatus: AtomicScopeStatus = 'open';

  get status(): AtomicScopeStatus {
    return this.currentStatus;
  }

  /**
   * Number of mutations that would be undone on rollback
   */
  get pendingUndoCount(): number {
    return this.undoLog.length;
  }

  /**
   * Register the inverse of a mutation that was just applied.
   */
  onRollback(label: string, undo: () => void): void {
    this.assertOpen('onRollback');
    this.undoLog.push({ label, undo });
  }

  /**
   * Register work that must only happen once every step succeeded.
   */
  onCommit(hook: () => void): void {
    this.assertOpen('onCommit');
    this.commitHooks.push(hook);
  }

  commit(): void {
    this.assertOpen('commit');
    this.currentStatus = 'committed';
    this.undoLog.length = 0;

    const hooks = this.commitHooks.splice(0);
    for (const hook of hooks) {
      hook();
    }
  }

  rollback(): void {
    this.assertOpen('rollback');
    this.currentStatus = 'rolled_back';
    this.commitHooks.length = 0;

    while (this.undoLog.length > 0) {
      const entry = this.undoLog.pop();
      entry?.undo();
    }
  }

  private assertOpen(action: string): void {
    if (this.currentStatus !== 'open') {
      throw new Error(`Cannot ${action}: atomic scope is already ${this.currentStatus}`);
    }
  }
}

/**
 * Run `work` inside a fresh scope: commit on success, roll back and rethrow
 * on failure. `onRolledBack` receives the number of undone steps.
 *
 * @example
 * ```typescript
 * const pair = await runAtomically(async (scope) => {
 *   const clone = cloneDeployer.instantiate(variant, args, scope);
 *   ledger.transferNative(sender, clone.address, value, scope);
 *   return clone.address;
 * });
 * ```
 */
export async function runAtomically<T>(
  work: (scope: AtomicScope) => Promise<T>,
  onRolledBack?: (undoneSteps: number) => void
): Promise<T> {
  const scope = new AtomicScope();

  let result: T;
  try {
    result = await work(scope);
  } catch (error) {
    const undoneSteps = scope.pendingUndoCount;
    scope.rollback();
    onRolledBack?.(undoneSteps);
    throw error;
  }

  scope.commit();
  return result;
}
