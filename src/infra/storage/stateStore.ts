import { AsyncLocalStorage } from 'node:async_hooks';
import fs from 'node:fs/promises';
import path from 'node:path';
import { AppState } from '../../types.js';
import { createDefaultState } from './defaultState.js';

const normalizeState = (raw: unknown): AppState => {
  const defaults = createDefaultState();
  const parsed = (raw && typeof raw === 'object' ? raw : {}) as Partial<AppState>;

  return {
    governance: { ...defaults.governance, ...(parsed.governance ?? {}) },
    timelock: { ...defaults.timelock, ...(parsed.timelock ?? {}) },
    roles: { ...defaults.roles, ...(parsed.roles ?? {}) },
    token: { ...defaults.token, ...(parsed.token ?? {}) },
    native: parsed.native ?? defaults.native,
    deployment: parsed.deployment ?? defaults.deployment,
    metrics: { ...defaults.metrics, ...(parsed.metrics ?? {}) },
  };
};

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

interface TransactionScope {
  draft: AppState;
  onCommit: Array<() => void>;
}

/**
 * Ledger state holder. Each top-level transaction runs alone against a draft copy;
 * the draft replaces the committed state only when the whole unit of work succeeds.
 * Transactions opened from inside a running transaction join it.
 */
export class StateStore {
  private state: AppState = createDefaultState();
  private lock: Promise<void> = Promise.resolve();
  private readonly scope = new AsyncLocalStorage<TransactionScope>();

  /** A null path keeps the state in memory only. */
  constructor(private readonly stateFilePath: string | null) {}

  async init(): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.stateFilePath, 'utf-8');
      this.state = normalizeState(JSON.parse(raw));
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = createDefaultState();
      await this.persist(this.state);
    }
  }

  snapshot(): AppState {
    return structuredClone(this.current());
  }

  /**
   * Read without copying. The selector must not mutate what it is given.
   */
  view<T>(select: (state: AppState) => T): T {
    return select(this.current());
  }

  /**
   * Run `callback` once the enclosing transaction commits; dropped if it rolls back.
   * Outside a transaction it runs immediately.
   */
  afterCommit(callback: () => void): void {
    const active = this.scope.getStore();
    if (active) {
      active.onCommit.push(callback);
      return;
    }
    callback();
  }

  inTransaction(): boolean {
    return this.scope.getStore() !== undefined;
  }

  async transaction<T>(work: (state: AppState) => Promise<T> | T): Promise<T> {
    const active = this.scope.getStore();
    if (active) {
      return work(active.draft);
    }

    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const txScope: TransactionScope = { draft: structuredClone(this.state), onCommit: [] };
      const result = await this.scope.run(txScope, () => work(txScope.draft));
      txScope.draft.metrics.transactionsCommitted += 1;
      await this.persist(txScope.draft);
      this.state = txScope.draft;
      for (const callback of txScope.onCommit) {
        callback();
      }
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.state);
  }

  private current(): AppState {
    return this.scope.getStore()?.draft ?? this.state;
  }

  private async persist(state: AppState): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.writeFile(this.stateFilePath, JSON.stringify(state, null, 2));
  }
}
