import type { ResultSet } from '../types.js';
import { getConfig } from '../config.js';

export interface ResultEntry {
  result_id: string;
  result: ResultSet;
  stored_at: string;
}

type ListChangedNotifier = () => void | Promise<void>;

const DEFAULT_RESULT_STORE_SIZE = 100;

interface StoredEntry {
  entry: ResultEntry;
  expiresAt: number;
}

/**
 * Ranked results kept for re-reading through MCP resources. Entries
 * expire after the TTL; the oldest entry is evicted when full.
 */
export class ResultStore {
  private entries = new Map<string, StoredEntry>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly clock: () => number;

  constructor(options: { ttlMs: number; maxSize: number; clock?: () => number }) {
    this.ttlMs = options.ttlMs;
    this.maxSize = options.maxSize;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Returns true when the id was not stored before
   */
  set(entry: ResultEntry): boolean {
    const existed = this.get(entry.result_id) !== undefined;
    this.entries.delete(entry.result_id);

    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }

    this.entries.set(entry.result_id, { entry, expiresAt: this.clock() + this.ttlMs });
    return !existed;
  }

  get(resultId: string): ResultEntry | undefined {
    const stored = this.entries.get(resultId);
    if (!stored) return undefined;

    if (this.clock() > stored.expiresAt) {
      this.entries.delete(resultId);
      return undefined;
    }
    return stored.entry;
  }

  /**
   * Live entries, newest first
   */
  list(): ResultEntry[] {
    const live: ResultEntry[] = [];
    for (const resultId of [...this.entries.keys()]) {
      const entry = this.get(resultId);
      if (entry) live.push(entry);
    }

    return live.sort((a, b) => {
      const aTime = Date.parse(a.stored_at) || 0;
      const bTime = Date.parse(b.stored_at) || 0;
      if (aTime !== bTime) {
        return bTime - aTime;
      }
      return a.result_id.localeCompare(b.result_id);
    });
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

let resultStore: ResultStore | null = null;
let listChangedNotifier: ListChangedNotifier | null = null;

export function getResultStore(): ResultStore {
  if (!resultStore) {
    const config = getConfig();
    resultStore = new ResultStore({
      ttlMs: Math.max(0, config.resultTtlS) * 1000,
      maxSize: DEFAULT_RESULT_STORE_SIZE,
    });
  }
  return resultStore;
}

export function resetResultStore(): void {
  resultStore?.clear();
  resultStore = null;
}

export function setResourceListChangedNotifier(notifier: ListChangedNotifier | null): void {
  listChangedNotifier = notifier;
}

export function storeResult(entry: ResultEntry): boolean {
  const isNew = getResultStore().set(entry);
  if (isNew) {
    notifyListChanged();
  }
  return isNew;
}

function notifyListChanged(): void {
  if (!listChangedNotifier) return;
  try {
    const result = listChangedNotifier();
    if (result instanceof Promise) {
      void result.catch((err: unknown) => {
        console.error('resources/list_changed notification failed:', err);
      });
    }
  } catch (err) {
    console.error('resources/list_changed notification failed:', err);
  }
}
