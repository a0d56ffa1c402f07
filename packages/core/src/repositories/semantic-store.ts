import type {
  SemanticQuery,
  SemanticRecord,
  StoredSemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';

/**
 * Append-only persistence for semantic records. Records are never updated
 * or deleted; re-extraction stores new records.
 */
export interface SemanticStore {
  /**
   * Assigns each valid record an id and `createdAt` and persists it together
   * with its keyword index entries. Invalid records are dropped.
   */
  store(records: readonly SemanticRecord[]): Promise<readonly StoredSemanticRecord[]>;
  /** Newest first. Filters combine with AND; `keywords` matches any, ignoring case. */
  retrieve(query?: SemanticQuery): Promise<readonly StoredSemanticRecord[]>;
  getById(id: string): Promise<StoredSemanticRecord | null>;
  close(): Promise<void>;
}

export function indexKeywords(keywords: readonly string[]): string[] {
  return [
    ...new Set(keywords.map((keyword) => keyword.trim().toLowerCase()).filter((k) => k.length > 0)),
  ];
}

/** A clock that never runs backwards, even if the wall clock does. */
export function createMonotonicClock(now: () => Date = () => new Date()): () => Date {
  let last = 0;
  return () => {
    last = Math.max(now().getTime(), last);
    return new Date(last);
  };
}
