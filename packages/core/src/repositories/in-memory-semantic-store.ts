import { randomUUID } from 'node:crypto';
import type {
  SemanticQuery,
  SemanticRecord,
  StoredSemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import { keepValidRecords } from '../records/record-validation.js';
import { createMonotonicClock, indexKeywords, type SemanticStore } from './semantic-store.js';

export interface InMemorySemanticStoreOptions {
  readonly now?: () => Date;
}

function matchesQuery(
  record: StoredSemanticRecord,
  query: SemanticQuery,
  keywordIndex: ReadonlyMap<string, ReadonlySet<string>>,
): boolean {
  if (query.kind !== undefined && record.kind !== query.kind) {
    return false;
  }
  if (query.originKind !== undefined && record.provenance.origin !== query.originKind) {
    return false;
  }
  if (query.createdFrom && record.createdAt.getTime() < query.createdFrom.getTime()) {
    return false;
  }
  if (query.createdTo && record.createdAt.getTime() > query.createdTo.getTime()) {
    return false;
  }
  const wanted = indexKeywords(query.keywords ?? []);
  if (wanted.length > 0) {
    return wanted.some((keyword) => keywordIndex.get(keyword)?.has(record.id) ?? false);
  }
  return true;
}

export function createInMemorySemanticStore(
  options: InMemorySemanticStoreOptions = {},
): SemanticStore {
  const clock = createMonotonicClock(options.now);
  const records: StoredSemanticRecord[] = [];
  const keywordIndex = new Map<string, Set<string>>();

  return {
    store(input: readonly SemanticRecord[]): Promise<readonly StoredSemanticRecord[]> {
      const stored = keepValidRecords(input, 'in-memory-store').map(
        (record): StoredSemanticRecord => ({ ...record, id: randomUUID(), createdAt: clock() }),
      );

      for (const record of stored) {
        records.push(record);
        for (const keyword of indexKeywords(record.keywords)) {
          const ids = keywordIndex.get(keyword) ?? new Set<string>();
          ids.add(record.id);
          keywordIndex.set(keyword, ids);
        }
      }

      return Promise.resolve(stored);
    },

    retrieve(query: SemanticQuery = {}): Promise<readonly StoredSemanticRecord[]> {
      // Insertion order breaks ties between equal timestamps, newest first.
      const matching = records
        .map((record, index) => ({ record, index }))
        .filter(({ record }) => matchesQuery(record, query, keywordIndex))
        .sort(
          (a, b) =>
            b.record.createdAt.getTime() - a.record.createdAt.getTime() || b.index - a.index,
        )
        .map(({ record }) => record);
      return Promise.resolve(matching);
    },

    getById(id: string): Promise<StoredSemanticRecord | null> {
      return Promise.resolve(records.find((record) => record.id === id) ?? null);
    },

    close(): Promise<void> {
      return Promise.resolve();
    },
  };
}
