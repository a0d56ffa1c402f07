import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from 'sql.js';
import { z } from 'zod';
import type {
  SemanticQuery,
  SemanticRecord,
  StoredSemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import { StoreError, toError } from '@gleaner/shared/src/utils/errors.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import { SemanticRecordSchema } from '@gleaner/schemas/src/semantic-record.schema.js';
import { formatZodErrors } from '@gleaner/schemas/src/validators.js';
import { keepValidRecords } from '../records/record-validation.js';
import {
  createMonotonicClock,
  indexKeywords,
  type SemanticStore,
} from '../repositories/semantic-store.js';

const log = createChildLogger('sqlite:semantic-store');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS semantic_records (
    id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    content_json TEXT NOT NULL,
    metadata_json TEXT,
    keywords_json TEXT NOT NULL,
    source_json TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_semantic_records_kind ON semantic_records(kind);
  CREATE INDEX IF NOT EXISTS idx_semantic_records_created_at ON semantic_records(created_at);
  CREATE TABLE IF NOT EXISTS keyword_index (
    keyword TEXT NOT NULL,
    record_id TEXT NOT NULL REFERENCES semantic_records(id),
    PRIMARY KEY (keyword, record_id)
  );
`;

const SemanticRecordRowSchema = z.object({
  id: z.string(),
  kind: z.string(),
  content_json: z.string(),
  metadata_json: z.string().nullable(),
  keywords_json: z.string(),
  source_json: z.string(),
  created_at: z.string(),
});

type SemanticRecordRow = z.infer<typeof SemanticRecordRowSchema>;

export interface SqliteSemanticStoreOptions {
  readonly dbPath: string;
  readonly now?: () => Date;
}

const IN_MEMORY_PATH = ':memory:';

let sqlJs: Promise<SqlJsStatic> | undefined;

/** Loads the SQLite wasm module once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    // The CommonJS build exposes the initializer as its own `default`.
    const pending = initSqlJs.default();
    sqlJs = pending;
    pending.catch(() => {
      if (sqlJs === pending) {
        sqlJs = undefined;
      }
    });
  }
  return sqlJs;
}

function selectRows(db: Database, sql: string, params: readonly SqlValue[]): unknown[] {
  const statement = db.prepare(sql);
  try {
    statement.bind([...params]);
    const rows: unknown[] = [];
    while (statement.step()) {
      rows.push(statement.getAsObject());
    }
    return rows;
  } finally {
    statement.free();
  }
}

function parseJsonColumn(row: SemanticRecordRow, column: string, value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new StoreError(`Row ${row.id} has unreadable ${column}`, toError(error));
  }
}

function recordFromRow(raw: unknown): StoredSemanticRecord {
  const rowResult = SemanticRecordRowSchema.safeParse(raw);
  if (!rowResult.success) {
    throw new StoreError(`Unexpected row shape: ${formatZodErrors(rowResult.error).join('; ')}`);
  }
  const row = rowResult.data;

  const recordResult = SemanticRecordSchema.safeParse({
    kind: row.kind,
    payload: parseJsonColumn(row, 'content_json', row.content_json),
    keywords: parseJsonColumn(row, 'keywords_json', row.keywords_json),
    provenance: parseJsonColumn(row, 'source_json', row.source_json),
    metadata: row.metadata_json === null ? {} : parseJsonColumn(row, 'metadata_json', row.metadata_json),
  });
  if (!recordResult.success) {
    throw new StoreError(
      `Row ${row.id} is not a valid record: ${formatZodErrors(recordResult.error).join('; ')}`,
    );
  }

  return { ...recordResult.data, id: row.id, createdAt: new Date(row.created_at) };
}

function buildWhereClause(query: SemanticQuery): { sql: string; params: SqlValue[] } {
  const conditions: string[] = [];
  const params: SqlValue[] = [];

  if (query.kind !== undefined) {
    conditions.push('kind = ?');
    params.push(query.kind);
  }
  if (query.originKind !== undefined) {
    conditions.push(`json_extract(source_json, '$.origin') = ?`);
    params.push(query.originKind);
  }
  if (query.createdFrom) {
    conditions.push('created_at >= ?');
    params.push(query.createdFrom.toISOString());
  }
  if (query.createdTo) {
    conditions.push('created_at <= ?');
    params.push(query.createdTo.toISOString());
  }
  const keywords = indexKeywords(query.keywords ?? []);
  if (keywords.length > 0) {
    conditions.push(
      `id IN (SELECT record_id FROM keyword_index WHERE keyword IN (${keywords.map(() => '?').join(', ')}))`,
    );
    params.push(...keywords);
  }

  return {
    sql: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

/**
 * SQLite-backed store running on the sql.js wasm build. A file database is
 * read into memory for each call and written back after every write, so no
 * handle outlives an operation; `:memory:` keeps one database until `close`.
 */
export function createSqliteSemanticStore(options: SqliteSemanticStoreOptions): SemanticStore {
  const { dbPath } = options;
  const inMemory = dbPath === IN_MEMORY_PATH;
  const clock = createMonotonicClock(options.now);

  async function open(): Promise<Database> {
    const SQL = await loadSqlJs();
    let db: Database;
    if (inMemory) {
      db = new SQL.Database();
    } else {
      mkdirSync(dirname(dbPath), { recursive: true });
      db = new SQL.Database(existsSync(dbPath) ? readFileSync(dbPath) : null);
    }
    db.run('PRAGMA foreign_keys = ON');
    db.exec(SCHEMA);
    return db;
  }

  function persist(db: Database): void {
    if (!inMemory) {
      writeFileSync(dbPath, db.export());
    }
  }

  let shared: Database | undefined;

  async function withDatabase<T>(
    operation: string,
    work: (db: Database) => T,
  ): Promise<T> {
    let db: Database | undefined;
    try {
      db = shared ?? (await open());
      if (inMemory) {
        shared = db;
      }
      return work(db);
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      const cause = toError(error);
      log.error({ dbPath, operation, error: cause.message }, 'SQLite operation failed');
      throw new StoreError(`Failed to ${operation} semantic records: ${cause.message}`, cause);
    } finally {
      if (db && db !== shared) {
        db.close();
      }
    }
  }

  function insertAll(db: Database, batch: readonly SemanticRecord[]): StoredSemanticRecord[] {
    const insertRecord = db.prepare(
      `INSERT INTO semantic_records
         (id, kind, content_json, metadata_json, keywords_json, source_json, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertKeyword = db.prepare(
      'INSERT OR IGNORE INTO keyword_index (keyword, record_id) VALUES (?, ?)',
    );

    try {
      return batch.map((record): StoredSemanticRecord => {
        const storedRecord: StoredSemanticRecord = {
          ...record,
          id: randomUUID(),
          createdAt: clock(),
        };
        insertRecord.run([
          storedRecord.id,
          record.kind,
          JSON.stringify(record.payload),
          JSON.stringify(record.metadata),
          JSON.stringify(record.keywords),
          JSON.stringify(record.provenance),
          storedRecord.createdAt.toISOString(),
        ]);
        for (const keyword of indexKeywords(record.keywords)) {
          insertKeyword.run([keyword, storedRecord.id]);
        }
        return storedRecord;
      });
    } finally {
      insertRecord.free();
      insertKeyword.free();
    }
  }

  return {
    async store(input: readonly SemanticRecord[]): Promise<readonly StoredSemanticRecord[]> {
      const records = keepValidRecords(input, 'sqlite-store');
      if (records.length === 0) {
        return [];
      }

      const stored = await withDatabase('store', (db) => {
        db.run('BEGIN');
        let batch: StoredSemanticRecord[];
        try {
          batch = insertAll(db, records);
          db.run('COMMIT');
        } catch (error) {
          db.run('ROLLBACK');
          throw error;
        }
        persist(db);
        return batch;
      });

      log.info(
        { dbPath, stored: stored.length, dropped: input.length - stored.length },
        'Stored semantic records',
      );
      return stored;
    },

    async retrieve(query: SemanticQuery = {}): Promise<readonly StoredSemanticRecord[]> {
      const { sql, params } = buildWhereClause(query);
      const rows = await withDatabase('retrieve', (db) =>
        selectRows(db, `SELECT * FROM semantic_records ${sql} ORDER BY created_at DESC, rowid DESC`, params),
      );
      log.debug({ query, results: rows.length }, 'Retrieved semantic records');
      return rows.map(recordFromRow);
    },

    async getById(id: string): Promise<StoredSemanticRecord | null> {
      const [row] = await withDatabase('read', (db) =>
        selectRows(db, 'SELECT * FROM semantic_records WHERE id = ?', [id]),
      );
      return row === undefined ? null : recordFromRow(row);
    },

    async close(): Promise<void> {
      shared?.close();
      shared = undefined;
    },
  };
}
