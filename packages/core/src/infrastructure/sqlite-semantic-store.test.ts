import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SemanticRecord } from '@gleaner/shared/src/types/semantic.types.js';
import { StoreError } from '@gleaner/shared/src/utils/errors.js';
import { deployQna, sloGlossary, steppingClock } from '../test-helpers.js';
import { createSqliteSemanticStore, loadSqlJs } from './sqlite-semantic-store.js';

describe('createSqliteSemanticStore', () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'gleaner-store-'));
    dbPath = join(tempDir, 'nested', 'semantic.db');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should round-trip records newest first', async () => {
    const store = createSqliteSemanticStore({ dbPath, now: steppingClock() });

    const stored = await store.store([deployQna, sloGlossary]);
    const retrieved = await store.retrieve();

    expect(stored).toHaveLength(2);
    expect(retrieved.map(({ id: _id, createdAt: _createdAt, ...record }) => record)).toEqual([
      sloGlossary,
      deployQna,
    ]);
    expect(retrieved.map((record) => record.id)).toEqual([stored[1].id, stored[0].id]);
    expect(retrieved[1].createdAt.toISOString()).toBe('2024-03-01T00:00:00.000Z');
  });

  it('should match keywords regardless of case', async () => {
    const store = createSqliteSemanticStore({ dbPath });
    await store.store([deployQna, sloGlossary]);

    const retrieved = await store.retrieve({ keywords: ['STAGING'] });

    expect(retrieved).toHaveLength(1);
    expect(retrieved[0].payload).toEqual(deployQna.payload);
  });

  it('should match any of several keywords', async () => {
    const store = createSqliteSemanticStore({ dbPath });
    await store.store([deployQna, sloGlossary]);

    const retrieved = await store.retrieve({ keywords: ['slo', 'deploy', 'missing'] });

    expect(retrieved.map((record) => record.kind)).toEqual(['glossary', 'qna']);
  });

  it('should filter by kind and origin', async () => {
    const store = createSqliteSemanticStore({ dbPath });
    await store.store([deployQna, sloGlossary]);

    expect((await store.retrieve({ kind: 'qna' })).map((r) => r.kind)).toEqual(['qna']);
    expect((await store.retrieve({ originKind: 'document_section' })).map((r) => r.kind)).toEqual([
      'glossary',
    ]);
    expect(await store.retrieve({ kind: 'qna', originKind: 'document_section' })).toEqual([]);
  });

  it('should filter by an inclusive creation range', async () => {
    const store = createSqliteSemanticStore({ dbPath, now: steppingClock() });
    const insight: SemanticRecord = { ...deployQna, kind: 'insight', payload: { content: 'Ship small.' } };
    await store.store([deployQna, sloGlossary, insight]);

    const retrieved = await store.retrieve({
      createdFrom: new Date('2024-03-01T00:00:01.000Z'),
      createdTo: new Date('2024-03-01T00:00:02.000Z'),
    });

    expect(retrieved.map((record) => record.kind)).toEqual(['insight', 'glossary']);
  });

  it('should index each keyword once, lower-cased', async () => {
    const store = createSqliteSemanticStore({ dbPath });
    const [stored] = await store.store([{ ...deployQna, keywords: ['Deploy', 'deploy', ' STAGING '] }]);

    const SQL = await loadSqlJs();
    const db = new SQL.Database(readFileSync(dbPath));
    const [result] = db.exec('SELECT keyword, record_id FROM keyword_index ORDER BY keyword');
    db.close();

    expect(result.values).toEqual([
      ['deploy', stored.id],
      ['staging', stored.id],
    ]);
  });

  it('should persist across store instances', async () => {
    await createSqliteSemanticStore({ dbPath }).store([deployQna]);

    const retrieved = await createSqliteSemanticStore({ dbPath }).retrieve();

    expect(retrieved).toHaveLength(1);
    expect(retrieved[0].provenance).toEqual(deployQna.provenance);
  });

  it('should look records up by id', async () => {
    const store = createSqliteSemanticStore({ dbPath });
    const [stored] = await store.store([sloGlossary]);

    expect(await store.getById(stored.id)).toEqual(stored);
    expect(await store.getById('no-such-id')).toBeNull();
  });

  it('should drop records that break an invariant', async () => {
    const store = createSqliteSemanticStore({ dbPath });
    const blankAnswer: SemanticRecord = {
      ...deployQna,
      payload: { question: 'Anyone?', answer: ' ' },
    };

    const stored = await store.store([blankAnswer, sloGlossary]);

    expect(stored.map((record) => record.kind)).toEqual(['glossary']);
    expect(await store.retrieve()).toHaveLength(1);
  });

  it('should keep timestamps non-decreasing when the clock goes backwards', async () => {
    const times = [Date.UTC(2024, 2, 2), Date.UTC(2024, 2, 1)];
    let call = 0;
    const store = createSqliteSemanticStore({ dbPath, now: () => new Date(times[call++]) });

    const stored = await store.store([deployQna, sloGlossary]);

    expect(stored[1].createdAt.getTime()).toBe(stored[0].createdAt.getTime());
    expect((await store.retrieve()).map((record) => record.kind)).toEqual(['glossary', 'qna']);
  });

  it('should raise StoreError for a row that does not decode', async () => {
    const store = createSqliteSemanticStore({ dbPath });
    await store.store([deployQna]);
    const SQL = await loadSqlJs();
    const db = new SQL.Database(readFileSync(dbPath));
    db.run(
      `INSERT INTO semantic_records
         (id, kind, content_json, metadata_json, keywords_json, source_json, created_at)
       VALUES ('broken', 'qna', '{"question":""}', NULL, '[]', '{"origin":"thread"}', '2030-01-01T00:00:00.000Z')`,
    );
    writeFileSync(dbPath, db.export());
    db.close();

    await expect(store.retrieve()).rejects.toThrow(StoreError);
  });

  it('should raise StoreError when the database cannot be opened', async () => {
    const blocker = join(tempDir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const store = createSqliteSemanticStore({ dbPath: join(blocker, 'semantic.db') });

    await expect(store.store([deployQna])).rejects.toThrow(StoreError);
  });

  it('should keep an in-memory database until closed', async () => {
    const store = createSqliteSemanticStore({ dbPath: ':memory:' });
    await store.store([deployQna]);

    expect(await store.retrieve()).toHaveLength(1);

    await store.close();
    expect(await store.retrieve()).toEqual([]);
  });
});
