import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig } from '@gleaner/schemas/src/config-loader.js';
import { createSqliteSemanticStore } from '@gleaner/core/src/infrastructure/sqlite-semantic-store.js';
import {
  SEMANTIC_RECORD_KINDS,
  type SemanticQuery,
  type StoredSemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';

function describeRecord(record: StoredSemanticRecord): string {
  switch (record.kind) {
    case 'qna':
      return `Q: ${record.payload.question}\n    A: ${record.payload.answer}`;
    case 'glossary': {
      const review = record.payload.needsReview ? ', needs review' : '';
      return `${record.payload.term}: ${record.payload.definition} (${record.payload.confidence}${review})`;
    }
    default:
      return record.payload.content;
  }
}

function parseDate(value: string | undefined, flag: string): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`--${flag} is not a date: ${value}`);
  }
  return date;
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', default: resolve(process.cwd(), 'config', 'gleaner.json') },
      kind: { type: 'string' },
      keyword: { type: 'string', multiple: true },
      origin: { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
    },
  });

  const kind = SEMANTIC_RECORD_KINDS.find((candidate) => candidate === values.kind);
  if (values.kind !== undefined && !kind) {
    throw new Error(`--kind must be one of ${SEMANTIC_RECORD_KINDS.join(', ')}`);
  }
  const origins = ['thread', 'document_section', 'enhancement'] as const;
  const originKind = origins.find((candidate) => candidate === values.origin);
  if (values.origin !== undefined && !originKind) {
    throw new Error(`--origin must be one of ${origins.join(', ')}`);
  }

  const query: SemanticQuery = {
    kind,
    keywords: values.keyword,
    originKind,
    createdFrom: parseDate(values.from, 'from'),
    createdTo: parseDate(values.to, 'to'),
  };

  const config = await loadConfig(values.config);
  const store = createSqliteSemanticStore({ dbPath: config.store.dbPath });
  const records = await store.retrieve(query);
  await store.close();

  console.log(`${String(records.length)} record(s) in ${config.store.dbPath}\n`);
  for (const record of records) {
    console.log(`[${record.createdAt.toISOString()}] ${record.kind} ${record.id}`);
    console.log(`    ${describeRecord(record)}`);
    if (record.keywords.length > 0) {
      console.log(`    keywords: ${record.keywords.join(', ')}`);
    }
  }
}

main().catch((error: unknown) => {
  console.error('Query failed:', error);
  process.exit(1);
});
