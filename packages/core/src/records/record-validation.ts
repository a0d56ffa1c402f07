import type { SemanticRecord } from '@gleaner/shared/src/types/semantic.types.js';
import { RecordValidationError } from '@gleaner/shared/src/utils/errors.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import { checkSemanticRecord } from '@gleaner/schemas/src/validators.js';

const log = createChildLogger('records:validation');

export function validateRecord(record: SemanticRecord): SemanticRecord {
  const check = checkSemanticRecord(record);
  if (!check.valid) {
    throw new RecordValidationError(`Invalid ${record.kind} record`, check.issues);
  }
  return record;
}

/** Drops records that break a data-model invariant, logging each one. */
export function keepValidRecords<T extends SemanticRecord>(
  records: readonly T[],
  producer: string,
): T[] {
  const valid: T[] = [];

  for (const record of records) {
    try {
      validateRecord(record);
      valid.push(record);
    } catch (error) {
      if (!(error instanceof RecordValidationError)) {
        throw error;
      }
      log.warn({ producer, kind: record.kind, issues: error.issues }, 'Dropping invalid record');
    }
  }

  return valid;
}

/** Trims, drops empties, and de-duplicates case-insensitively keeping the first spelling. */
export function normalizeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (keyword.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(keyword);
  }

  return result;
}
