import type { ZodError } from 'zod';
import { SchemaValidationError } from '@gleaner/shared/src/utils/errors.js';
import type { RawItem } from '@gleaner/shared/src/types/raw-item.types.js';
import type { SemanticRecord } from '@gleaner/shared/src/types/semantic.types.js';
import type { SourceBundle } from '@gleaner/shared/src/types/source.types.js';
import { GleanerConfigSchema } from './config.schema.js';
import type { GleanerConfig } from './config.schema.js';
import { RawItemBatchSchema } from './raw-item.schema.js';
import { SemanticRecordSchema } from './semantic-record.schema.js';
import { SourceBundleSchema } from './source-bundle.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateConfig(data: unknown): GleanerConfig {
  const result = GleanerConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid gleaner configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateRawItems(data: unknown): readonly RawItem[] {
  const result = RawItemBatchSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid raw item batch', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateSourceBundle(data: unknown): SourceBundle {
  const result = SourceBundleSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid source bundle', formatZodErrors(result.error));
  }

  return result.data;
}

export type RecordCheck =
  | { readonly valid: true; readonly record: SemanticRecord }
  | { readonly valid: false; readonly issues: readonly string[] };

export function checkSemanticRecord(data: unknown): RecordCheck {
  const result = SemanticRecordSchema.safeParse(data);
  return result.success
    ? { valid: true, record: result.data }
    : { valid: false, issues: formatZodErrors(result.error) };
}
