import { z } from 'zod';
import type {
  Provenance,
  SemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import { normalizeKeywords } from '../records/record-validation.js';

export const DEFAULT_REFERENCE_KIND = 'link';

export const InsightEntrySchema = z.object({
  type: z.string().default('insight'),
  content: z.string().default(''),
  keywords: z.array(z.string()).nullish(),
  reference_type: z.string().nullish(),
});

export type InsightEntry = z.infer<typeof InsightEntrySchema>;

/** Lowercased reference kind, `link` when the model gave none. */
export function toReferenceKind(value: string | null | undefined): string {
  return value?.trim().toLowerCase() || DEFAULT_REFERENCE_KIND;
}

export interface ContentRecordOptions {
  readonly provenance: Provenance;
  readonly strategyName: string;
  /** When false, entries typed "reference" become insights. */
  readonly allowReferences: boolean;
}

/** Maps insight-style entries onto insight, feedback or reference records. Unknown types become insights. */
export function toContentRecord(entry: InsightEntry, options: ContentRecordOptions): SemanticRecord {
  const base = {
    keywords: normalizeKeywords(entry.keywords ?? []),
    provenance: options.provenance,
    metadata: { strategy: options.strategyName },
  };
  const content = entry.content.trim();

  switch (entry.type.trim().toLowerCase()) {
    case 'feedback':
      return { kind: 'feedback', payload: { content }, ...base };
    case 'reference':
      if (options.allowReferences) {
        return {
          kind: 'reference',
          payload: { content, referenceKind: toReferenceKind(entry.reference_type) },
          ...base,
        };
      }
      return { kind: 'insight', payload: { content }, ...base };
    default:
      return { kind: 'insight', payload: { content }, ...base };
  }
}
