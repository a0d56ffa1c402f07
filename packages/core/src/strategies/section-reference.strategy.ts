import { z } from 'zod';
import type { DocumentSectionItem } from '@gleaner/shared/src/types/raw-item.types.js';
import type {
  ReferenceRecord,
  SemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import type { TextClient } from '../llm/text-client.js';
import {
  describeResponseShape,
  parseEntries,
  requestStructured,
} from '../llm/structured-request.js';
import { keepValidRecords, normalizeKeywords } from '../records/record-validation.js';
import { toReferenceKind } from './content-records.js';
import { containsAny, sectionBody, sectionProvenance } from './source-text.js';
import type { SectionStrategy } from './types.js';

const log = createChildLogger('strategy:section-reference');

const STRATEGY_NAME = 'section-reference';

export const REFERENCE_MARKERS: readonly string[] = [
  'http://',
  'https://',
  'reference',
  'refer to',
  'link',
  'url',
  'source',
  'citation',
  'see also',
  '참조',
  '참고',
];

const ReferenceEntrySchema = z.object({
  reference_type: z.string().nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  description: z.string().nullish(),
  content: z.string().nullish(),
  keywords: z.array(z.string()).nullish(),
});

const ReferenceResponseSchema = z.object({
  references: z.array(z.unknown()).default([]),
});

const REFERENCE_RESPONSE_SHAPE = describeResponseShape(
  z.object({ references: z.array(ReferenceEntrySchema) }),
  'ReferenceResponse',
);

type ReferenceEntry = z.infer<typeof ReferenceEntrySchema>;

export function formatReference(entry: ReferenceEntry): string {
  if (entry.content && entry.content.trim().length > 0) {
    return entry.content.trim();
  }
  return [entry.title, entry.url, entry.description]
    .map((part) => part?.trim() ?? '')
    .filter((part) => part.length > 0)
    .join(' - ');
}

export function createSectionReferenceStrategy(textClient: TextClient): SectionStrategy {
  return {
    name: STRATEGY_NAME,

    async process(item: DocumentSectionItem): Promise<readonly SemanticRecord[]> {
      const body = sectionBody(item);
      if (!containsAny(`${item.sectionTitle} ${body}`, REFERENCE_MARKERS)) {
        log.debug({ sectionTitle: item.sectionTitle }, 'No reference markers, skipping');
        return [];
      }

      const prompt = `TASK: ${STRATEGY_NAME}
Extract references (links, API docs, code locations, books, papers) from this
document section.

Document: ${item.documentTitle}
Section: ${item.sectionTitle}

${body}

Set "reference_type" to one of "link", "api", "code", "doc", "book" or "paper".
Return an empty "references" array when the section points nowhere.

Respond with a single JSON object matching this JSON Schema:
${REFERENCE_RESPONSE_SHAPE}`;

      const result = await requestStructured({
        textClient,
        prompt,
        schema: ReferenceResponseSchema,
        strategyName: STRATEGY_NAME,
      });
      if (!result) {
        return [];
      }

      const provenance = sectionProvenance(item);
      const entries = parseEntries(result.references, ReferenceEntrySchema, STRATEGY_NAME);
      const records = entries.map(
        (entry): ReferenceRecord => ({
          kind: 'reference',
          payload: {
            content: formatReference(entry),
            referenceKind: toReferenceKind(entry.reference_type),
          },
          keywords: normalizeKeywords(entry.keywords ?? []),
          provenance,
          metadata: { strategy: STRATEGY_NAME },
        }),
      );
      return keepValidRecords(records, STRATEGY_NAME);
    },
  };
}
