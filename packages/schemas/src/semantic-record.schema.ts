import { z } from 'zod';
import {
  CONFIDENCE_LEVELS,
  TERM_CATEGORIES,
  type SemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';

const nonBlank = z.string().refine((value) => value.trim().length > 0, {
  message: 'must not be blank',
});

export const ProvenanceSchema = z.discriminatedUnion('origin', [
  z.object({
    origin: z.literal('thread'),
    channel: z.string(),
    threadId: z.string(),
    authors: z.array(z.string()),
    questioner: z.string().optional(),
    answerer: z.string().optional(),
    permalinks: z.array(z.string()),
  }),
  z.object({
    origin: z.literal('document_section'),
    documentId: z.string(),
    documentTitle: z.string(),
    sectionTitle: z.string(),
    permalink: z.string().optional(),
  }),
  z.object({
    origin: z.literal('enhancement'),
    reviewedTerms: z.array(z.string()),
  }),
]);

const recordBase = {
  keywords: z.array(z.string()),
  provenance: ProvenanceSchema,
  metadata: z.record(z.unknown()),
};

const ContentPayloadSchema = z.object({ content: nonBlank });

export const GlossaryPayloadSchema = z
  .object({
    term: nonBlank,
    definition: z.string(),
    termCategory: z.enum(TERM_CATEGORIES),
    confidence: z.enum(CONFIDENCE_LEVELS),
    needsReview: z.boolean(),
    alternativeDefinitions: z.array(z.string()).optional(),
    domainHints: z.array(z.string()).optional(),
  })
  .refine((payload) => payload.confidence !== 'low' || payload.needsReview, {
    message: 'low confidence requires needsReview',
    path: ['needsReview'],
  });

/** A record that satisfies every data-model invariant. */
export const SemanticRecordSchema: z.ZodType<SemanticRecord, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('qna'),
      payload: z.object({ question: nonBlank, answer: nonBlank }),
      ...recordBase,
    }),
    z.object({ kind: z.literal('insight'), payload: ContentPayloadSchema, ...recordBase }),
    z.object({ kind: z.literal('feedback'), payload: ContentPayloadSchema, ...recordBase }),
    z.object({ kind: z.literal('instruction'), payload: ContentPayloadSchema, ...recordBase }),
    z.object({
      kind: z.literal('reference'),
      payload: z.object({ content: nonBlank, referenceKind: z.string() }),
      ...recordBase,
    }),
    z.object({ kind: z.literal('glossary'), payload: GlossaryPayloadSchema, ...recordBase }),
  ]);
