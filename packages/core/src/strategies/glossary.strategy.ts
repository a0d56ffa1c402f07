import { z } from 'zod';
import type {
  DocumentSectionItem,
  ThreadItem,
} from '@gleaner/shared/src/types/raw-item.types.js';
import {
  TERM_CATEGORIES,
  type GlossaryRecord,
  type Provenance,
  type SemanticRecord,
  type TermCategory,
} from '@gleaner/shared/src/types/semantic.types.js';
import { isConfidence } from '@gleaner/shared/src/utils/confidence.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import type { TextClient } from '../llm/text-client.js';
import {
  describeResponseShape,
  parseEntries,
  requestStructured,
} from '../llm/structured-request.js';
import { keepValidRecords, normalizeKeywords } from '../records/record-validation.js';
import {
  containsAny,
  sectionBody,
  sectionProvenance,
  threadProvenance,
  threadTranscript,
} from './source-text.js';
import type { SectionStrategy, ThreadStrategy } from './types.js';

const log = createChildLogger('strategy:glossary');

const THREAD_STRATEGY_NAME = 'thread-glossary';
const SECTION_STRATEGY_NAME = 'section-glossary';

export const DEFAULT_MIN_SECTION_LENGTH = 200;

export const GLOSSARY_MARKERS: readonly string[] = [
  'glossary',
  'term',
  'definition',
  'defined as',
  'stands for',
  'abbreviation',
  'acronym',
  ' means ',
  ' is a ',
  ' refers to ',
  '용어',
  '정의',
  '약자',
];

export const GlossaryEntrySchema = z.object({
  term: z.string().default(''),
  definition: z.string().default(''),
  category: z.string().default('other'),
  confidence: z.string().default('low'),
  needs_review: z.boolean().default(false),
  alternative_definitions: z.array(z.string()).nullish(),
  domain_hints: z.array(z.string()).nullish(),
  keywords: z.array(z.string()).nullish(),
});

export type GlossaryEntry = z.infer<typeof GlossaryEntrySchema>;

/** Terms are validated one by one with `GlossaryEntrySchema`. */
export const GlossaryResponseSchema = z.object({
  terms: z.array(z.unknown()).default([]),
});

export const GLOSSARY_RESPONSE_SHAPE = describeResponseShape(
  z.object({ terms: z.array(GlossaryEntrySchema) }),
  'GlossaryResponse',
);

export function parseGlossaryEntries(
  terms: readonly unknown[],
  strategyName: string,
): GlossaryEntry[] {
  return parseEntries(terms, GlossaryEntrySchema, strategyName);
}

export const GLOSSARY_FIELD_GUIDE = `For every term give:
- "category": one of ${TERM_CATEGORIES.map((c) => `"${c}"`).join(', ')}
- "confidence": "high" when the text defines the term explicitly, "medium" when
  the meaning is clear from usage, "low" when you are guessing
- "needs_review": true whenever a human should double-check the definition
- "alternative_definitions": other plausible meanings, if any
- "domain_hints": teams, products or areas the term belongs to`;

function toTermCategory(value: string): TermCategory {
  const normalized = value.trim().toLowerCase();
  return TERM_CATEGORIES.find((category) => category === normalized) ?? 'other';
}

function cleanList(values: readonly string[] | null | undefined): string[] | undefined {
  if (!values) {
    return undefined;
  }
  const cleaned = [...new Set(values.map((v) => v.trim()).filter((v) => v.length > 0))];
  return cleaned.length > 0 ? cleaned : undefined;
}

/** Builds a glossary record; low confidence always forces `needsReview`. */
export function toGlossaryRecord(
  entry: GlossaryEntry,
  provenance: Provenance,
  strategyName: string,
): GlossaryRecord {
  const confidenceLabel = entry.confidence.trim().toLowerCase();
  const confidence = isConfidence(confidenceLabel) ? confidenceLabel : 'low';
  const alternativeDefinitions = cleanList(entry.alternative_definitions);
  const domainHints = cleanList(entry.domain_hints);

  return {
    kind: 'glossary',
    payload: {
      term: entry.term.trim(),
      definition: entry.definition.trim(),
      termCategory: toTermCategory(entry.category),
      confidence,
      needsReview: entry.needs_review || confidence === 'low',
      ...(alternativeDefinitions && { alternativeDefinitions }),
      ...(domainHints && { domainHints }),
    },
    keywords: normalizeKeywords(entry.keywords ?? []),
    provenance,
    metadata: { strategy: strategyName },
  };
}

async function extractTerms(
  textClient: TextClient,
  prompt: string,
  provenance: Provenance,
  strategyName: string,
): Promise<readonly SemanticRecord[]> {
  const result = await requestStructured({
    textClient,
    prompt,
    schema: GlossaryResponseSchema,
    strategyName,
  });
  if (!result) {
    return [];
  }

  const records = parseGlossaryEntries(result.terms, strategyName).map((entry) =>
    toGlossaryRecord(entry, provenance, strategyName),
  );
  return keepValidRecords(records, strategyName);
}

export function createThreadGlossaryStrategy(textClient: TextClient): ThreadStrategy {
  return {
    name: THREAD_STRATEGY_NAME,

    async process(item: ThreadItem): Promise<readonly SemanticRecord[]> {
      const transcript = threadTranscript(item);
      if (transcript.trim().length === 0) {
        return [];
      }

      const prompt = `TASK: glossary
Find the jargon, internal product names, acronyms and project codenames used
in this chat thread and define them for a newcomer.

Thread:
${transcript}

${GLOSSARY_FIELD_GUIDE}

Return an empty "terms" array when the thread uses no such terms.

Respond with a single JSON object matching this JSON Schema:
${GLOSSARY_RESPONSE_SHAPE}`;

      return extractTerms(textClient, prompt, threadProvenance(item), THREAD_STRATEGY_NAME);
    },
  };
}

export interface SectionGlossaryOptions {
  readonly minSectionLength?: number;
}

export function createSectionGlossaryStrategy(
  textClient: TextClient,
  options: SectionGlossaryOptions = {},
): SectionStrategy {
  const minSectionLength = options.minSectionLength ?? DEFAULT_MIN_SECTION_LENGTH;

  return {
    name: SECTION_STRATEGY_NAME,

    async process(item: DocumentSectionItem): Promise<readonly SemanticRecord[]> {
      const body = sectionBody(item);
      if (
        body.length < minSectionLength &&
        !containsAny(`${item.sectionTitle} ${body}`, GLOSSARY_MARKERS)
      ) {
        log.debug(
          { sectionTitle: item.sectionTitle, length: body.length },
          'Section too short and has no glossary markers, skipping',
        );
        return [];
      }

      const prompt = `TASK: glossary
Find the jargon, internal product names, acronyms and project codenames used
in this document section and define them for a newcomer.

Document: ${item.documentTitle}
Section: ${item.sectionTitle}

${body}

${GLOSSARY_FIELD_GUIDE}

Return an empty "terms" array when the section uses no such terms.

Respond with a single JSON object matching this JSON Schema:
${GLOSSARY_RESPONSE_SHAPE}`;

      return extractTerms(textClient, prompt, sectionProvenance(item), SECTION_STRATEGY_NAME);
    },
  };
}
