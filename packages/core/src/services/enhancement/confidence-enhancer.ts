import type {
  Confidence,
  GlossaryPayload,
  GlossaryRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import { confidenceRank, isHigherConfidence } from '@gleaner/shared/src/utils/confidence.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import type { TextClient } from '../../llm/text-client.js';
import { requestStructured } from '../../llm/structured-request.js';
import { keepValidRecords, normalizeKeywords } from '../../records/record-validation.js';
import {
  GLOSSARY_FIELD_GUIDE,
  GLOSSARY_RESPONSE_SHAPE,
  GlossaryResponseSchema,
  parseGlossaryEntries,
  toGlossaryRecord,
} from '../../strategies/glossary.strategy.js';

const log = createChildLogger('enhancement:confidence');

const ENHANCEMENT_NAME = 'glossary-enhancement';

export const DEFAULT_CONFIDENCE_THRESHOLD: Confidence = 'low';

export function needsReevaluation(record: GlossaryRecord, threshold: Confidence): boolean {
  return (
    record.payload.needsReview ||
    confidenceRank(record.payload.confidence) <= confidenceRank(threshold)
  );
}

function termKey(term: string): string {
  return term.trim().toLowerCase();
}

function mergeAlternatives(
  definition: string,
  ...sources: (readonly string[] | undefined)[]
): string[] | undefined {
  const seen = new Set<string>([definition.trim()]);
  const merged: string[] = [];
  for (const value of sources.flatMap((source) => source ?? [])) {
    const alternative = value.trim();
    if (alternative.length === 0 || seen.has(alternative)) {
      continue;
    }
    seen.add(alternative);
    merged.push(alternative);
  }
  return merged.length > 0 ? merged : undefined;
}

function mergeDomainHints(
  ...sources: (readonly string[] | undefined)[]
): string[] | undefined {
  const merged = [...new Set(sources.flatMap((source) => source ?? []))];
  return merged.length > 0 ? merged : undefined;
}

function withLists(
  payload: Omit<GlossaryPayload, 'alternativeDefinitions' | 'domainHints'>,
  alternativeDefinitions: string[] | undefined,
  domainHints: string[] | undefined,
): GlossaryPayload {
  return {
    ...payload,
    ...(alternativeDefinitions && { alternativeDefinitions }),
    ...(domainHints && { domainHints }),
  };
}

/** The candidate wins; the definition it displaces becomes an alternative. */
function replaceWith(original: GlossaryRecord, candidate: GlossaryRecord): GlossaryRecord {
  const { alternativeDefinitions: _alternatives, domainHints: _hints, ...payload } =
    candidate.payload;
  return {
    ...original,
    payload: withLists(
      { ...payload, term: original.payload.term },
      mergeAlternatives(
        candidate.payload.definition,
        candidate.payload.alternativeDefinitions,
        [original.payload.definition],
        original.payload.alternativeDefinitions,
      ),
      mergeDomainHints(original.payload.domainHints, candidate.payload.domainHints),
    ),
    keywords: normalizeKeywords([...original.keywords, ...candidate.keywords]),
    metadata: { ...original.metadata, enhancedBy: ENHANCEMENT_NAME },
  };
}

/** The original stays, flagged for review, and takes in what the candidate offered. */
function keepWithAlternatives(original: GlossaryRecord, candidate: GlossaryRecord): GlossaryRecord {
  const { alternativeDefinitions: _alternatives, domainHints: _hints, ...payload } =
    original.payload;
  return {
    ...original,
    payload: withLists(
      { ...payload, needsReview: true },
      mergeAlternatives(
        original.payload.definition,
        original.payload.alternativeDefinitions,
        [candidate.payload.definition],
        candidate.payload.alternativeDefinitions,
      ),
      mergeDomainHints(original.payload.domainHints, candidate.payload.domainHints),
    ),
    keywords: normalizeKeywords([...original.keywords, ...candidate.keywords]),
  };
}

function flagForReview(record: GlossaryRecord): GlossaryRecord {
  return record.payload.needsReview
    ? record
    : { ...record, payload: { ...record.payload, needsReview: true } };
}

function buildReviewPrompt(toReview: readonly GlossaryRecord[], context: string): string {
  const listing = toReview
    .map(
      (record) =>
        `- ${record.payload.term} (confidence: ${record.payload.confidence}): ${record.payload.definition}`,
    )
    .join('\n');

  return `TASK: glossary-review
The glossary terms below were defined with low confidence or were flagged for
review. Re-derive each definition using the context. You may also add closely
related terms the context defines that are missing from the list.

Context:
${context.trim().length > 0 ? context : '(none)'}

Terms:
${listing}

${GLOSSARY_FIELD_GUIDE}

Respond with a single JSON object matching this JSON Schema:
${GLOSSARY_RESPONSE_SHAPE}`;
}

/**
 * Re-derives glossary terms at or below `threshold` (or already flagged for
 * review) in one request and merges the answers back.
 *
 * A re-derived definition replaces the original only when its confidence is
 * strictly higher. Otherwise the original is kept with `needsReview` set and
 * the new definition recorded as an alternative. Terms the service does not
 * mention, or every reviewed term when the service fails, are kept with
 * `needsReview` set. Terms the service adds are appended after the input,
 * which otherwise keeps its order.
 */
export async function enhanceGlossary(
  records: readonly GlossaryRecord[],
  textClient: TextClient,
  context: string,
  threshold: Confidence = DEFAULT_CONFIDENCE_THRESHOLD,
): Promise<GlossaryRecord[]> {
  const toReview = records.filter((record) => needsReevaluation(record, threshold));
  if (toReview.length === 0) {
    log.debug({ total: records.length, threshold }, 'No glossary terms need re-evaluation');
    return [...records];
  }

  log.info(
    { total: records.length, toReview: toReview.length, threshold },
    'Re-evaluating glossary terms',
  );

  const response = await requestStructured({
    textClient,
    prompt: buildReviewPrompt(toReview, context),
    schema: GlossaryResponseSchema,
    strategyName: ENHANCEMENT_NAME,
  });

  if (!response) {
    log.warn({ toReview: toReview.length }, 'Re-evaluation unavailable, flagging terms for review');
    return records.map((record) =>
      needsReevaluation(record, threshold) ? flagForReview(record) : record,
    );
  }

  const reviewedTerms = toReview.map((record) => record.payload.term);
  const candidates = keepValidRecords(
    parseGlossaryEntries(response.terms, ENHANCEMENT_NAME).map((entry) =>
      toGlossaryRecord(entry, { origin: 'enhancement', reviewedTerms }, ENHANCEMENT_NAME),
    ),
    ENHANCEMENT_NAME,
  );

  const merged = new Map<string, GlossaryRecord>();
  for (const record of toReview) {
    const key = termKey(record.payload.term);
    if (!merged.has(key)) {
      merged.set(key, record);
    }
  }
  const answered = new Set<string>();
  const discovered: GlossaryRecord[] = [];
  let replaced = 0;

  for (const candidate of candidates) {
    const key = termKey(candidate.payload.term);
    const current = merged.get(key);
    if (!current) {
      discovered.push(candidate);
      continue;
    }
    answered.add(key);
    if (isHigherConfidence(candidate.payload.confidence, current.payload.confidence)) {
      merged.set(key, replaceWith(current, candidate));
      replaced += 1;
    } else {
      merged.set(key, keepWithAlternatives(current, candidate));
    }
  }

  // Only the first record for a term takes the merged answer; repeats stay as they were.
  const applied = new Set<string>();
  const result = records.map((record) => {
    if (!needsReevaluation(record, threshold)) {
      return record;
    }
    const key = termKey(record.payload.term);
    const update = answered.has(key) && !applied.has(key) ? merged.get(key) : undefined;
    applied.add(key);
    return update ?? flagForReview(record);
  });

  log.info(
    {
      reviewed: toReview.length,
      replaced,
      unresolved: toReview.length - answered.size,
      discovered: discovered.length,
    },
    'Glossary re-evaluation merged',
  );

  return [...result, ...discovered];
}
