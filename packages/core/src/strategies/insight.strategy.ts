import { z } from 'zod';
import type {
  DocumentSectionItem,
  ThreadItem,
} from '@gleaner/shared/src/types/raw-item.types.js';
import type { SemanticRecord } from '@gleaner/shared/src/types/semantic.types.js';
import type { TextClient } from '../llm/text-client.js';
import {
  describeResponseShape,
  parseEntries,
  requestStructured,
} from '../llm/structured-request.js';
import { keepValidRecords } from '../records/record-validation.js';
import { InsightEntrySchema, toContentRecord } from './content-records.js';
import {
  sectionBody,
  sectionProvenance,
  threadProvenance,
  threadTranscript,
} from './source-text.js';
import type { SectionStrategy, ThreadStrategy } from './types.js';

const InsightResponseSchema = z.object({
  insights: z.array(z.unknown()).default([]),
});

const INSIGHT_RESPONSE_SHAPE = describeResponseShape(
  z.object({ insights: z.array(InsightEntrySchema) }),
  'InsightResponse',
);

const THREAD_STRATEGY_NAME = 'thread-insight';
const SECTION_STRATEGY_NAME = 'section-insight';

export function createThreadInsightStrategy(textClient: TextClient): ThreadStrategy {
  return {
    name: THREAD_STRATEGY_NAME,

    async process(item: ThreadItem): Promise<readonly SemanticRecord[]> {
      if (item.messages.length === 0) {
        return [];
      }

      const prompt = `TASK: ${THREAD_STRATEGY_NAME}
Extract knowledge worth keeping from this chat thread.

Thread:
${threadTranscript(item)}

Classify each entry:
- "insight": a lesson, decision or fact the team learned
- "feedback": an opinion or request about a product, process or tool
- "reference": a pointer to a link, code location or document; set "reference_type"
  to "link", "code" or "doc"

Return an empty "insights" array when there is nothing worth keeping.

Respond with a single JSON object matching this JSON Schema:
${INSIGHT_RESPONSE_SHAPE}`;

      const result = await requestStructured({
        textClient,
        prompt,
        schema: InsightResponseSchema,
        strategyName: THREAD_STRATEGY_NAME,
      });
      if (!result) {
        return [];
      }

      const provenance = threadProvenance(item);
      const entries = parseEntries(result.insights, InsightEntrySchema, THREAD_STRATEGY_NAME);
      const records = entries.map((entry) =>
        toContentRecord(entry, {
          provenance,
          strategyName: THREAD_STRATEGY_NAME,
          allowReferences: true,
        }),
      );
      return keepValidRecords(records, THREAD_STRATEGY_NAME);
    },
  };
}

export function createSectionInsightStrategy(textClient: TextClient): SectionStrategy {
  return {
    name: SECTION_STRATEGY_NAME,

    async process(item: DocumentSectionItem): Promise<readonly SemanticRecord[]> {
      const body = sectionBody(item);
      if (body.trim().length === 0) {
        return [];
      }

      const prompt = `TASK: ${SECTION_STRATEGY_NAME}
Extract knowledge worth keeping from this document section.

Document: ${item.documentTitle}
Section: ${item.sectionTitle}

${body}

Classify each entry as "insight" (a lesson, decision or fact) or "feedback"
(an opinion or request about a product, process or tool). Return an empty
"insights" array when there is nothing worth keeping.

Respond with a single JSON object matching this JSON Schema:
${INSIGHT_RESPONSE_SHAPE}`;

      const result = await requestStructured({
        textClient,
        prompt,
        schema: InsightResponseSchema,
        strategyName: SECTION_STRATEGY_NAME,
      });
      if (!result) {
        return [];
      }

      const provenance = sectionProvenance(item);
      const entries = parseEntries(result.insights, InsightEntrySchema, SECTION_STRATEGY_NAME);
      const records = entries.map((entry) =>
        toContentRecord(entry, {
          provenance,
          strategyName: SECTION_STRATEGY_NAME,
          allowReferences: false,
        }),
      );
      return keepValidRecords(records, SECTION_STRATEGY_NAME);
    },
  };
}
