import { z } from 'zod';
import type { DocumentSectionItem } from '@gleaner/shared/src/types/raw-item.types.js';
import type {
  InstructionRecord,
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
import { containsAny, sectionBody, sectionProvenance } from './source-text.js';
import type { SectionStrategy } from './types.js';

const log = createChildLogger('strategy:section-instruction');

const STRATEGY_NAME = 'section-instruction';

export const GUIDE_TITLE_MARKERS: readonly string[] = [
  'how to',
  'how-to',
  'guide',
  'tutorial',
  'instruction',
  'setup',
  'set up',
  'steps',
  '방법',
  '가이드',
  '튜토리얼',
  '지침',
];

const InstructionEntrySchema = z.object({
  title: z.string().nullish(),
  content: z.string().nullish(),
  steps: z.array(z.string()).nullish(),
  keywords: z.array(z.string()).nullish(),
});

const InstructionResponseSchema = z.object({
  instructions: z.array(z.unknown()).default([]),
});

const INSTRUCTION_RESPONSE_SHAPE = describeResponseShape(
  z.object({ instructions: z.array(InstructionEntrySchema) }),
  'InstructionResponse',
);

type InstructionEntry = z.infer<typeof InstructionEntrySchema>;

export function formatInstruction(entry: InstructionEntry): string {
  if (entry.content && entry.content.trim().length > 0) {
    return entry.content.trim();
  }

  const steps = (entry.steps ?? [])
    .map((step) => step.trim())
    .filter((step) => step.length > 0)
    .map((step, index) => `${String(index + 1)}. ${step}`);

  return [entry.title?.trim() ?? '', ...steps].filter((line) => line.length > 0).join('\n');
}

export function createSectionInstructionStrategy(textClient: TextClient): SectionStrategy {
  return {
    name: STRATEGY_NAME,

    async process(item: DocumentSectionItem): Promise<readonly SemanticRecord[]> {
      if (!containsAny(item.sectionTitle, GUIDE_TITLE_MARKERS)) {
        log.debug({ sectionTitle: item.sectionTitle }, 'Section title is not guide-like, skipping');
        return [];
      }

      const prompt = `TASK: ${STRATEGY_NAME}
Extract step-by-step instructions from this document section.

Document: ${item.documentTitle}
Section: ${item.sectionTitle}

${sectionBody(item)}

Give each procedure a short title and its steps in order. Return an empty
"instructions" array when the section describes no procedure.

Respond with a single JSON object matching this JSON Schema:
${INSTRUCTION_RESPONSE_SHAPE}`;

      const result = await requestStructured({
        textClient,
        prompt,
        schema: InstructionResponseSchema,
        strategyName: STRATEGY_NAME,
      });
      if (!result) {
        return [];
      }

      const provenance = sectionProvenance(item);
      const entries = parseEntries(result.instructions, InstructionEntrySchema, STRATEGY_NAME);
      const records = entries.map(
        (entry): InstructionRecord => ({
          kind: 'instruction',
          payload: { content: formatInstruction(entry) },
          keywords: normalizeKeywords(entry.keywords ?? []),
          provenance,
          metadata: { strategy: STRATEGY_NAME },
        }),
      );
      return keepValidRecords(records, STRATEGY_NAME);
    },
  };
}
