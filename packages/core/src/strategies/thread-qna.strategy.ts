import { z } from 'zod';
import type { ThreadItem } from '@gleaner/shared/src/types/raw-item.types.js';
import type { QnaRecord, SemanticRecord } from '@gleaner/shared/src/types/semantic.types.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import type { TextClient } from '../llm/text-client.js';
import { describeResponseShape, requestStructured } from '../llm/structured-request.js';
import { keepValidRecords, normalizeKeywords } from '../records/record-validation.js';
import { threadProvenance } from './source-text.js';
import type { ThreadStrategy } from './types.js';

const log = createChildLogger('strategy:thread-qna');

const STRATEGY_NAME = 'thread-qna';
const MIN_MESSAGES = 2;

const QnaResponseSchema = z.object({
  is_valuable: z.boolean(),
  question: z.string().default(''),
  answer: z.string().default(''),
  keywords: z.array(z.string()).default([]),
});

const QNA_RESPONSE_SHAPE = describeResponseShape(QnaResponseSchema, 'QnaResponse');

export function buildQnaPrompt(question: string, answer: string): string {
  return `TASK: ${STRATEGY_NAME}
You turn a chat thread's opening question and its first reply into a clean,
self-contained Q&A pair for an internal FAQ.

Question:
${question}

Answer:
${answer}

Set "is_valuable" to false when the exchange is small talk, unresolved, or too
specific to one person to help anyone else. Otherwise rewrite both sides so they
read well without the surrounding conversation and list a few search keywords.

Respond with a single JSON object matching this JSON Schema:
${QNA_RESPONSE_SHAPE}`;
}

export function createThreadQnaStrategy(textClient: TextClient): ThreadStrategy {
  return {
    name: STRATEGY_NAME,

    async process(item: ThreadItem): Promise<readonly SemanticRecord[]> {
      if (item.messages.length < MIN_MESSAGES) {
        log.debug({ threadId: item.threadId }, 'Thread too short for a Q&A pair');
        return [];
      }

      const [questionMessage, answerMessage] = item.messages;

      const result = await requestStructured({
        textClient,
        prompt: buildQnaPrompt(questionMessage.text, answerMessage.text),
        schema: QnaResponseSchema,
        strategyName: STRATEGY_NAME,
      });

      if (!result?.is_valuable) {
        return [];
      }

      const permalinks = [questionMessage.permalink, answerMessage.permalink].filter(
        (link): link is string => link !== undefined,
      );

      const record: QnaRecord = {
        kind: 'qna',
        payload: { question: result.question.trim(), answer: result.answer.trim() },
        keywords: normalizeKeywords(result.keywords),
        provenance: {
          ...threadProvenance(item),
          questioner: questionMessage.author,
          answerer: answerMessage.author,
          permalinks,
        },
        metadata: { strategy: STRATEGY_NAME },
      };

      return keepValidRecords([record], STRATEGY_NAME);
    },
  };
}
