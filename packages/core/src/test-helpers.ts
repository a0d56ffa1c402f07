import { vi } from 'vitest';
import type {
  DocumentSectionItem,
  ThreadItem,
  ThreadMessage,
} from '@gleaner/shared/src/types/raw-item.types.js';
import type {
  GlossaryPayload,
  GlossaryRecord,
  QnaRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import type { TextClient } from './llm/text-client.js';
import type { JsonObject } from './llm/json-extraction.js';

export function createFakeTextClient(
  generateJson: TextClient['generateJson'] = () => Promise.resolve({}),
): TextClient {
  return {
    open: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
    generateText: vi.fn().mockResolvedValue(''),
    generateJson: vi.fn(generateJson),
  };
}

/** A client that answers every JSON request with `response`. */
export function createRespondingTextClient(response: JsonObject): TextClient {
  return createFakeTextClient(() => Promise.resolve(response));
}

export function createFailingTextClient(error: Error): TextClient {
  return createFakeTextClient(() => Promise.reject(error));
}

export function message(author: string, text: string, permalink?: string): ThreadMessage {
  return {
    author,
    text,
    timestamp: '2024-03-01T10:00:00.000Z',
    ...(permalink !== undefined && { permalink }),
  };
}

export function threadItem(
  messages: readonly ThreadMessage[],
  overrides: Partial<Omit<ThreadItem, 'origin' | 'messages'>> = {},
): ThreadItem {
  return {
    origin: 'thread',
    channel: '#platform-help',
    threadId: 'thread-1',
    messages,
    ...overrides,
  };
}

export function sectionItem(
  sectionTitle: string,
  content: readonly string[],
  overrides: Partial<Omit<DocumentSectionItem, 'origin' | 'sectionTitle' | 'content'>> = {},
): DocumentSectionItem {
  return {
    origin: 'document_section',
    documentId: 'doc-1',
    documentTitle: 'Platform Handbook',
    sectionTitle,
    content,
    ...overrides,
  };
}

export function glossaryRecord(payload: Partial<GlossaryPayload> & { term: string }): GlossaryRecord {
  return {
    kind: 'glossary',
    payload: {
      definition: `${payload.term} definition`,
      termCategory: 'other',
      confidence: 'medium',
      needsReview: false,
      ...payload,
    },
    keywords: [payload.term],
    provenance: {
      origin: 'document_section',
      documentId: 'doc-1',
      documentTitle: 'Platform Handbook',
      sectionTitle: 'Glossary',
    },
    metadata: { strategy: 'section-glossary' },
  };
}

export const deployQna: QnaRecord = {
  kind: 'qna',
  payload: { question: 'How do I deploy to staging?', answer: 'Run the staging pipeline.' },
  keywords: ['deploy', 'staging'],
  provenance: {
    origin: 'thread',
    channel: '#platform-help',
    threadId: 'thread-1',
    authors: ['alice', 'bob'],
    questioner: 'alice',
    answerer: 'bob',
    permalinks: ['https://chat.example.com/p/1'],
  },
  metadata: { strategy: 'thread-qna' },
};

export const sloGlossary: GlossaryRecord = glossaryRecord({
  term: 'SLO',
  definition: 'Service level objective',
  termCategory: 'operations',
  confidence: 'high',
  domainHints: ['sre'],
});

/** Yields 2024-03-01T00:00:00Z, then one second later on every call. */
export function steppingClock(start = Date.UTC(2024, 2, 1)): () => Date {
  let tick = 0;
  return () => new Date(start + 1000 * tick++);
}
