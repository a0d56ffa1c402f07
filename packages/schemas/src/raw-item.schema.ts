import { z } from 'zod';
import type {
  DocumentSectionItem,
  RawItem,
  ThreadItem,
} from '@gleaner/shared/src/types/raw-item.types.js';

// Upstream providers hand items over in snake_case; the core works in camelCase.

export const ThreadMessageSchema = z.object({
  text: z.string(),
  author: z.string().default('Unknown'),
  timestamp: z.string(),
  permalink: z.string().optional(),
});

export const ThreadItemSchema = z
  .object({
    origin: z.literal('thread'),
    channel: z.string().min(1),
    thread_id: z.string().min(1),
    messages: z.array(ThreadMessageSchema),
  })
  .transform(
    (raw): ThreadItem => ({
      origin: 'thread',
      channel: raw.channel,
      threadId: raw.thread_id,
      messages: raw.messages,
    }),
  );

export const DocumentSectionItemSchema = z
  .object({
    origin: z.literal('document_section'),
    document_id: z.string().min(1),
    document_title: z.string().default(''),
    section_title: z.string().default('Untitled Section'),
    content: z.array(z.string()),
    permalink: z.string().optional(),
  })
  .transform(
    (raw): DocumentSectionItem => ({
      origin: 'document_section',
      documentId: raw.document_id,
      documentTitle: raw.document_title,
      sectionTitle: raw.section_title,
      content: raw.content,
      permalink: raw.permalink,
    }),
  );

export const RawItemSchema: z.ZodType<RawItem, z.ZodTypeDef, unknown> = z.union([
  ThreadItemSchema,
  DocumentSectionItemSchema,
]);

export const RawItemBatchSchema = z.array(RawItemSchema);
