import { z } from 'zod';
import type {
  DocumentBlock,
  SourceBundle,
  SourceDocument,
  SourceThread,
} from '@gleaner/shared/src/types/source.types.js';
import { ThreadMessageSchema } from './raw-item.schema.js';

export const DocumentBlockSchema: z.ZodType<DocumentBlock, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    type: z.string().min(1),
    text: z.string().default(''),
    children: z.array(DocumentBlockSchema).optional(),
  }),
);

export const SourceDocumentSchema: z.ZodType<SourceDocument, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  url: z.string().optional(),
  blocks: z.array(DocumentBlockSchema),
});

export const SourceThreadSchema: z.ZodType<SourceThread, z.ZodTypeDef, unknown> = z
  .object({
    channel: z.string().min(1),
    thread_id: z.string().min(1),
    messages: z.array(ThreadMessageSchema),
  })
  .transform((raw) => ({ channel: raw.channel, threadId: raw.thread_id, messages: raw.messages }));

export const SourceBundleSchema: z.ZodType<SourceBundle, z.ZodTypeDef, unknown> = z.object({
  threads: z.array(SourceThreadSchema).default([]),
  documents: z.array(SourceDocumentSchema).default([]),
});
