import { z } from 'zod';
import { CONFIDENCE_LEVELS } from '@gleaner/shared/src/types/semantic.types.js';

const LlmConfigSchema = z.object({
  model: z.string().min(1).default('gemini-2.0-flash'),
  location: z.string().min(1).default('europe-west1'),
  temperature: z.number().min(0).max(2).default(0.3),
  requestTimeoutMs: z.number().int().positive().default(60_000),
});

const StoreConfigSchema = z.object({
  dbPath: z.string().min(1).default('data/semantic.db'),
});

const ExtractionConfigSchema = z.object({
  itemTimeoutMs: z.number().int().positive().optional(),
  minSectionLength: z.number().int().nonnegative().default(200),
});

const EnhancementConfigSchema = z.object({
  enabled: z.boolean().default(true),
  confidenceThreshold: z.enum(CONFIDENCE_LEVELS).default('low'),
  context: z.string().default(''),
});

export const GleanerConfigSchema = z.object({
  $schema: z.string().optional(),
  llm: LlmConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  enhancement: EnhancementConfigSchema.default({}),
});

export type GleanerConfig = z.infer<typeof GleanerConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;
export type EnhancementConfig = z.infer<typeof EnhancementConfigSchema>;
