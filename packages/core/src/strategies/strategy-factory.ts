import type {
  DocumentSectionItem,
  ThreadItem,
} from '@gleaner/shared/src/types/raw-item.types.js';
import type { TextClient } from '../llm/text-client.js';
import { createStrategyRegistry, type StrategyRegistry } from './strategy-registry.js';
import { createThreadQnaStrategy } from './thread-qna.strategy.js';
import { createSectionInsightStrategy, createThreadInsightStrategy } from './insight.strategy.js';
import { createSectionInstructionStrategy } from './section-instruction.strategy.js';
import { createSectionReferenceStrategy } from './section-reference.strategy.js';
import {
  createSectionGlossaryStrategy,
  createThreadGlossaryStrategy,
  type SectionGlossaryOptions,
} from './glossary.strategy.js';

export interface StrategyRegistries {
  readonly thread?: StrategyRegistry<ThreadItem>;
  readonly document_section?: StrategyRegistry<DocumentSectionItem>;
}

export function createThreadRegistry(textClient: TextClient): StrategyRegistry<ThreadItem> {
  const registry = createStrategyRegistry<ThreadItem>('thread');
  registry.register('qna', createThreadQnaStrategy(textClient));
  registry.register('insight', createThreadInsightStrategy(textClient));
  registry.register('glossary', createThreadGlossaryStrategy(textClient));
  return registry;
}

export function createSectionRegistry(
  textClient: TextClient,
  options: SectionGlossaryOptions = {},
): StrategyRegistry<DocumentSectionItem> {
  const registry = createStrategyRegistry<DocumentSectionItem>('document_section');
  registry.register('insight', createSectionInsightStrategy(textClient));
  registry.register('instruction', createSectionInstructionStrategy(textClient));
  registry.register('reference', createSectionReferenceStrategy(textClient));
  registry.register('glossary', createSectionGlossaryStrategy(textClient, options));
  return registry;
}

/** The built-in strategy set for both origins, sharing one text client. */
export function createDefaultRegistries(
  textClient: TextClient,
  options: SectionGlossaryOptions = {},
): StrategyRegistries {
  return {
    thread: createThreadRegistry(textClient),
    document_section: createSectionRegistry(textClient, options),
  };
}
