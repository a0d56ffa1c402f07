import type { SemanticRecord } from '@gleaner/shared/src/types/semantic.types.js';
import type {
  DocumentSectionItem,
  RawItem,
  ThreadItem,
} from '@gleaner/shared/src/types/raw-item.types.js';

export const STRATEGY_KINDS = ['qna', 'insight', 'instruction', 'reference', 'glossary'] as const;

export type StrategyKind = (typeof STRATEGY_KINDS)[number];

/**
 * Turns one raw item into zero or more records. Implementations have no side
 * effects beyond the returned list and resolve to `[]` when the text service
 * fails or answers with something unusable.
 */
export interface ExtractionStrategy<TItem extends RawItem = RawItem> {
  readonly name: string;
  process(item: TItem): Promise<readonly SemanticRecord[]>;
}

export type ThreadStrategy = ExtractionStrategy<ThreadItem>;
export type SectionStrategy = ExtractionStrategy<DocumentSectionItem>;
