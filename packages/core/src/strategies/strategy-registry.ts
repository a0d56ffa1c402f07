import type { RawItem } from '@gleaner/shared/src/types/raw-item.types.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import type { ExtractionStrategy, StrategyKind } from './types.js';

const log = createChildLogger('strategies:registry');

/** Strategies for one item origin, kept in registration order. */
export interface StrategyRegistry<TItem extends RawItem> {
  readonly origin: TItem['origin'];
  register(kind: StrategyKind, strategy: ExtractionStrategy<TItem>): void;
  get(kind: StrategyKind): ExtractionStrategy<TItem> | undefined;
  kinds(): readonly StrategyKind[];
  strategies(): readonly ExtractionStrategy<TItem>[];
}

export function createStrategyRegistry<TItem extends RawItem>(
  origin: TItem['origin'],
): StrategyRegistry<TItem> {
  const entries = new Map<StrategyKind, ExtractionStrategy<TItem>>();

  return {
    origin,

    register(kind: StrategyKind, strategy: ExtractionStrategy<TItem>): void {
      // Re-registering a kind swaps the strategy but keeps its original position.
      if (entries.has(kind)) {
        log.debug({ origin, kind, strategy: strategy.name }, 'Replacing registered strategy');
      }
      entries.set(kind, strategy);
    },

    get(kind: StrategyKind): ExtractionStrategy<TItem> | undefined {
      return entries.get(kind);
    },

    kinds(): readonly StrategyKind[] {
      return [...entries.keys()];
    },

    strategies(): readonly ExtractionStrategy<TItem>[] {
      return [...entries.values()];
    },
  };
}
