import { describe, it, expect } from 'vitest';
import type { ThreadItem } from '@gleaner/shared/src/types/raw-item.types.js';
import { createFakeTextClient } from '../test-helpers.js';
import { createStrategyRegistry } from './strategy-registry.js';
import { createDefaultRegistries } from './strategy-factory.js';
import type { ThreadStrategy } from './types.js';

function namedStrategy(name: string): ThreadStrategy {
  return { name, process: () => Promise.resolve([]) };
}

describe('createStrategyRegistry', () => {
  it('should keep registration order', () => {
    const registry = createStrategyRegistry<ThreadItem>('thread');
    registry.register('glossary', namedStrategy('g'));
    registry.register('qna', namedStrategy('q'));

    expect(registry.kinds()).toEqual(['glossary', 'qna']);
    expect(registry.strategies().map((s) => s.name)).toEqual(['g', 'q']);
  });

  it('should replace a kind in place', () => {
    const registry = createStrategyRegistry<ThreadItem>('thread');
    registry.register('qna', namedStrategy('first'));
    registry.register('insight', namedStrategy('insight'));
    registry.register('qna', namedStrategy('second'));

    expect(registry.strategies().map((s) => s.name)).toEqual(['second', 'insight']);
    expect(registry.get('qna')?.name).toBe('second');
    expect(registry.get('glossary')).toBeUndefined();
  });
});

describe('createDefaultRegistries', () => {
  it('should register the built-in strategies per origin', () => {
    const registries = createDefaultRegistries(createFakeTextClient());

    expect(registries.thread?.origin).toBe('thread');
    expect(registries.thread?.strategies().map((s) => s.name)).toEqual([
      'thread-qna',
      'thread-insight',
      'thread-glossary',
    ]);
    expect(registries.document_section?.strategies().map((s) => s.name)).toEqual([
      'section-insight',
      'section-instruction',
      'section-reference',
      'section-glossary',
    ]);
  });
});
