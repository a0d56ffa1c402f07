import type {
  ProgressCallback,
  RawItem,
} from '@gleaner/shared/src/types/raw-item.types.js';
import type { SemanticRecord } from '@gleaner/shared/src/types/semantic.types.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import {
  ExtractionCancelledError,
  TimeoutError,
  toError,
} from '@gleaner/shared/src/utils/errors.js';
import { withTimeout } from '@gleaner/shared/src/utils/timeout.js';
import type { StrategyRegistries } from '../strategies/strategy-factory.js';
import type { ExtractionStrategy } from '../strategies/types.js';

const log = createChildLogger('orchestration:extraction');

export interface ExtractionOptions {
  readonly onProgress?: ProgressCallback;
  /** Checked before each item; an aborted run throws `ExtractionCancelledError`. */
  readonly signal?: AbortSignal;
  /** Wall-clock limit for one item across all of its strategies. */
  readonly itemTimeoutMs?: number;
}

export interface ExtractionOrchestratorConfig {
  readonly registries: StrategyRegistries;
  readonly itemTimeoutMs?: number;
}

export interface ExtractionOrchestrator {
  extract(items: readonly RawItem[], options?: ExtractionOptions): Promise<SemanticRecord[]>;
}

function reportProgress(
  onProgress: ProgressCallback | undefined,
  current: number,
  total: number,
): void {
  if (!onProgress) {
    return;
  }
  try {
    onProgress(current, total);
  } catch (error) {
    log.warn({ current, total, error: toError(error).message }, 'Progress callback failed');
  }
}

async function runStrategies<TItem extends RawItem>(
  strategies: readonly ExtractionStrategy<TItem>[],
  item: TItem,
  index: number,
): Promise<SemanticRecord[]> {
  const records: SemanticRecord[] = [];

  for (const strategy of strategies) {
    try {
      const produced = await strategy.process(item);
      records.push(...produced);
    } catch (error) {
      log.error(
        { index, origin: item.origin, strategy: strategy.name, error: toError(error).message },
        'Strategy failed, continuing with the next one',
      );
    }
  }

  return records;
}

export function createExtractionOrchestrator(
  config: ExtractionOrchestratorConfig,
): ExtractionOrchestrator {
  const { registries } = config;

  function processItem(item: RawItem, index: number): Promise<SemanticRecord[]> {
    if (item.origin === 'thread') {
      return runStrategies(registries.thread?.strategies() ?? [], item, index);
    }
    return runStrategies(registries.document_section?.strategies() ?? [], item, index);
  }

  return {
    async extract(
      items: readonly RawItem[],
      options: ExtractionOptions = {},
    ): Promise<SemanticRecord[]> {
      const { onProgress, signal } = options;
      const itemTimeoutMs = options.itemTimeoutMs ?? config.itemTimeoutMs;
      const total = items.length;
      const records: SemanticRecord[] = [];

      log.info({ total, itemTimeoutMs }, 'Starting extraction');

      for (const [index, item] of items.entries()) {
        if (signal?.aborted) {
          log.warn({ completed: index, total }, 'Extraction cancelled');
          throw new ExtractionCancelledError(
            `Extraction cancelled after ${String(index)} of ${String(total)} items`,
            [...records],
          );
        }

        reportProgress(onProgress, index, total);

        // An item contributes everything its strategies produced, or nothing on timeout.
        let itemRecords: SemanticRecord[];
        try {
          itemRecords =
            itemTimeoutMs === undefined
              ? await processItem(item, index)
              : await withTimeout(processItem(item, index), itemTimeoutMs, `Item ${String(index)}`);
        } catch (error) {
          if (!(error instanceof TimeoutError)) {
            throw error;
          }
          log.warn({ index, origin: item.origin, timeoutMs: error.timeoutMs }, 'Item timed out');
          itemRecords = [];
        }

        log.debug({ index, origin: item.origin, records: itemRecords.length }, 'Item processed');
        records.push(...itemRecords);
      }

      reportProgress(onProgress, total, total);
      log.info({ total, records: records.length }, 'Extraction complete');

      return records;
    },
  };
}
