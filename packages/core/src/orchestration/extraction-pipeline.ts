import { StateGraph, START, END } from '@langchain/langgraph';
import type { RawItem } from '@gleaner/shared/src/types/raw-item.types.js';
import {
  isGlossaryRecord,
  type SemanticRecord,
  type StoredSemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import type { EnhancementConfig } from '@gleaner/schemas/src/config.schema.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import type { TextClient } from '../llm/text-client.js';
import type { SemanticStore } from '../repositories/semantic-store.js';
import { keepValidRecords } from '../records/record-validation.js';
import {
  DEFAULT_CONFIDENCE_THRESHOLD,
  enhanceGlossary,
} from '../services/enhancement/confidence-enhancer.js';
import type { ExtractionOptions, ExtractionOrchestrator } from './extraction-orchestrator.js';
import { ExtractionGraphAnnotation, type ExtractionGraphState } from './pipeline-state.js';

const log = createChildLogger('orchestration:pipeline');

export interface ExtractionPipelineConfig {
  readonly orchestrator: ExtractionOrchestrator;
  readonly textClient: TextClient;
  /** Without a store the pipeline extracts and enhances but persists nothing. */
  readonly store?: SemanticStore;
  readonly enhancement?: Partial<EnhancementConfig>;
}

export interface ExtractionPipelineResult {
  readonly records: readonly SemanticRecord[];
  readonly stored: readonly StoredSemanticRecord[];
  /** Glossary records the enhancement pass changed or added. */
  readonly glossaryEnhanced: number;
}

export interface ExtractionPipeline {
  run(items: readonly RawItem[], options?: ExtractionOptions): Promise<ExtractionPipelineResult>;
}

/**
 * Puts enhanced glossary records back into the glossary slots of `records`,
 * in order; terms the pass discovered go at the end.
 */
function mergeGlossary(
  records: readonly SemanticRecord[],
  enhanced: readonly SemanticRecord[],
): SemanticRecord[] {
  let next = 0;
  const merged = records.map((record) => (isGlossaryRecord(record) ? enhanced[next++] : record));
  return [...merged, ...enhanced.slice(next)];
}

export function createExtractionPipeline(config: ExtractionPipelineConfig): ExtractionPipeline {
  const { orchestrator, textClient, store } = config;
  const enhancementEnabled = config.enhancement?.enabled ?? true;
  const threshold = config.enhancement?.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const context = config.enhancement?.context ?? '';

  log.info(
    { enhancementEnabled, threshold, persistence: store !== undefined },
    'Initializing extraction pipeline',
  );

  async function extractionNode(
    state: ExtractionGraphState,
  ): Promise<Partial<ExtractionGraphState>> {
    const extracted = await orchestrator.extract(state.items, state.options);
    return { extracted };
  }

  async function enhancementNode(
    state: ExtractionGraphState,
  ): Promise<Partial<ExtractionGraphState>> {
    const glossary = state.extracted.filter(isGlossaryRecord);
    if (!enhancementEnabled || glossary.length === 0) {
      return { enhanced: state.extracted, glossaryEnhanced: 0 };
    }

    const enhancedGlossary = await enhanceGlossary(glossary, textClient, context, threshold);
    const glossaryEnhanced = enhancedGlossary.filter(
      (record, index) => record !== glossary[index],
    ).length;

    return { enhanced: mergeGlossary(state.extracted, enhancedGlossary), glossaryEnhanced };
  }

  async function persistenceNode(
    state: ExtractionGraphState,
  ): Promise<Partial<ExtractionGraphState>> {
    const valid = keepValidRecords(state.enhanced, 'pipeline');
    if (!store) {
      return { enhanced: valid, stored: [] };
    }
    const stored = await store.store(valid);
    return { enhanced: valid, stored };
  }

  const graph = new StateGraph(ExtractionGraphAnnotation)
    .addNode('extraction', extractionNode)
    .addNode('enhancement', enhancementNode)
    .addNode('persistence', persistenceNode)
    .addEdge(START, 'extraction')
    .addEdge('extraction', 'enhancement')
    .addEdge('enhancement', 'persistence')
    .addEdge('persistence', END)
    .compile();

  return {
    async run(
      items: readonly RawItem[],
      options: ExtractionOptions = {},
    ): Promise<ExtractionPipelineResult> {
      log.info({ items: items.length }, 'Running extraction pipeline');

      const result = await graph.invoke({
        items,
        options,
        extracted: [],
        enhanced: [],
        glossaryEnhanced: 0,
        stored: [],
      });

      log.info(
        {
          records: result.enhanced.length,
          stored: result.stored.length,
          glossaryEnhanced: result.glossaryEnhanced,
        },
        'Extraction pipeline complete',
      );

      return {
        records: result.enhanced,
        stored: result.stored,
        glossaryEnhanced: result.glossaryEnhanced,
      };
    },
  };
}
