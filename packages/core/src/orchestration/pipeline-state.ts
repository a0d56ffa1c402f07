import { Annotation } from '@langchain/langgraph';
import type { RawItem } from '@gleaner/shared/src/types/raw-item.types.js';
import type {
  SemanticRecord,
  StoredSemanticRecord,
} from '@gleaner/shared/src/types/semantic.types.js';
import type { ExtractionOptions } from './extraction-orchestrator.js';

export const ExtractionGraphAnnotation = Annotation.Root({
  items: Annotation<readonly RawItem[]>,
  options: Annotation<ExtractionOptions>,
  extracted: Annotation<readonly SemanticRecord[]>,
  enhanced: Annotation<readonly SemanticRecord[]>,
  glossaryEnhanced: Annotation<number>,
  stored: Annotation<readonly StoredSemanticRecord[]>,
});

export type ExtractionGraphState = typeof ExtractionGraphAnnotation.State;
