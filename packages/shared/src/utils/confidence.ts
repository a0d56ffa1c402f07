import { CONFIDENCE_LEVELS, type Confidence } from '../types/semantic.types.js';

export function confidenceRank(confidence: Confidence): number {
  return CONFIDENCE_LEVELS.indexOf(confidence);
}

/** Negative when `a` ranks below `b`, zero when equal, positive when above. */
export function compareConfidence(a: Confidence, b: Confidence): number {
  return confidenceRank(a) - confidenceRank(b);
}

export function isHigherConfidence(candidate: Confidence, baseline: Confidence): boolean {
  return compareConfidence(candidate, baseline) > 0;
}

export function isConfidence(value: unknown): value is Confidence {
  return typeof value === 'string' && (CONFIDENCE_LEVELS as readonly string[]).includes(value);
}
