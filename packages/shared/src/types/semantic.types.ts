export const SEMANTIC_RECORD_KINDS = [
  'qna',
  'insight',
  'feedback',
  'reference',
  'instruction',
  'glossary',
] as const;

export type SemanticRecordKind = (typeof SEMANTIC_RECORD_KINDS)[number];

/** Ordered from least to most trustworthy; index order is the ordinal order. */
export const CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;

export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export const TERM_CATEGORIES = [
  'service',
  'development',
  'design',
  'marketing',
  'business',
  'operations',
  'other',
] as const;

export type TermCategory = (typeof TERM_CATEGORIES)[number];

export interface ThreadProvenance {
  readonly origin: 'thread';
  readonly channel: string;
  readonly threadId: string;
  readonly authors: readonly string[];
  readonly questioner?: string;
  readonly answerer?: string;
  readonly permalinks: readonly string[];
}

export interface DocumentSectionProvenance {
  readonly origin: 'document_section';
  readonly documentId: string;
  readonly documentTitle: string;
  readonly sectionTitle: string;
  readonly permalink?: string;
}

/** Terms first surfaced by the enhancement pass rather than by a raw item. */
export interface EnhancementProvenance {
  readonly origin: 'enhancement';
  readonly reviewedTerms: readonly string[];
}

export type Provenance = ThreadProvenance | DocumentSectionProvenance | EnhancementProvenance;

export type ProvenanceOrigin = Provenance['origin'];

export interface QnaPayload {
  readonly question: string;
  readonly answer: string;
}

export interface ContentPayload {
  readonly content: string;
}

export interface ReferencePayload {
  readonly content: string;
  readonly referenceKind: string;
}

export interface GlossaryPayload {
  readonly term: string;
  readonly definition: string;
  readonly termCategory: TermCategory;
  readonly confidence: Confidence;
  readonly needsReview: boolean;
  readonly alternativeDefinitions?: readonly string[];
  readonly domainHints?: readonly string[];
}

interface SemanticRecordBase {
  readonly keywords: readonly string[];
  readonly provenance: Provenance;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface QnaRecord extends SemanticRecordBase {
  readonly kind: 'qna';
  readonly payload: QnaPayload;
}

export interface InsightRecord extends SemanticRecordBase {
  readonly kind: 'insight';
  readonly payload: ContentPayload;
}

export interface FeedbackRecord extends SemanticRecordBase {
  readonly kind: 'feedback';
  readonly payload: ContentPayload;
}

export interface InstructionRecord extends SemanticRecordBase {
  readonly kind: 'instruction';
  readonly payload: ContentPayload;
}

export interface ReferenceRecord extends SemanticRecordBase {
  readonly kind: 'reference';
  readonly payload: ReferencePayload;
}

export interface GlossaryRecord extends SemanticRecordBase {
  readonly kind: 'glossary';
  readonly payload: GlossaryPayload;
}

export type SemanticRecord =
  | QnaRecord
  | InsightRecord
  | FeedbackRecord
  | InstructionRecord
  | ReferenceRecord
  | GlossaryRecord;

export type StoredSemanticRecord = SemanticRecord & {
  readonly id: string;
  readonly createdAt: Date;
};

export interface SemanticQuery {
  readonly kind?: SemanticRecordKind;
  readonly keywords?: readonly string[];
  readonly originKind?: ProvenanceOrigin;
  readonly createdFrom?: Date;
  readonly createdTo?: Date;
}

export function isGlossaryRecord(record: SemanticRecord): record is GlossaryRecord {
  return record.kind === 'glossary';
}
