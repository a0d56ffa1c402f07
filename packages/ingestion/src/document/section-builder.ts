import type { DocumentSectionItem } from '@gleaner/shared/src/types/raw-item.types.js';
import type { DocumentBlock, SourceDocument } from '@gleaner/shared/src/types/source.types.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';

const log = createChildLogger('ingestion:document');

export const UNTITLED_SECTION = 'Untitled Section';

const HEADING_TYPES: ReadonlySet<string> = new Set(['heading_1', 'heading_2', 'heading_3']);

export function isHeading(block: DocumentBlock): boolean {
  return HEADING_TYPES.has(block.type);
}

/** Depth-first, parents before their children. */
export function flattenBlocks(blocks: readonly DocumentBlock[]): DocumentBlock[] {
  return blocks.flatMap((block) => [block, ...flattenBlocks(block.children ?? [])]);
}

interface SectionDraft {
  readonly title: string;
  readonly content: string[];
}

/**
 * Groups a document's blocks into sections. Every heading opens a section;
 * text before the first heading lands in an untitled one. Sections without
 * any text are left out.
 */
export function splitDocumentIntoSections(document: SourceDocument): DocumentSectionItem[] {
  const drafts: SectionDraft[] = [];
  let current: SectionDraft | undefined;

  for (const block of flattenBlocks(document.blocks)) {
    const text = block.text.trim();
    if (isHeading(block)) {
      current = { title: text.length > 0 ? text : UNTITLED_SECTION, content: [] };
      drafts.push(current);
      continue;
    }
    if (text.length === 0) {
      continue;
    }
    if (!current) {
      current = { title: UNTITLED_SECTION, content: [] };
      drafts.push(current);
    }
    current.content.push(text);
  }

  const sections = drafts
    .filter((draft) => draft.content.length > 0)
    .map(
      (draft): DocumentSectionItem => ({
        origin: 'document_section',
        documentId: document.id,
        documentTitle: document.title,
        sectionTitle: draft.title,
        content: draft.content,
        ...(document.url !== undefined && { permalink: document.url }),
      }),
    );

  log.debug(
    { documentId: document.id, sections: sections.length, headings: drafts.length },
    'Split document into sections',
  );

  return sections;
}
