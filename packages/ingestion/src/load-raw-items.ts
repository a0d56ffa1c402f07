import type { RawItem } from '@gleaner/shared/src/types/raw-item.types.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';
import { readJsonFile } from '@gleaner/schemas/src/json-file.js';
import { validateRawItems, validateSourceBundle } from '@gleaner/schemas/src/validators.js';
import { buildThreadItem } from './thread/thread-builder.js';
import { splitDocumentIntoSections } from './document/section-builder.js';

const log = createChildLogger('ingestion:loader');

function rawItemsFromData(data: unknown): readonly RawItem[] {
  if (Array.isArray(data)) {
    return validateRawItems(data);
  }

  const bundle = validateSourceBundle(data);
  return [
    ...bundle.threads.map(buildThreadItem),
    ...bundle.documents.flatMap(splitDocumentIntoSections),
  ];
}

/**
 * Reads raw items from a JSON file holding either an array of assembled
 * items or a `{ threads, documents }` bundle that still needs assembling.
 */
export async function loadRawItems(filePath: string): Promise<readonly RawItem[]> {
  const items = rawItemsFromData(await readJsonFile(filePath, 'Input file'));
  log.info({ filePath, items: items.length }, 'Loaded raw items');
  return items;
}
