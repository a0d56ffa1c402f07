import type {
  DocumentSectionItem,
  ThreadItem,
} from '@gleaner/shared/src/types/raw-item.types.js';
import type {
  DocumentSectionProvenance,
  ThreadProvenance,
} from '@gleaner/shared/src/types/semantic.types.js';

export function threadTranscript(item: ThreadItem): string {
  return item.messages.map((message) => `${message.author}: ${message.text}`).join('\n');
}

export function sectionBody(item: DocumentSectionItem): string {
  return item.content.join(' ');
}

export function threadProvenance(item: ThreadItem): ThreadProvenance {
  const authors = [...new Set(item.messages.map((message) => message.author))];
  const permalinks = item.messages.flatMap((message) =>
    message.permalink ? [message.permalink] : [],
  );

  return {
    origin: 'thread',
    channel: item.channel,
    threadId: item.threadId,
    authors,
    permalinks,
  };
}

export function sectionProvenance(item: DocumentSectionItem): DocumentSectionProvenance {
  return {
    origin: 'document_section',
    documentId: item.documentId,
    documentTitle: item.documentTitle,
    sectionTitle: item.sectionTitle,
    ...(item.permalink !== undefined && { permalink: item.permalink }),
  };
}

export function containsAny(text: string, markers: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}
