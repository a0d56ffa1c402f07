export interface ThreadMessage {
  readonly text: string;
  readonly author: string;
  readonly timestamp: string;
  readonly permalink?: string;
}

export interface ThreadItem {
  readonly origin: 'thread';
  readonly channel: string;
  readonly threadId: string;
  readonly messages: readonly ThreadMessage[];
}

export interface DocumentSectionItem {
  readonly origin: 'document_section';
  readonly documentId: string;
  readonly documentTitle: string;
  readonly sectionTitle: string;
  readonly content: readonly string[];
  readonly permalink?: string;
}

export type RawItem = ThreadItem | DocumentSectionItem;

export type RawItemOrigin = RawItem['origin'];

export type ProgressCallback = (current: number, total: number) => void;
