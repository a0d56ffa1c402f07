import type { ThreadMessage } from './raw-item.types.js';

/** A block of a wiki-style page; nested blocks (toggles, list children) come in `children`. */
export interface DocumentBlock {
  readonly type: string;
  readonly text: string;
  readonly children?: readonly DocumentBlock[];
}

export interface SourceDocument {
  readonly id: string;
  readonly title: string;
  readonly url?: string;
  readonly blocks: readonly DocumentBlock[];
}

export interface SourceThread {
  readonly channel: string;
  readonly threadId: string;
  readonly messages: readonly ThreadMessage[];
}

/** Unassembled provider output: whole threads and whole documents. */
export interface SourceBundle {
  readonly threads: readonly SourceThread[];
  readonly documents: readonly SourceDocument[];
}
