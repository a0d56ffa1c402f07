import type { ThreadItem, ThreadMessage } from '@gleaner/shared/src/types/raw-item.types.js';
import type { SourceThread } from '@gleaner/shared/src/types/source.types.js';
import { createChildLogger } from '@gleaner/shared/src/logger.js';

const log = createChildLogger('ingestion:thread');

/** Epoch seconds ("1700000000.000100") or an ISO date; NaN when neither. */
export function timestampValue(timestamp: string): number {
  const numeric = Number(timestamp);
  if (timestamp.trim().length > 0 && Number.isFinite(numeric)) {
    return numeric * 1000;
  }
  return Date.parse(timestamp);
}

/** Unreadable timestamps sort after every readable one and tie with each other. */
function compareTimestamps(a: ThreadMessage, b: ThreadMessage): number {
  const left = timestampValue(a.timestamp);
  const right = timestampValue(b.timestamp);
  const leftReadable = !Number.isNaN(left);
  const rightReadable = !Number.isNaN(right);
  if (leftReadable && rightReadable) {
    return left - right;
  }
  if (leftReadable === rightReadable) {
    return 0;
  }
  return leftReadable ? -1 : 1;
}

/**
 * Drops messages without text and orders the rest by timestamp. Messages whose
 * timestamp cannot be read keep their relative order at the end.
 */
export function buildThreadItem(thread: SourceThread): ThreadItem {
  const messages = thread.messages
    .filter((message) => message.text.trim().length > 0)
    .sort(compareTimestamps);

  const dropped = thread.messages.length - messages.length;
  if (dropped > 0) {
    log.debug({ threadId: thread.threadId, dropped }, 'Dropped empty messages');
  }

  return {
    origin: 'thread',
    channel: thread.channel,
    threadId: thread.threadId,
    messages,
  };
}
