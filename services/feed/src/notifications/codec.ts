import type { FeedId } from '../types';

const SEPARATOR = '\x00';

export function encodePublishMessage(id: FeedId, content: string): string {
  return `${id}${SEPARATOR}${content}`;
}

export function encodeRetractMessage(id: FeedId): string {
  return String(id);
}

/** Splits at the first NUL only; the content may contain more of them. */
export function decodePublishMessage(message: string): { id: FeedId; content: string } {
  const at = message.indexOf(SEPARATOR);
  if (at === -1) {
    throw new Error('publish message is missing its id separator');
  }
  return { id: parseFeedId(message.slice(0, at)), content: message.slice(at + 1) };
}

export function decodeRetractMessage(message: string): FeedId {
  return parseFeedId(message);
}

function parseFeedId(raw: string): FeedId {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`invalid feed id: ${JSON.stringify(raw)}`);
  }
  return Number(raw);
}
