/** Channel identifiers accepted from the request layer */
export type Channel = 'whatsapp' | 'telegram' | 'web' | 'api';

/** Conversation memory roles */
export type ConversationRole = 'user' | 'assistant';

/** Map free-form channel strings from upstream workflows to our canonical Channel type. */
export function toChannel(raw: unknown): Channel {
  if (typeof raw !== 'string') return 'api';
  const lower = raw.toLowerCase();
  if (lower.includes('whatsapp')) return 'whatsapp';
  if (lower.includes('telegram')) return 'telegram';
  if (lower.includes('web')) return 'web';
  return 'api';
}
