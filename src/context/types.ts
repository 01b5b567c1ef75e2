import { ConversationEntry } from '../memory/types';
import { ExternalFact } from '../domain/types';

export type HistoryOrder = 'chronological' | 'recent_first';

export interface ContextMetadata {
  budgetChars: number;
  /** Characters used by message + kept entries + facts */
  usedChars: number;
  droppedEntries: number;
  truncated: boolean;
  /** Message and facts alone exceed the budget; every entry was dropped */
  overBudget: boolean;
}

/** Everything a handler needs to answer one request. Never shared across requests. */
export interface ContextPackage {
  userId: string;
  message: string;
  entries: readonly ConversationEntry[];
  facts: readonly ExternalFact[];
  order: HistoryOrder;
  metadata: ContextMetadata;
}

export interface PrepareOptions {
  facts?: readonly ExternalFact[];
  /** Entries to pull from memory; 0 skips history entirely */
  historyCount?: number;
  order?: HistoryOrder;
}
