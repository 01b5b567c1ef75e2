import { ConversationRole } from '../config/types';

/** Scalar metadata values attached to a stored entry (channel, agent, degraded flag, ...) */
export type EntryMetadataValue = string | number | boolean | null;
export type EntryMetadata = Readonly<Record<string, EntryMetadataValue>>;

/** One exchanged message. Frozen once created. */
export interface ConversationEntry {
  readonly role: ConversationRole;
  readonly content: string;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly metadata: EntryMetadata;
}

/** Audit record produced by `export` */
export interface ConversationExport {
  userId: string;
  exportedAt: string;
  window: number;
  entries: Array<{
    role: ConversationRole;
    content: string;
    /** ISO-8601 */
    timestamp: string;
    metadata: Record<string, EntryMetadataValue>;
  }>;
}

export interface ConversationSummary {
  userId: string;
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  firstTimestamp: string | null;
  lastTimestamp: string | null;
  lastMessage: ConversationEntry | null;
}

export interface MemoryStatus {
  memoryEnabled: boolean;
  window: number;
  users: number;
  totalMessages: number;
}

export interface ExportOptions {
  /** Return an empty record instead of failing with NotFound for unknown users */
  allowEmpty?: boolean;
}

/** Process-wide keyed conversation memory */
export interface ConversationStore {
  readonly window: number;
  append(userId: string, entry: ConversationEntry): Promise<void>;
  /** Append several entries inside a single critical section (all or nothing) */
  appendAll(userId: string, entries: readonly ConversationEntry[]): Promise<void>;
  snapshot(userId: string, count: number): Promise<ConversationEntry[]>;
  clear(userId: string): Promise<void>;
  export(userId: string, options?: ExportOptions): Promise<ConversationExport>;
  summary(userId: string): Promise<ConversationSummary>;
  status(): MemoryStatus;
}
