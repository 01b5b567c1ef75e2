import {
  ConversationEntry,
  ConversationExport,
  ConversationStore,
  ConversationSummary,
  EntryMetadata,
  ExportOptions,
  MemoryStatus,
} from './types';
import { KeyedMutex } from './keyed-mutex';
import { ConversationRole } from '../config/types';
import { InvalidIdentifierError, NotFoundError } from '../errors';
import { logger } from '../observability/logger';
import { memoryEvictions } from '../observability/metrics';

export const DEFAULT_WINDOW = 10;

/** Build a frozen entry; metadata is copied so later caller mutations cannot leak in. */
export function createEntry(
  role: ConversationRole,
  content: string,
  metadata: EntryMetadata = {},
  timestamp: number = Date.now(),
): ConversationEntry {
  return Object.freeze({
    role,
    content,
    timestamp,
    metadata: Object.freeze({ ...metadata }),
  });
}

export function assertUserId(userId: unknown): asserts userId is string {
  if (typeof userId !== 'string' || userId.trim().length === 0) {
    throw new InvalidIdentifierError(userId);
  }
}

function toIso(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

/**
 * In-memory conversation store.
 *
 * One ordered history per user id, bounded to `window` entries with FIFO
 * eviction. Histories are created on first append and live until cleared.
 * Every operation on a user runs inside that user's exclusive section.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly histories = new Map<string, ConversationEntry[]>();
  private readonly mutex = new KeyedMutex();
  private readonly log = logger.child({ component: 'conversation-store' });
  readonly window: number;

  constructor(window: number = DEFAULT_WINDOW, private readonly memoryEnabled = true) {
    if (!Number.isInteger(window) || window < 1) {
      throw new Error(`Memory window must be a positive integer, got ${window}`);
    }
    this.window = window;
  }

  async append(userId: string, entry: ConversationEntry): Promise<void> {
    await this.appendAll(userId, [entry]);
  }

  async appendAll(userId: string, entries: readonly ConversationEntry[]): Promise<void> {
    assertUserId(userId);
    if (entries.length === 0) return;

    await this.mutex.runExclusive(userId, () => {
      const history = this.histories.get(userId) ?? [];
      history.push(...entries);

      const overflow = history.length - this.window;
      if (overflow > 0) {
        history.splice(0, overflow);
        memoryEvictions.inc(overflow);
        this.log.debug({ userId, evicted: overflow }, 'Evicted oldest entries beyond window');
      }
      this.histories.set(userId, history);
    });
  }

  async snapshot(userId: string, count: number): Promise<ConversationEntry[]> {
    assertUserId(userId);
    const take = Math.max(0, Math.floor(count));

    return this.mutex.runExclusive(userId, () => {
      const history = this.histories.get(userId);
      if (!history || take === 0) return [];
      return history.slice(-take);
    });
  }

  async clear(userId: string): Promise<void> {
    assertUserId(userId);
    await this.mutex.runExclusive(userId, () => {
      if (this.histories.delete(userId)) {
        this.log.info({ userId }, 'Conversation history cleared');
      }
    });
  }

  async export(userId: string, options: ExportOptions = {}): Promise<ConversationExport> {
    assertUserId(userId);
    const history = await this.mutex.runExclusive(userId, () => this.histories.get(userId)?.slice());

    if (!history && !options.allowEmpty) {
      throw new NotFoundError(userId);
    }

    return {
      userId,
      exportedAt: new Date().toISOString(),
      window: this.window,
      entries: (history ?? []).map((e) => ({
        role: e.role,
        content: e.content,
        timestamp: toIso(e.timestamp),
        metadata: { ...e.metadata },
      })),
    };
  }

  async summary(userId: string): Promise<ConversationSummary> {
    assertUserId(userId);
    const history = await this.mutex.runExclusive(userId, () => this.histories.get(userId)?.slice());
    if (!history) {
      throw new NotFoundError(userId);
    }

    const first = history[0];
    const last = history[history.length - 1];
    return {
      userId,
      totalMessages: history.length,
      userMessages: history.filter((e) => e.role === 'user').length,
      assistantMessages: history.filter((e) => e.role === 'assistant').length,
      firstTimestamp: first ? toIso(first.timestamp) : null,
      lastTimestamp: last ? toIso(last.timestamp) : null,
      lastMessage: last ?? null,
    };
  }

  status(): MemoryStatus {
    let totalMessages = 0;
    for (const history of this.histories.values()) {
      totalMessages += history.length;
    }
    return {
      memoryEnabled: this.memoryEnabled,
      window: this.window,
      users: this.histories.size,
      totalMessages,
    };
  }
}

/**
 * Create the process-wide store.
 */
export function createConversationStore(window: number, memoryEnabled = true): ConversationStore {
  logger.info({ window, memoryEnabled }, 'Using in-memory conversation store');
  return new InMemoryConversationStore(window, memoryEnabled);
}
