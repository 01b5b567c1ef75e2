import { ConversationStore } from '../memory/types';
import { renderFact } from '../domain/facts';
import { ExternalFact } from '../domain/types';
import { contextTruncations } from '../observability/metrics';
import { logger } from '../observability/logger';
import { ContextPackage, PrepareOptions } from './types';

export interface ContextAssemblerOptions {
  budgetChars: number;
  historyCount: number;
}

function factsCost(facts: readonly ExternalFact[]): number {
  return facts.reduce((sum, fact) => sum + renderFact(fact).length, 0);
}

/**
 * Builds the per-request context from recent history, the incoming message and
 * any external facts, within a character budget.
 *
 * Over budget, history is dropped oldest-first; the message and facts are
 * never cut.
 */
export class ContextAssembler {
  private readonly log = logger.child({ component: 'context-assembler' });

  constructor(
    private readonly store: ConversationStore,
    private readonly options: ContextAssemblerOptions,
  ) {}

  async prepare(userId: string, message: string, options: PrepareOptions = {}): Promise<ContextPackage> {
    const facts = options.facts ?? [];
    const order = options.order ?? 'chronological';
    const historyCount = options.historyCount ?? this.options.historyCount;
    const budgetChars = this.options.budgetChars;

    const entries = historyCount > 0 ? await this.store.snapshot(userId, historyCount) : [];

    const fixedCost = message.length + factsCost(facts);
    let usedChars = entries.reduce((sum, e) => sum + e.content.length, fixedCost);
    let droppedEntries = 0;

    const kept = [...entries];
    while (usedChars > budgetChars && kept.length > 0) {
      const oldest = kept.shift();
      if (!oldest) break;
      usedChars -= oldest.content.length;
      droppedEntries++;
    }

    const truncated = droppedEntries > 0;
    const overBudget = fixedCost > budgetChars;
    if (truncated) {
      contextTruncations.inc();
      this.log.debug({ userId, droppedEntries, budgetChars, overBudget }, 'Context truncated to budget');
    }

    return {
      userId,
      message,
      entries: order === 'recent_first' ? kept.reverse() : kept,
      facts,
      order,
      metadata: { budgetChars, usedChars, droppedEntries, truncated, overBudget },
    };
  }
}
