import { EnforcementActionKind, ModerationOutcome, VerdictSource, ViolationCategory } from './types';

export interface ChatCounters {
  messagesProcessed: number;
  deferred: number;
  violationCounts: Partial<Record<ViolationCategory, number>>;
  actionCounts: Partial<Record<EnforcementActionKind, number>>;
  sourceCounts: Partial<Record<VerdictSource, number>>;
  totalProcessingMs: number;
}

function emptyCounters(): ChatCounters {
  return {
    messagesProcessed: 0,
    deferred: 0,
    violationCounts: {},
    actionCounts: {},
    sourceCounts: {},
    totalProcessingMs: 0
  };
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * In-memory per-chat counters. Totals reset when the process restarts; the action audit
 * in the store is the durable record.
 */
export class ModerationStats {
  private chats = new Map<string, ChatCounters>();

  record(outcome: ModerationOutcome): void {
    let counters = this.chats.get(outcome.chatId);
    if (!counters) {
      counters = emptyCounters();
      this.chats.set(outcome.chatId, counters);
    }

    if (outcome.deferred) {
      counters.deferred++;
      return;
    }

    counters.messagesProcessed++;
    counters.totalProcessingMs += outcome.durationMs;

    const verdict = outcome.verdict;
    if (verdict) {
      increment(counters.sourceCounts, verdict.source);
      if (verdict.category !== 'none') {
        increment(counters.violationCounts, verdict.category);
      }
    }

    if (outcome.action.kind !== 'none') {
      increment(counters.actionCounts, outcome.action.kind);
    }
  }

  forChat(chatId: string): ChatCounters {
    const counters = this.chats.get(chatId) ?? emptyCounters();
    return {
      ...counters,
      violationCounts: { ...counters.violationCounts },
      actionCounts: { ...counters.actionCounts },
      sourceCounts: { ...counters.sourceCounts }
    };
  }

  averageProcessingMs(chatId: string): number {
    const counters = this.chats.get(chatId);
    if (!counters || counters.messagesProcessed === 0) {
      return 0;
    }
    return counters.totalProcessingMs / counters.messagesProcessed;
  }
}
