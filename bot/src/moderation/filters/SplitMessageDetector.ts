import { ILogger } from '../../core/interfaces/ILogger';
import { createVerdict, Message, recordKey, Severity, Verdict, ViolationCategory } from '../types';
import { prepareText } from './RuleEngine';
import { RuleSet, SplitRuleDefinition, termPattern } from './ruleSet';

interface HistoryEntry {
  text: string;
  at: number;
}

interface CompiledSubject {
  category: ViolationCategory;
  severity: Severity;
  terms: RegExp[];
}

const MAX_TRACKED_USERS = 10000;

/**
 * Catches violations spread over several short messages ("selling" ... "w e e d")
 * by checking each sender's recent messages as one combined text.
 */
export class SplitMessageDetector {
  private logger: ILogger;
  private config: SplitRuleDefinition;
  private tradeTerms: RegExp[];
  private subjects: CompiledSubject[];
  private history = new Map<string, HistoryEntry[]>();

  constructor(logger: ILogger, ruleSet: RuleSet) {
    this.logger = logger;
    this.config = ruleSet.split;
    this.tradeTerms = ruleSet.split.tradeTerms.map(termPattern);

    const severities = new Map(ruleSet.categories.map(rule => [rule.category, rule.severity]));
    this.subjects = ruleSet.split.subjects.map(subject => ({
      category: subject.category,
      severity: severities.get(subject.category) ?? 'high',
      terms: subject.terms.map(termPattern)
    }));
  }

  /**
   * Add the message to its sender's history and check the combined text.
   * A match clears that history so the same fragments are not reported twice.
   */
  observe(message: Message): Verdict | undefined {
    const key = recordKey(message.chatId, message.userId);
    const now = message.timestamp.getTime();

    const recent = (this.history.get(key) ?? []).filter(entry => now - entry.at <= this.config.windowMs);
    recent.push({ text: message.text, at: now });
    const trimmed = recent.slice(-this.config.maxHistory);

    this.history.delete(key);
    this.history.set(key, trimmed);
    this.enforceCapacity();

    if (trimmed.length < 2) {
      return undefined;
    }

    const combined = prepareText(trimmed.map(entry => entry.text).join(' '));
    const texts = [combined.normalized, combined.collapsed];
    const tradeFound = this.tradeTerms.some(term => texts.some(text => term.test(text)));
    if (!tradeFound) {
      return undefined;
    }

    const subject = this.subjects.find(candidate =>
      candidate.terms.some(term => texts.some(text => term.test(text)))
    );
    if (!subject) {
      return undefined;
    }

    this.history.delete(key);
    this.logger.debug('Split message violation detected', {
      chatId: message.chatId,
      userId: message.userId,
      category: subject.category,
      fragments: trimmed.length
    });

    return createVerdict({
      category: subject.category,
      severity: subject.severity,
      confidence: 0.9,
      source: 'rule',
      reason: `Split message violation: ${subject.category}`,
      matchedRule: `${subject.category}:split`
    });
  }

  forget(chatId: string, userId: string): void {
    this.history.delete(recordKey(chatId, userId));
  }

  trackedUsers(): number {
    return this.history.size;
  }

  private enforceCapacity(): void {
    // Map iteration is insertion order and observe() re-inserts, so the first key is the stalest.
    while (this.history.size > MAX_TRACKED_USERS) {
      const oldest = this.history.keys().next();
      if (oldest.done) {
        return;
      }
      this.history.delete(oldest.value);
    }
  }
}
