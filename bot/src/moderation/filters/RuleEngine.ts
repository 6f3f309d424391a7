import { ILogger } from '../../core/interfaces/ILogger';
import { normalizeText } from '../cache/fingerprint';
import {
  createVerdict,
  noViolation,
  severityRank,
  Severity,
  Verdict,
  ViolationCategory
} from '../types';
import { RuleSet, termPattern } from './ruleSet';

export type RuleEvaluation = Verdict | 'inconclusive';

interface CompiledRule {
  category: ViolationCategory;
  severity: Severity;
  confidence: number;
  description: string;
  patterns: Array<{ id: string; regex: RegExp }>;
  bypassTerms: Set<string>;
}

interface CompiledKeywords {
  category: ViolationCategory;
  keywords: Array<{ keyword: string; regex: RegExp }>;
}

export interface PreparedText {
  normalized: string;
  /** Normalized text with spaced-out letters ("d r u g s") joined back into words. */
  collapsed: string;
  /** Words that appeared only in spaced-out form. */
  collapsedTokens: string[];
}

const SPACED_LETTERS = /\b(?:[a-z0-9][\s.\-_]+){2,}[a-z0-9]\b/g;
const COMBINING_MARKS = /[\u0300-\u036f\u1ab0-\u1aff\u1dc0-\u1dff\u20d0-\u20ff\ufe20-\ufe2f]/g;
const MAX_MENTIONS = 5;
const MAX_COMBINING_MARKS = 50;

const EXEMPT_CONTENT = [
  /^\/\w+/, // bot commands
  /^\s*$/,
  /^https?:\/\/\S+$/,
  /^@\w+$/
];

export function prepareText(text: string): PreparedText {
  const normalized = normalizeText(text);
  const collapsedTokens: string[] = [];
  const collapsed = normalized.replace(SPACED_LETTERS, match => {
    const joined = match.replace(/[\s.\-_]+/g, '');
    collapsedTokens.push(joined);
    return joined;
  });
  return { normalized, collapsed, collapsedTokens };
}

/**
 * Synchronous first-line classifier. Category rules run most severe first and the
 * first match wins; content no rule recognizes is left to the AI classifiers.
 */
export class RuleEngine {
  private logger: ILogger;
  private rules: CompiledRule[];
  private suspicion: CompiledKeywords[];

  constructor(logger: ILogger, ruleSet: RuleSet) {
    this.logger = logger;
    this.rules = this.compileRules(ruleSet);
    this.suspicion = ruleSet.suspicionKeywords.map(set => ({
      category: set.category,
      keywords: set.keywords.map(keyword => ({ keyword, regex: termPattern(keyword) }))
    }));

    this.logger.info('Rule engine initialized', {
      categories: this.rules.length,
      patterns: this.rules.reduce((sum, rule) => sum + rule.patterns.length, 0),
      suspicionSets: this.suspicion.length
    });
  }

  evaluate(text: string): RuleEvaluation {
    if (this.isExemptContent(text)) {
      return noViolation('rule', 'exempt_content');
    }

    const prepared = prepareText(text);

    for (const rule of this.rules) {
      const verdict = this.matchRule(rule, prepared);
      if (verdict) {
        return verdict;
      }
    }

    return this.checkFormattingAbuse(text) ?? 'inconclusive';
  }

  /**
   * Verdict used when no AI classifier is reachable. Suspicious wording is flagged for
   * review at low severity; nothing here can produce an account restriction on its own.
   */
  conservativeVerdict(text: string): Verdict {
    const prepared = prepareText(text);

    for (const set of this.suspicion) {
      for (const { keyword, regex } of set.keywords) {
        if (regex.test(prepared.normalized) || regex.test(prepared.collapsed)) {
          return createVerdict({
            category: set.category,
            severity: 'low',
            confidence: 0.5,
            source: 'rule',
            needsReview: true,
            reason: `suspicion_keyword:${keyword}`,
            matchedRule: `suspicion:${set.category}`
          });
        }
      }
    }

    return noViolation('rule', 'classification_unavailable');
  }

  isExemptContent(text: string): boolean {
    const trimmed = text.trim();
    return EXEMPT_CONTENT.some(pattern => pattern.test(trimmed));
  }

  ruleCount(): number {
    return this.rules.length;
  }

  private matchRule(rule: CompiledRule, prepared: PreparedText): Verdict | undefined {
    const spaced = prepared.collapsed !== prepared.normalized;

    for (const pattern of rule.patterns) {
      if (pattern.regex.test(prepared.normalized) || (spaced && pattern.regex.test(prepared.collapsed))) {
        return this.ruleVerdict(rule, pattern.id, rule.description);
      }
    }

    const bypass = prepared.collapsedTokens.find(token => rule.bypassTerms.has(token));
    if (bypass) {
      return this.ruleVerdict(rule, `${rule.category}:bypass`, `${rule.description} (spaced-out "${bypass}")`);
    }

    return undefined;
  }

  private ruleVerdict(rule: CompiledRule, matchedRule: string, reason: string): Verdict {
    return createVerdict({
      category: rule.category,
      severity: rule.severity,
      confidence: rule.confidence,
      source: 'rule',
      reason,
      matchedRule
    });
  }

  private checkFormattingAbuse(text: string): Verdict | undefined {
    const mentionCount = (text.match(/@/g) || []).length;
    if (mentionCount > MAX_MENTIONS) {
      return createVerdict({
        category: 'spam',
        severity: 'low',
        confidence: 0.8,
        source: 'rule',
        reason: `Excessive mentions (${mentionCount} mentions)`,
        matchedRule: 'excessive_mentions'
      });
    }

    const combiningCount = (text.match(COMBINING_MARKS) || []).length;
    if (combiningCount > MAX_COMBINING_MARKS) {
      return createVerdict({
        category: 'spam',
        severity: 'low',
        confidence: 0.9,
        source: 'rule',
        reason: 'Potentially malicious text formatting (zalgo)',
        matchedRule: 'zalgo_text'
      });
    }

    return undefined;
  }

  private compileRules(ruleSet: RuleSet): CompiledRule[] {
    const compiled: CompiledRule[] = [];

    for (const definition of ruleSet.categories) {
      const patterns: CompiledRule['patterns'] = [];

      definition.patterns.forEach((source, index) => {
        try {
          patterns.push({ id: `${definition.category}:${index}`, regex: new RegExp(source, 'i') });
        } catch (error) {
          this.logger.error('Invalid regex in rule set', {
            category: definition.category,
            pattern: source,
            error: String(error)
          });
        }
      });

      compiled.push({
        category: definition.category,
        severity: definition.severity,
        confidence: definition.confidence,
        description: definition.description,
        patterns,
        bypassTerms: new Set(definition.bypassTerms.map(term => term.toLowerCase()))
      });
    }

    // Array.prototype.sort is stable, so file order breaks severity ties.
    return compiled.sort((a, b) => severityRank(b.severity) - severityRank(a.severity));
  }
}
