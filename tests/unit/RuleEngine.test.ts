/**
 * Rule engine and split-message detection against the bundled rule file
 */

import { describe, test, expect, beforeAll, beforeEach } from '@jest/globals';
import { RuleEngine, prepareText } from '../../bot/src/moderation/filters/RuleEngine';
import { loadRuleSet, parseRuleSet, RuleSet } from '../../bot/src/moderation/filters/ruleSet';
import { SplitMessageDetector } from '../../bot/src/moderation/filters/SplitMessageDetector';
import { ModerationError } from '../../bot/src/utils/errors';
import { Logger } from '../../bot/src/utils/Logger';
import { createMockMessage, createTestLogger } from '../setup';

let logger: Logger;
let ruleSet: RuleSet;

beforeAll(() => {
  logger = createTestLogger();
  ruleSet = loadRuleSet();
});

describe('RuleEngine', () => {
  let engine: RuleEngine;

  beforeEach(() => {
    engine = new RuleEngine(logger, ruleSet);
  });

  describe('Category rules', () => {
    test('should flag drug selling with the rule metadata', () => {
      expect(engine.evaluate('buy drugs here')).toEqual({
        category: 'illegal_substances',
        severity: 'high',
        confidence: 0.9,
        source: 'rule',
        needsReview: false,
        reason: 'Drug selling or distribution',
        matchedRule: 'illegal_substances:0'
      });
    });

    test('should report the critical category when it matches', () => {
      const verdict = engine.evaluate('selling loli pics');
      expect(verdict).not.toBe('inconclusive');
      if (verdict === 'inconclusive') return;

      expect(verdict.category).toBe('child_exploitation');
      expect(verdict.severity).toBe('critical');
      expect(verdict.matchedRule).toBe('child_exploitation:0');
    });

    test('should match patterns written with spaced-out letters', () => {
      const verdict = engine.evaluate('s e l l i n g weed');
      expect(verdict).not.toBe('inconclusive');
      if (verdict === 'inconclusive') return;

      expect(verdict.matchedRule).toBe('illegal_substances:0');
    });

    test('should catch a spaced-out bypass term', () => {
      const verdict = engine.evaluate('hey got w e e d');
      expect(verdict).not.toBe('inconclusive');
      if (verdict === 'inconclusive') return;

      expect(verdict.category).toBe('illegal_substances');
      expect(verdict.matchedRule).toBe('illegal_substances:bypass');
      expect(verdict.reason).toBe('Drug selling or distribution (spaced-out "weed")');
    });

    test('should load every category from the rule file', () => {
      expect(engine.ruleCount()).toBe(6);
    });
  });

  describe('Exempt and unknown content', () => {
    test('should return a clean verdict for bot commands', () => {
      const verdict = engine.evaluate('/start');
      expect(verdict).not.toBe('inconclusive');
      if (verdict === 'inconclusive') return;

      expect(verdict.severity).toBe('none');
      expect(verdict.reason).toBe('exempt_content');
    });

    test('should leave ordinary chatter to the classifiers', () => {
      expect(engine.evaluate('what time is the meeting tomorrow')).toBe('inconclusive');
    });
  });

  describe('Formatting abuse', () => {
    test('should flag mass mentions as spam', () => {
      const verdict = engine.evaluate('@a @b @c @d @e @f hi');
      expect(verdict).not.toBe('inconclusive');
      if (verdict === 'inconclusive') return;

      expect(verdict.category).toBe('spam');
      expect(verdict.severity).toBe('low');
      expect(verdict.reason).toBe('Excessive mentions (6 mentions)');
      expect(verdict.matchedRule).toBe('excessive_mentions');
    });

    test('should flag zalgo text', () => {
      const verdict = engine.evaluate(`hello${'\u0301'.repeat(60)}`);
      expect(verdict).not.toBe('inconclusive');
      if (verdict === 'inconclusive') return;

      expect(verdict.matchedRule).toBe('zalgo_text');
    });
  });

  describe('Conservative verdict', () => {
    test('should flag suspicious keywords for review at low severity', () => {
      expect(engine.conservativeVerdict('anyone got pills')).toEqual({
        category: 'illegal_substances',
        severity: 'low',
        confidence: 0.5,
        source: 'rule',
        needsReview: true,
        reason: 'suspicion_keyword:pills',
        matchedRule: 'suspicion:illegal_substances'
      });
    });

    test('should return a clean verdict without suspicious keywords', () => {
      const verdict = engine.conservativeVerdict('good morning');
      expect(verdict.severity).toBe('none');
      expect(verdict.reason).toBe('classification_unavailable');
    });
  });

  test('should collapse spaced letters when preparing text', () => {
    expect(prepareText('hey got w e e d')).toEqual({
      normalized: 'hey got w e e d',
      collapsed: 'hey got weed',
      collapsedTokens: ['weed']
    });
  });

  test('should reject malformed rule files', () => {
    expect(() => parseRuleSet({ categories: 'nope' })).toThrow(ModerationError);
  });
});

describe('SplitMessageDetector', () => {
  let detector: SplitMessageDetector;
  const start = new Date('2024-05-01T12:00:00Z').getTime();

  beforeEach(() => {
    detector = new SplitMessageDetector(logger, ruleSet);
  });

  test('should detect a trade term and a subject sent in separate messages', () => {
    const first = detector.observe(createMockMessage({ messageId: 'm1', text: 'I am selling', timestamp: new Date(start) }));
    const second = detector.observe(
      createMockMessage({ messageId: 'm2', text: 'good weed', timestamp: new Date(start + 1000) })
    );

    expect(first).toBeUndefined();
    expect(second).toEqual({
      category: 'illegal_substances',
      severity: 'high',
      confidence: 0.9,
      source: 'rule',
      needsReview: false,
      reason: 'Split message violation: illegal_substances',
      matchedRule: 'illegal_substances:split'
    });
    expect(detector.trackedUsers()).toBe(0);
  });

  test('should ignore fragments older than the window', () => {
    detector.observe(createMockMessage({ text: 'I am selling', timestamp: new Date(start) }));
    const late = detector.observe(createMockMessage({ text: 'good weed', timestamp: new Date(start + 300001) }));

    expect(late).toBeUndefined();
  });

  test('should not combine messages from different senders', () => {
    detector.observe(createMockMessage({ userId: 'a', text: 'I am selling', timestamp: new Date(start) }));
    const other = detector.observe(createMockMessage({ userId: 'b', text: 'good weed', timestamp: new Date(start + 10) }));

    expect(other).toBeUndefined();
    expect(detector.trackedUsers()).toBe(2);
  });

  test('should drop a sender history on forget', () => {
    detector.observe(createMockMessage({ text: 'I am selling', timestamp: new Date(start) }));
    detector.forget('1001', '55');
    const next = detector.observe(createMockMessage({ text: 'good weed', timestamp: new Date(start + 10) }));

    expect(next).toBeUndefined();
  });
});
