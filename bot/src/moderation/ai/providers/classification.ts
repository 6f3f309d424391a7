import { NormalizedClassification } from '../../../core/interfaces/IClassifierProvider';
import { ProviderFailure } from '../../../utils/errors';
import {
  clampConfidence,
  isSeverity,
  isViolationCategory,
  severityRank,
  Severity,
  ViolationCategory
} from '../../types';

export const SYSTEM_PROMPT = 'You are an expert content moderation AI. Respond only in valid JSON format.';

export const CATEGORY_SEVERITY: Record<ViolationCategory, Severity> = {
  child_exploitation: 'critical',
  illegal_substances: 'high',
  weapons: 'high',
  scam_fraud: 'medium',
  hate_speech: 'medium',
  spam: 'low',
  unknown: 'low'
};

const CATEGORY_ALIASES: Record<string, ViolationCategory> = {
  drug_selling: 'illegal_substances',
  drugs: 'illegal_substances',
  weapon_selling: 'weapons',
  weapon: 'weapons',
  child_abuse: 'child_exploitation',
  cp: 'child_exploitation',
  scam: 'scam_fraud',
  fraud: 'scam_fraud',
  hate: 'hate_speech',
  abusive_content: 'hate_speech',
  advertising: 'spam'
};

const NO_VIOLATION_LABELS = new Set(['', 'none', 'safe', 'clean', 'allow', 'ok']);

export function buildClassificationPrompt(text: string): string {
  return [
    'Analyze the following group chat message for policy violations.',
    '',
    `MESSAGE: ${JSON.stringify(text)}`,
    '',
    'CATEGORIES: child_exploitation, illegal_substances, weapons, scam_fraud, hate_speech, spam.',
    'Use "none" when the message is acceptable.',
    '',
    'Respond with a single JSON object:',
    '{"category": "<category or none>", "severity": "none|low|medium|high|critical",',
    ' "confidence": 0.0-1.0, "reason": "<short explanation>"}'
  ].join('\n');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Models often wrap their JSON in prose or code fences; take the outermost object.
 */
export function parseModelJson(content: string, provider: string): unknown {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new ProviderFailure(provider, 'response contained no JSON object');
  }

  try {
    return JSON.parse(content.slice(start, end + 1));
  } catch (error) {
    throw new ProviderFailure(provider, 'response JSON could not be parsed', error);
  }
}

interface CandidateViolation {
  category: unknown;
  severity: unknown;
  confidence: unknown;
  reason: unknown;
}

function pickCandidate(payload: Record<string, unknown>): CandidateViolation | null {
  // Older prompt format: {"violations": [...], "overall_confidence", "reasoning"}
  if (Array.isArray(payload.violations)) {
    const entries = payload.violations.filter(isRecord);
    if (entries.length === 0) {
      return null;
    }
    const strongest = entries.reduce((best, entry) => {
      const rank = (value: unknown) => (isSeverity(value) ? severityRank(value) : 0);
      return rank(entry.severity) > rank(best.severity) ? entry : best;
    });
    return {
      category: strongest.category,
      severity: strongest.severity,
      confidence: strongest.confidence ?? payload.overall_confidence,
      reason: strongest.explanation ?? payload.reasoning
    };
  }

  return {
    category: payload.category,
    severity: payload.severity,
    confidence: payload.confidence,
    reason: payload.reason ?? payload.reasoning
  };
}

export function normalizeClassificationPayload(payload: unknown, provider: string): NormalizedClassification {
  if (!isRecord(payload)) {
    throw new ProviderFailure(provider, 'classification payload is not an object');
  }

  const candidate = pickCandidate(payload);
  const confidence = candidate && typeof candidate.confidence === 'number' ? clampConfidence(candidate.confidence) : 0;
  const reason = candidate && typeof candidate.reason === 'string' && candidate.reason.length > 0
    ? candidate.reason
    : `${provider} classification`;

  if (!candidate || payload.violation === false) {
    return { category: 'none', severity: 'none', confidence, needsReview: false, reason };
  }
  if (typeof candidate.category !== 'string') {
    throw new ProviderFailure(provider, 'classification payload has no category');
  }

  const label = candidate.category.trim().toLowerCase();
  if (NO_VIOLATION_LABELS.has(label)) {
    return { category: 'none', severity: 'none', confidence, needsReview: false, reason };
  }

  const known: ViolationCategory | undefined = isViolationCategory(label) ? label : CATEGORY_ALIASES[label];
  if (!known || known === 'unknown') {
    return { category: 'unknown', severity: 'low', confidence, needsReview: true, reason };
  }

  const rawSeverity = typeof candidate.severity === 'string' ? candidate.severity.trim().toLowerCase() : undefined;
  if (rawSeverity === undefined) {
    return { category: known, severity: CATEGORY_SEVERITY[known], confidence, needsReview: false, reason };
  }
  if (!isSeverity(rawSeverity) || rawSeverity === 'none') {
    return { category: known, severity: 'low', confidence, needsReview: true, reason };
  }

  return { category: known, severity: rawSeverity, confidence, needsReview: false, reason };
}
