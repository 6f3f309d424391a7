export const SECURITY_MODES = ['low', 'medium', 'extreme'] as const;
export type SecurityMode = typeof SECURITY_MODES[number];
export const DEFAULT_SECURITY_MODE: SecurityMode = 'medium';

export function isSecurityMode(value: unknown): value is SecurityMode {
  return typeof value === 'string' && SECURITY_MODES.some(candidate => candidate === value);
}

export const SEVERITIES = ['none', 'low', 'medium', 'high', 'critical'] as const;
export type Severity = typeof SEVERITIES[number];

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITIES.some(candidate => candidate === value);
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return severityRank(a) >= severityRank(b) ? a : b;
}

export const VIOLATION_CATEGORIES = [
  'child_exploitation',
  'illegal_substances',
  'weapons',
  'scam_fraud',
  'hate_speech',
  'spam',
  'unknown'
] as const;
export type ViolationCategory = typeof VIOLATION_CATEGORIES[number];
export type VerdictCategory = ViolationCategory | 'none';

export function isViolationCategory(value: unknown): value is ViolationCategory {
  return typeof value === 'string' && VIOLATION_CATEGORIES.some(candidate => candidate === value);
}

export type VerdictSource = 'rule' | 'ai-primary' | 'ai-fallback' | 'cache';

export interface Verdict {
  readonly category: VerdictCategory;
  readonly severity: Severity;
  readonly confidence: number;
  readonly source: VerdictSource;
  readonly needsReview: boolean;
  readonly reason: string;
  /** Source that originally produced a cached verdict. */
  readonly origin?: Exclude<VerdictSource, 'cache'> | undefined;
  readonly matchedRule?: string | undefined;
}

export function createVerdict(fields: Omit<Verdict, 'needsReview' | 'confidence'> & {
  needsReview?: boolean;
  confidence?: number;
}): Verdict {
  return Object.freeze({
    ...fields,
    confidence: clampConfidence(fields.confidence ?? 0),
    needsReview: fields.needsReview ?? false
  });
}

export function noViolation(source: Exclude<VerdictSource, 'cache'>, reason: string): Verdict {
  return createVerdict({ category: 'none', severity: 'none', confidence: 0, source, reason });
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export type SenderRole = 'admin' | 'regular' | 'bot';

export interface Message {
  readonly messageId: string;
  readonly chatId: string;
  readonly userId: string;
  readonly text: string;
  readonly timestamp: Date;
  readonly role: SenderRole;
  readonly isSudo: boolean;
}

export const ESCALATION_TIERS = ['none', 'warned', 'muted', 'temp-banned', 'perm-banned'] as const;
export type EscalationTier = typeof ESCALATION_TIERS[number];

export function isEscalationTier(value: unknown): value is EscalationTier {
  return typeof value === 'string' && ESCALATION_TIERS.some(candidate => candidate === value);
}

export interface ViolationRecord {
  chatId: string;
  userId: string;
  count: number;
  lastViolationAt: Date | null;
  tier: EscalationTier;
  tempBanCount: number;
}

export type EnforcementActionKind = 'none' | 'warn' | 'delete' | 'mute' | 'temp-ban' | 'perm-ban';
/** Kinds written to the action audit; lifting a ban only ever comes from a command. */
export type AuditActionKind = EnforcementActionKind | 'unban';

export interface EnforcementAction {
  readonly kind: EnforcementActionKind;
  readonly durationMs?: number | undefined;
  readonly reason: string;
  readonly exempt: boolean;
  readonly deleteMessage: boolean;
}

export const NO_ACTION: EnforcementAction = Object.freeze({
  kind: 'none',
  reason: 'no_violation',
  exempt: false,
  deleteMessage: false
});

export function isRestrictive(action: EnforcementAction): boolean {
  return action.kind === 'mute' || action.kind === 'temp-ban' || action.kind === 'perm-ban';
}

export type ProcessingPriority = 'live' | 'batch';

export interface ModerationOutcome {
  messageId: string;
  chatId: string;
  userId: string;
  verdict: Verdict | null;
  action: EnforcementAction;
  record: ViolationRecord | null;
  /** Batch work that was postponed because live traffic needed the AI quota. */
  deferred: boolean;
  durationMs: number;
}

export function recordKey(chatId: string, userId: string): string {
  return `${chatId}:${userId}`;
}
