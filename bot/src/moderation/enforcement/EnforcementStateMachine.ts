import {
  EnforcementAction,
  EscalationTier,
  ESCALATION_TIERS,
  SecurityMode,
  Severity
} from '../types';

export type AdminDeletionPolicy = 'critical-only' | 'all' | 'never';
export const ADMIN_DELETION_POLICIES: readonly AdminDeletionPolicy[] = ['critical-only', 'all', 'never'];

export interface EnforcementPolicy {
  muteDurationMs: number;
  /** Successive temp-bans use the next entry; the last one repeats. */
  tempBanDurationsMs: number[];
  adminDeletion: AdminDeletionPolicy;
  exemptAdminsFromAccountActions: boolean;
}

export const DEFAULT_ENFORCEMENT_POLICY: EnforcementPolicy = {
  muteDurationMs: 60 * 60 * 1000,
  tempBanDurationsMs: [24 * 60 * 60 * 1000, 72 * 60 * 60 * 1000, 7 * 24 * 60 * 60 * 1000],
  adminDeletion: 'critical-only',
  exemptAdminsFromAccountActions: true
};

export interface TransitionResult {
  tier: EscalationTier;
  action: EnforcementAction;
  /** True when the action is a new temp-ban, which advances the ban-duration ladder. */
  tempBanIssued: boolean;
}

export interface ExemptionContext {
  isSudo: boolean;
  isAdmin: boolean;
  severity: Severity;
}

function nextTier(tier: EscalationTier): EscalationTier {
  const index = ESCALATION_TIERS.indexOf(tier);
  return ESCALATION_TIERS[Math.min(index + 1, ESCALATION_TIERS.length - 1)];
}

function action(
  kind: EnforcementAction['kind'],
  reason: string,
  deleteMessage: boolean,
  durationMs?: number
): EnforcementAction {
  return Object.freeze({ kind, reason, deleteMessage, exempt: false, durationMs });
}

/**
 * Pure escalation step: given the offender's tier, the chat mode and the violation
 * severity, return the next tier and the action to take. No I/O.
 */
export function transition(
  currentTier: EscalationTier,
  mode: SecurityMode,
  severity: Severity,
  policy: EnforcementPolicy,
  tempBanCount: number = 0
): TransitionResult {
  if (severity === 'none') {
    return { tier: currentTier, action: action('none', 'no_violation', false), tempBanIssued: false };
  }

  const critical = severity === 'critical';

  if (mode === 'low') {
    return {
      tier: critical ? 'perm-banned' : nextTier(currentTier),
      action: action('warn', critical ? 'critical_violation_warning' : 'low_mode_warning', critical),
      tempBanIssued: false
    };
  }

  if (mode === 'extreme') {
    return {
      tier: 'perm-banned',
      action: action('perm-ban', critical ? 'critical_violation' : 'extreme_mode_zero_tolerance', true),
      tempBanIssued: false
    };
  }

  if (critical) {
    return { tier: 'perm-banned', action: action('perm-ban', 'critical_violation', true), tempBanIssued: false };
  }

  switch (currentTier) {
    case 'none':
      return {
        tier: 'warned',
        action: action('warn', 'first_violation_warning', severity !== 'low'),
        tempBanIssued: false
      };
    case 'warned':
      return {
        tier: 'muted',
        action: action('mute', 'repeat_violation_mute', true, policy.muteDurationMs),
        tempBanIssued: false
      };
    case 'muted': {
      const durations = policy.tempBanDurationsMs;
      const durationMs = durations[Math.min(tempBanCount, durations.length - 1)];
      return {
        tier: 'temp-banned',
        action: action('temp-ban', 'repeat_violation_temp_ban', true, durationMs),
        tempBanIssued: true
      };
    }
    case 'temp-banned':
      return { tier: 'perm-banned', action: action('perm-ban', 'repeat_violation_perm_ban', true), tempBanIssued: false };
    case 'perm-banned':
      return { tier: 'perm-banned', action: action('perm-ban', 'perm_ban_reissued', true), tempBanIssued: false };
  }
}

export class EnforcementStateMachine {
  private policy: EnforcementPolicy;

  constructor(policy: Partial<EnforcementPolicy> = {}) {
    this.policy = { ...DEFAULT_ENFORCEMENT_POLICY, ...policy };
  }

  transition(currentTier: EscalationTier, mode: SecurityMode, severity: Severity, tempBanCount: number = 0): TransitionResult {
    return transition(currentTier, mode, severity, this.policy, tempBanCount);
  }

  /**
   * Action for a sender who must not go through the escalation ladder, or null when
   * the regular ladder applies.
   */
  exemption(context: ExemptionContext): EnforcementAction | null {
    if (context.isSudo) {
      return Object.freeze({ kind: 'none', reason: 'sudo_exempt', exempt: true, deleteMessage: false });
    }

    if (context.isAdmin && this.policy.exemptAdminsFromAccountActions) {
      if (this.adminDeletionApplies(context.severity)) {
        return Object.freeze({ kind: 'delete', reason: 'admin_exempt_delete', exempt: true, deleteMessage: true });
      }
      return Object.freeze({ kind: 'none', reason: 'admin_exempt', exempt: true, deleteMessage: false });
    }

    return null;
  }

  getPolicy(): Readonly<EnforcementPolicy> {
    return this.policy;
  }

  private adminDeletionApplies(severity: Severity): boolean {
    switch (this.policy.adminDeletion) {
      case 'all':
        return severity !== 'none';
      case 'critical-only':
        return severity === 'critical';
      case 'never':
        return false;
    }
  }
}
