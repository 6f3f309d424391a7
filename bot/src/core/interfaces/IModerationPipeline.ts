import { QuotaUsage } from '../../moderation/quota/QuotaGovernor';
import {
  EnforcementActionKind,
  Message,
  ModerationOutcome,
  ProcessingPriority,
  VerdictSource,
  ViolationCategory
} from '../../moderation/types';

export interface ProcessOptions {
  priority?: ProcessingPriority;
  signal?: AbortSignal | undefined;
}

export interface ModerationStatsSnapshot {
  chatId: string;
  messagesProcessed: number;
  deferred: number;
  violationCounts: Partial<Record<ViolationCategory, number>>;
  actionCounts: Partial<Record<EnforcementActionKind, number>>;
  sourceCounts: Partial<Record<VerdictSource, number>>;
  averageProcessingMs: number;
  cacheHitRate: number;
  quotaUsage: QuotaUsage[];
}

export interface IModerationPipeline {
  /** Never rejects; failures surface as a `none` action. */
  processMessage(message: Message, options?: ProcessOptions): Promise<ModerationOutcome>;
  getStats(chatId: string): ModerationStatsSnapshot;
}
