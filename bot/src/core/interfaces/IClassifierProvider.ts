import { Severity, VerdictCategory } from '../../moderation/types';

export interface NormalizedClassification {
  category: VerdictCategory;
  severity: Severity;
  confidence: number;
  needsReview: boolean;
  reason: string;
}

/**
 * An AI backend. `classify` returns the provider's raw payload; `normalize` maps it onto
 * the moderation taxonomy and throws when the payload is malformed.
 */
export interface IClassifierProvider {
  readonly name: string;
  classify(text: string, signal: AbortSignal): Promise<unknown>;
  normalize(raw: unknown): NormalizedClassification;
}
