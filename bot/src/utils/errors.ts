export type ModerationErrorCode =
  | 'CLASSIFICATION_UNAVAILABLE'
  | 'QUOTA_EXHAUSTED'
  | 'INVALID_MODE_VALUE'
  | 'PERSISTENCE_UNAVAILABLE'
  | 'PERMISSION_DENIED'
  | 'PROVIDER_FAILURE'
  | 'PROTECTED_USER'
  | 'TRANSPORT_FAILURE'
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID';

export class ModerationError extends Error {
  readonly code: ModerationErrorCode;

  constructor(code: ModerationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Both AI providers were denied by quota or failed for this message. */
export class ClassificationUnavailable extends ModerationError {
  readonly attempts: ReadonlyArray<{ provider: string; outcome: string }>;

  constructor(attempts: ReadonlyArray<{ provider: string; outcome: string }>) {
    super(
      'CLASSIFICATION_UNAVAILABLE',
      `No AI provider could classify the message (${attempts.map(a => `${a.provider}: ${a.outcome}`).join(', ')})`
    );
    this.attempts = attempts;
  }
}

export class QuotaExhausted extends ModerationError {
  readonly provider: string;

  constructor(provider: string) {
    super('QUOTA_EXHAUSTED', `Quota exhausted for provider ${provider}`);
    this.provider = provider;
  }
}

export class InvalidModeValue extends ModerationError {
  readonly value: string;

  constructor(value: string, allowed: readonly string[]) {
    super('INVALID_MODE_VALUE', `Invalid security mode "${value}". Expected one of: ${allowed.join(', ')}`);
    this.value = value;
  }
}

export class PersistenceUnavailable extends ModerationError {
  constructor(operation: string, cause?: unknown) {
    super('PERSISTENCE_UNAVAILABLE', `Storage unavailable during ${operation}: ${String(cause)}`, { cause });
  }
}

export class PermissionDenied extends ModerationError {
  constructor(action: string, issuerId: string) {
    super('PERMISSION_DENIED', `User ${issuerId} is not allowed to ${action}`);
  }
}

export class ProviderFailure extends ModerationError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super('PROVIDER_FAILURE', `${provider}: ${message}`, { cause });
    this.provider = provider;
  }
}

/** Administrators and the sudo user cannot be restricted by a command. */
export class ProtectedUser extends ModerationError {
  constructor(userId: string, action: string) {
    super('PROTECTED_USER', `User ${userId} is an administrator or the sudo user and cannot be ${action}`);
  }
}

export class TransportFailure extends ModerationError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super('TRANSPORT_FAILURE', `Chat platform rejected ${operation}: ${String(cause)}`, { cause });
    this.operation = operation;
  }
}

export class InvalidArgument extends ModerationError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}
