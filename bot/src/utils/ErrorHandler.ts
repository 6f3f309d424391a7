import { ILogger } from '../core/interfaces/ILogger';
import { ModerationError } from './errors';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  CLASSIFICATION = 'classification',
  QUOTA = 'quota',
  PERSISTENCE = 'persistence',
  CONFIGURATION = 'configuration',
  TRANSPORT = 'transport',
  NETWORK = 'network',
  VALIDATION = 'validation',
  PERMISSION = 'permission',
  TIMEOUT = 'timeout',
  UNKNOWN = 'unknown'
}

export interface ErrorContext {
  chatId?: string;
  userId?: string;
  messageId?: string;
  operation?: string;
  component?: string;
  metadata?: Record<string, unknown>;
}

export interface StructuredError {
  id: string;
  timestamp: Date;
  message: string;
  code?: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  context: ErrorContext;
  stackTrace?: string;
  originalError?: Error;
  resolved: boolean;
  resolution?: string;
}

export interface ErrorFilters {
  category?: ErrorCategory;
  severity?: ErrorSeverity;
  resolved?: boolean;
  since?: Date;
  limit?: number;
}

type ErrorCallback = (error: StructuredError) => void;

export class ErrorHandler {
  private logger: ILogger;
  private errors = new Map<string, StructuredError>();
  private maxErrorHistory = 1000;
  private errorCallbacks = new Map<ErrorSeverity, ErrorCallback[]>();
  private globalHandlersInstalled = false;

  constructor(logger: ILogger) {
    this.logger = logger;
  }

  /**
   * Record a structured error, log it by severity and notify callbacks.
   */
  handleError(
    error: Error | string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: ErrorContext = {}
  ): StructuredError {
    const structuredError: StructuredError = {
      id: this.generateErrorId(),
      timestamp: new Date(),
      message: error instanceof Error ? error.message : error,
      category,
      severity,
      context,
      resolved: false
    };

    if (error instanceof Error) {
      if (error.stack) {
        structuredError.stackTrace = error.stack;
      }
      structuredError.originalError = error;
    }

    if (error instanceof ModerationError) {
      structuredError.code = error.code;
    }

    this.errors.set(structuredError.id, structuredError);
    this.maintainErrorHistory();

    this.logError(structuredError);
    this.executeCallbacks(severity, structuredError);

    if (severity === ErrorSeverity.LOW) {
      setTimeout(() => this.resolveError(structuredError.id, 'Auto-resolved'), 5000).unref();
    }

    return structuredError;
  }

  handlePersistenceError(error: Error, operation: string, context: ErrorContext = {}): StructuredError {
    return this.handleError(error, ErrorCategory.PERSISTENCE, this.determinePersistenceSeverity(error), {
      ...context,
      operation,
      component: 'database'
    });
  }

  handleProviderError(error: Error, provider: string, context: ErrorContext = {}): StructuredError {
    return this.handleError(error, ErrorCategory.CLASSIFICATION, ErrorSeverity.MEDIUM, {
      ...context,
      operation: 'classify',
      component: 'classifier_gateway',
      metadata: { ...context.metadata, provider }
    });
  }

  handleValidationError(
    message: string,
    field?: string,
    value?: unknown,
    context: ErrorContext = {}
  ): StructuredError {
    return this.handleError(message, ErrorCategory.VALIDATION, ErrorSeverity.LOW, {
      ...context,
      operation: context.operation ?? 'validation',
      metadata: { field, value }
    });
  }

  handleTimeoutError(operation: string, timeoutMs: number, context: ErrorContext = {}): StructuredError {
    return this.handleError(
      `Operation timed out after ${timeoutMs}ms`,
      ErrorCategory.TIMEOUT,
      ErrorSeverity.HIGH,
      {
        ...context,
        operation,
        metadata: { timeoutMs }
      }
    );
  }

  resolveError(errorId: string, resolution: string): boolean {
    const error = this.errors.get(errorId);
    if (!error || error.resolved) {
      return false;
    }

    error.resolved = true;
    error.resolution = resolution;

    this.logger.debug('Error resolved', {
      errorId,
      resolution,
      category: error.category,
      severity: error.severity
    });

    return true;
  }

  getError(errorId: string): StructuredError | undefined {
    return this.errors.get(errorId);
  }

  getErrors(filters: ErrorFilters = {}): StructuredError[] {
    let errors = Array.from(this.errors.values());

    if (filters.category) {
      errors = errors.filter(e => e.category === filters.category);
    }

    if (filters.severity) {
      errors = errors.filter(e => e.severity === filters.severity);
    }

    if (filters.resolved !== undefined) {
      errors = errors.filter(e => e.resolved === filters.resolved);
    }

    const since = filters.since;
    if (since) {
      errors = errors.filter(e => e.timestamp >= since);
    }

    errors.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());

    if (filters.limit) {
      errors = errors.slice(0, filters.limit);
    }

    return errors;
  }

  getErrorStats(): {
    total: number;
    unresolved: number;
    byCategory: Partial<Record<ErrorCategory, number>>;
    bySeverity: Partial<Record<ErrorSeverity, number>>;
  } {
    const byCategory: Partial<Record<ErrorCategory, number>> = {};
    const bySeverity: Partial<Record<ErrorSeverity, number>> = {};
    const all = Array.from(this.errors.values());

    for (const error of all) {
      byCategory[error.category] = (byCategory[error.category] ?? 0) + 1;
      bySeverity[error.severity] = (bySeverity[error.severity] ?? 0) + 1;
    }

    return {
      total: all.length,
      unresolved: all.filter(e => !e.resolved).length,
      byCategory,
      bySeverity
    };
  }

  onError(severity: ErrorSeverity, callback: ErrorCallback): void {
    const callbacks = this.errorCallbacks.get(severity) ?? [];
    callbacks.push(callback);
    this.errorCallbacks.set(severity, callbacks);
  }

  /**
   * Route process-level failures into the error history. Only the CLI entry calls this;
   * library consumers keep control of their own process handlers.
   */
  installGlobalHandlers(): void {
    if (this.globalHandlersInstalled) {
      return;
    }
    this.globalHandlersInstalled = true;

    process.on('uncaughtException', (error: Error) => {
      this.handleError(error, ErrorCategory.UNKNOWN, ErrorSeverity.CRITICAL, {
        component: 'process',
        operation: 'uncaught_exception'
      });
    });

    process.on('unhandledRejection', (reason: unknown) => {
      this.handleError(
        reason instanceof Error ? reason : new Error(String(reason)),
        ErrorCategory.UNKNOWN,
        ErrorSeverity.HIGH,
        {
          component: 'process',
          operation: 'unhandled_rejection'
        }
      );
    });
  }

  private logError(error: StructuredError): void {
    const logData = {
      errorId: error.id,
      code: error.code,
      category: error.category,
      context: error.context,
      stack: error.stackTrace
    };

    switch (error.severity) {
      case ErrorSeverity.CRITICAL:
        this.logger.error(`[CRITICAL] ${error.message}`, logData);
        break;
      case ErrorSeverity.HIGH:
        this.logger.error(`[HIGH] ${error.message}`, logData);
        break;
      case ErrorSeverity.MEDIUM:
        this.logger.warn(`[MEDIUM] ${error.message}`, logData);
        break;
      case ErrorSeverity.LOW:
        this.logger.info(`[LOW] ${error.message}`, logData);
        break;
    }
  }

  private executeCallbacks(severity: ErrorSeverity, error: StructuredError): void {
    const callbacks = this.errorCallbacks.get(severity);
    if (!callbacks) {
      return;
    }

    callbacks.forEach(callback => {
      try {
        callback(error);
      } catch (callbackError) {
        this.logger.error('Error in error callback', {
          callbackError: String(callbackError),
          originalErrorId: error.id
        });
      }
    });
  }

  private determinePersistenceSeverity(error: Error): ErrorSeverity {
    const message = error.message.toLowerCase();

    if (message.includes('constraint') || message.includes('foreign key')) {
      return ErrorSeverity.MEDIUM;
    }

    return ErrorSeverity.HIGH;
  }

  private generateErrorId(): string {
    return `err_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private maintainErrorHistory(): void {
    if (this.errors.size <= this.maxErrorHistory) {
      return;
    }

    const sortedErrors = Array.from(this.errors.entries())
      .sort(([, a], [, b]) => a.timestamp.getTime() - b.timestamp.getTime());

    const toRemove = sortedErrors.slice(0, sortedErrors.length - this.maxErrorHistory);
    toRemove.forEach(([id]) => this.errors.delete(id));
  }

  destroy(): void {
    this.errorCallbacks.clear();
    this.errors.clear();
  }
}
