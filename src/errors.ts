import type { ApplicationStatus, LifecycleOperation } from './domain/application/application-types';

/**
 * Base class for every error the engine raises on purpose. `code` is stable and
 * safe to hand to API clients; `details` carries diagnostic context for logs.
 */
export class LifecycleError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// === SKIPS (expected, non-fatal) ===

export class SkippedAwardError extends LifecycleError {
  constructor(message: string, details: Record<string, unknown> = {}, code: string = 'AWARD_SKIPPED') {
    super(code, message, details);
  }
}

export class BorrowerOptedOutError extends SkippedAwardError {
  constructor(details: Record<string, unknown> = {}) {
    super('Borrower opted to not receive any new opportunity', details, 'BORROWER_OPTED_OUT');
  }
}

export class ApplicationExistsError extends SkippedAwardError {
  constructor(details: Record<string, unknown> = {}) {
    super('Application already exists', details, 'APPLICATION_EXISTS');
  }
}

export class DuplicateAwardError extends SkippedAwardError {
  constructor(details: Record<string, unknown> = {}) {
    super('Award already exists', details, 'AWARD_EXISTS');
  }
}

// === UPSTREAM SOURCE ===

export class SourceFormatError extends LifecycleError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('SOURCE_FORMAT_ERROR', message, details);
  }
}

export class UpstreamHttpError extends LifecycleError {
  constructor(
    message: string,
    readonly status: number | null,
    readonly retryable: boolean,
    details: Record<string, unknown> = {}
  ) {
    super('UPSTREAM_HTTP_ERROR', message, { ...details, status });
  }
}

// === LIFECYCLE ===

export class InvalidStateTransitionError extends LifecycleError {
  constructor(
    readonly currentStatus: ApplicationStatus,
    readonly event: LifecycleOperation,
    readonly allowed: readonly ApplicationStatus[]
  ) {
    super(
      'INVALID_STATE_TRANSITION',
      `Cannot apply ${event} to an application in status ${currentStatus} (requires ${allowed.join(' or ')})`,
      { currentStatus, event, allowed }
    );
  }
}

export class ApplicationExpiredError extends LifecycleError {
  constructor(details: Record<string, unknown> = {}) {
    super('APPLICATION_EXPIRED', 'Application has expired', details);
  }
}

export class ApplicationArchivedError extends LifecycleError {
  constructor(details: Record<string, unknown> = {}) {
    super('APPLICATION_ARCHIVED', 'Application data has been erased', details);
  }
}

export class ApplicationAlreadyCopiedError extends LifecycleError {
  constructor(details: Record<string, unknown> = {}) {
    super('APPLICATION_ALREADY_COPIED', 'An alternative application was already created from this one', details);
  }
}

export class MissingLenderError extends LifecycleError {
  constructor(details: Record<string, unknown> = {}) {
    super('LENDER_NOT_SELECTED', 'A lender must be selected before submitting', details);
  }
}

export class CreditProductNotFoundError extends LifecycleError {
  constructor(details: Record<string, unknown> = {}) {
    super('CREDIT_PRODUCT_NOT_FOUND', 'Credit product not found', details);
  }
}

export class ForbiddenActorError extends LifecycleError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('FORBIDDEN', message, details);
  }
}

export class NotFoundError extends LifecycleError {
  constructor(entity: string, details: Record<string, unknown> = {}) {
    super(`${entity.toUpperCase()}_NOT_FOUND`, `${entity} not found`, details);
  }
}

// === SIDE EFFECTS & PERSISTENCE ===

export class DispatchError extends LifecycleError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('NOTIFICATION_DISPATCH_FAILED', message, details);
  }
}

export class UniqueViolationError extends LifecycleError {
  constructor(readonly constraint: string) {
    super('UNIQUE_VIOLATION', `Unique constraint violated: ${constraint}`, { constraint });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
