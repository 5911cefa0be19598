/**
 * Error Taxonomy
 *
 * Every failure that can reach a caller is a ForgeError. The `kind` is what
 * clients see as `error_kind`; `fault` tells them whether retrying on their
 * side can help ("client" = fix the request / top up, "server" = our outage).
 */

export type ErrorFault = 'client' | 'server';

export type ErrorKind =
  | 'InsufficientCredits'
  | 'ConcurrentUpdateConflict'
  | 'NoProviderAvailable'
  | 'AllProvidersExhausted'
  | 'ProviderCallFailed'
  | 'NoPipelineMatch'
  | 'PipelineConfigurationError'
  | 'ContractViolation'
  | 'MalformedWebhookEvent'
  | 'WebhookSignatureInvalid'
  | 'UnknownWebhookProvider'
  | 'PaymentsUnavailable'
  | 'ValidationError'
  | 'Unauthenticated'
  | 'ProRequired'
  | 'KillSwitchEngaged'
  | 'AccountArchived'
  | 'IdempotencyKeyReuse'
  | 'RequestAborted'
  | 'InternalError';

export type HttpErrorStatus = 400 | 401 | 402 | 403 | 404 | 409 | 422 | 500 | 502 | 503;

export interface ErrorBody {
  status: 'error';
  error_kind: ErrorKind;
  message: string;
  fault: ErrorFault;
  retryable: boolean;
  details?: unknown;
}

export class ForgeError extends Error {
  constructor(
    readonly kind: ErrorKind,
    message: string,
    readonly fault: ErrorFault,
    readonly httpStatus: HttpErrorStatus,
    readonly retryable = false,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = kind;
  }

  toBody(): ErrorBody {
    const body: ErrorBody = {
      status: 'error',
      error_kind: this.kind,
      message: this.message,
      fault: this.fault,
      retryable: this.retryable,
    };
    if (this.details !== undefined) {
      body.details = this.details;
    }
    return body;
  }
}

// =============================================================================
// LEDGER
// =============================================================================

export class InsufficientCreditsError extends ForgeError {
  constructor(
    readonly userId: string,
    readonly requested: number,
    readonly available: number,
  ) {
    super(
      'InsufficientCredits',
      `Insufficient credits: ${requested} required, ${available} available`,
      'client',
      402,
      false,
      { required: requested, available },
    );
  }
}

export class ConcurrentUpdateConflictError extends ForgeError {
  constructor(userId: string, attempts: number) {
    super(
      'ConcurrentUpdateConflict',
      `Balance for ${userId} changed concurrently ${attempts} times; try again`,
      'server',
      409,
      true,
    );
  }
}

export class AccountArchivedError extends ForgeError {
  constructor(userId: string) {
    super('AccountArchived', `Credit account ${userId} is archived`, 'client', 403);
  }
}

export class IdempotencyKeyReuseError extends ForgeError {
  constructor(scope: string, key: string, message?: string) {
    super(
      'IdempotencyKeyReuse',
      message ?? `Idempotency key "${key}" was already used for a different ${scope} request`,
      'client',
      409,
    );
  }
}

// =============================================================================
// PROVIDERS
// =============================================================================

export class NoProviderAvailableError extends ForgeError {
  constructor(modelClass: string) {
    super(
      'NoProviderAvailable',
      `No healthy provider can serve model class "${modelClass}"`,
      'server',
      503,
      true,
    );
  }
}

export class AllProvidersExhaustedError extends ForgeError {
  constructor(
    modelClass: string,
    readonly attempts: Array<{ provider: string; error: string }>,
  ) {
    super(
      'AllProvidersExhausted',
      `All ${attempts.length} provider attempts for "${modelClass}" failed`,
      'server',
      503,
      true,
      { attempts },
    );
  }
}

export class ProviderCallError extends ForgeError {
  constructor(
    readonly provider: string,
    message: string,
    readonly upstreamStatus?: number,
  ) {
    super('ProviderCallFailed', `${provider}: ${message}`, 'server', 502, true);
  }
}

// =============================================================================
// ROUTING
// =============================================================================

export class NoPipelineMatchError extends ForgeError {
  constructor(intent: string, client: string, mode: string) {
    super(
      'NoPipelineMatch',
      `No pipeline for intent=${intent} client=${client} mode=${mode}`,
      'server',
      500,
    );
  }
}

export class PipelineConfigurationError extends ForgeError {
  constructor(message: string) {
    super('PipelineConfigurationError', message, 'server', 500);
  }
}

export class ProRequiredError extends ForgeError {
  constructor(pipelineId: string) {
    super('ProRequired', `Pipeline ${pipelineId} requires a pro plan`, 'client', 403);
  }
}

export class KillSwitchError extends ForgeError {
  constructor(key: string) {
    super('KillSwitchEngaged', `Routing for ${key} is temporarily disabled`, 'server', 503, true);
  }
}

// =============================================================================
// EXECUTION
// =============================================================================

export class ContractViolationError extends ForgeError {
  constructor(
    contract: string,
    readonly violations: string[],
  ) {
    super(
      'ContractViolation',
      `Provider response violated contract "${contract}": ${violations.join('; ')}`,
      'server',
      502,
      true,
      { violations },
    );
  }
}

export class RequestAbortedError extends ForgeError {
  constructor(stage: string) {
    super('RequestAborted', `Request aborted by client during ${stage}`, 'client', 400);
  }
}

// =============================================================================
// WEBHOOKS
// =============================================================================

export class MalformedWebhookEventError extends ForgeError {
  constructor(eventId: string, missing: string[]) {
    super(
      'MalformedWebhookEvent',
      `Webhook event ${eventId} is missing ${missing.join(', ')}`,
      'client',
      422,
    );
  }
}

export class WebhookSignatureError extends ForgeError {
  constructor(message: string) {
    super('WebhookSignatureInvalid', message, 'client', 400);
  }
}

export class UnknownWebhookProviderError extends ForgeError {
  constructor(provider: string) {
    super('UnknownWebhookProvider', `No webhook handler for provider "${provider}"`, 'client', 404);
  }
}

export class PaymentsUnavailableError extends ForgeError {
  constructor() {
    super('PaymentsUnavailable', 'Payments are not configured on this server', 'server', 503);
  }
}

// =============================================================================
// REQUEST LAYER
// =============================================================================

export class ValidationError extends ForgeError {
  constructor(message: string, details?: unknown) {
    super('ValidationError', message, 'client', 400, false, details);
  }
}

export class UnauthenticatedError extends ForgeError {
  constructor(message = 'Missing or invalid API key') {
    super('Unauthenticated', message, 'client', 401);
  }
}

export class InternalError extends ForgeError {
  constructor(message = 'An unexpected error occurred.') {
    super('InternalError', message, 'server', 500);
  }
}

export function toForgeError(error: unknown): ForgeError {
  if (error instanceof ForgeError) return error;
  return new InternalError();
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
