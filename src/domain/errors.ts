/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure in a flow run surfaces as a TypedError with a closed
 * `kind`, so callers branch on cause rather than on message text.
 */

/**
 * Closed set of failure causes.
 *
 * - `connection`: host unreachable, socket error or request timeout.
 * - `http_status`: the call completed with a status other than the expected one.
 * - `remote_state`: the call succeeded but the decoded body is not what the flow needs.
 * - `precondition`: local input is unusable; raised before any network call.
 */
export type ErrorKind = 'connection' | 'http_status' | 'remote_state' | 'precondition';

/** Typed suggested fix that an operator or agent can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure attached to failed runs. */
export interface TypedError {
  /** Namespaced error code (e.g., "STEP.HTTP_STATUS"). */
  code: string;
  kind: ErrorKind;
  message: string;
  /** Step key the error belongs to, if any. */
  stepId?: string;
  runId?: string;
  /** Whether the same request is expected to succeed if repeated unchanged. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  kind: ErrorKind;
  message: string;
  stepId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    kind: params.kind,
    message: params.message,
    stepId: params.stepId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Response bodies are truncated to this many characters in error details. */
export const MAX_ERROR_BODY_LENGTH = 2000;

// --- Error factory functions ---

export function connectionError(url: string, cause: string): TypedError {
  return createTypedError({
    code: 'NETWORK.CONNECTION_FAILED',
    kind: 'connection',
    message: `Connection failed (${url}): ${cause}`,
    retryable: true,
    details: { url },
    suggestedFixes: [
      { type: 'CHECK_CONNECTIVITY', params: { url }, description: 'Verify the host is reachable and the environment is correct.' },
    ],
  });
}

export function requestTimeoutError(url: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'NETWORK.TIMEOUT',
    kind: 'connection',
    message: `Request timed out after ${timeoutMs}ms (${url})`,
    retryable: true,
    details: { url, timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

/**
 * Create a typed error for a status mismatch. Retryability follows the
 * status code: 429 and 5xx are transient, everything else needs a fix.
 */
export function httpStatusError(
  stepId: string,
  expectedStatus: number,
  statusCode: number,
  body: string,
  method: string,
  url: string,
): TypedError {
  const retryable = statusCode === 429 || statusCode >= 500;
  const fixes: SuggestedFix[] = [];

  if (statusCode === 401) {
    fixes.push({ type: 'CHECK_API_KEY', params: { statusCode }, description: 'Authentication failed. Verify the API token.' });
  } else if (statusCode === 403) {
    fixes.push({
      type: 'RERUN_FLOW',
      params: { statusCode },
      description: 'Access denied. For the storage upload this usually means the presigned URL expired; re-run the whole flow.',
    });
  } else if (statusCode === 404) {
    fixes.push({ type: 'FIX_RESOURCE_NOT_FOUND', params: { statusCode }, description: 'Verify the organization id and environment.' });
  } else if (retryable) {
    fixes.push({ type: 'WAIT_AND_RETRY', params: { delayMs: 5000 }, description: 'Transient server error. Re-run later.' });
  }

  return createTypedError({
    code: 'STEP.HTTP_STATUS',
    kind: 'http_status',
    message: `Step ${stepId} failed: ${method} ${url} returned ${statusCode}, expected ${expectedStatus}`,
    stepId,
    retryable,
    details: {
      method,
      url,
      expectedStatus,
      statusCode,
      body: body.slice(0, MAX_ERROR_BODY_LENGTH),
    },
    suggestedFixes: fixes,
  });
}

export function remoteStateError(
  stepId: string,
  message: string,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code: 'STEP.REMOTE_STATE',
    kind: 'remote_state',
    message: `Step ${stepId}: ${message}`,
    stepId,
    retryable: false,
    details,
  });
}

export function preconditionError(message: string, details?: Record<string, unknown>, stepId?: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.PRECONDITION',
    kind: 'precondition',
    message,
    stepId,
    retryable: false,
    details,
  });
}

/**
 * Error carrier for the throw/catch path between transport, adapters and
 * the orchestrator. The orchestrator unwraps it into the failed run.
 */
export class FlowError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'FlowError';
  }

  get kind(): ErrorKind {
    return this.typedError.kind;
  }

  /** Return a copy bound to the given step (keeps an existing step binding). */
  withStep(stepId: string): FlowError {
    if (this.typedError.stepId) return this;
    return new FlowError({ ...this.typedError, stepId });
  }
}

export function isFlowError(err: unknown): err is FlowError {
  return err instanceof FlowError;
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with its
 * masked form.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** Return a copy of the typed error with secrets masked in its message and body. */
export function maskTypedError(error: TypedError, secrets: string[]): TypedError {
  const details = error.details ? { ...error.details } : undefined;
  if (details && typeof details.body === 'string') {
    details.body = maskSecretsInMessage(details.body, secrets);
  }
  return {
    ...error,
    message: maskSecretsInMessage(error.message, secrets),
    details,
  };
}
