/**
 * Step runner: executes one step of a flow run.
 *
 * Applies the attempt budget: read-only steps may be repeated after a
 * retryable failure, mutating steps run exactly once. Returns the step's
 * outcome rather than throwing, so the orchestrator decides what a
 * failure does to the run.
 */

import { StepOutcome } from '../adapters/response';
import { TypedError, createTypedError, isFlowError } from '../domain/errors';
import { StepKey, StepResult } from '../domain/run';
import { Logger } from '../logger';

/** Retry policy applied to every step. */
export interface StepPolicy {
  /** Total attempts allowed for a retryable step (1 = no retries). */
  maxAttempts: number;
  /** Fixed delay between attempts. */
  retryDelayMs: number;
}

export const DEFAULT_STEP_POLICY: StepPolicy = {
  maxAttempts: 1,
  retryDelayMs: 500,
};

/** Steps that only read remote state and are safe to repeat. */
export const IDEMPOTENT_STEPS: ReadonlySet<StepKey> = new Set([
  StepKey.GetQrDetails,
  StepKey.DownloadQrImage,
  StepKey.VerifyMedia,
]);

export interface StepDefinition<T> {
  key: StepKey;
  /** Perform the step's request(s). */
  execute: () => Promise<StepOutcome<T>>;
  /** Fields of the output recorded in StepResult.outputs. */
  describe: (output: T) => Record<string, unknown>;
}

export type StepRunOutcome<T> =
  | { ok: true; result: StepResult; output: T }
  | { ok: false; error: TypedError; attempts: number };

function toTypedError(key: StepKey, err: unknown): TypedError {
  if (isFlowError(err)) {
    return err.withStep(key).typedError;
  }
  return createTypedError({
    code: 'STEP.LOCAL_FAILURE',
    kind: 'precondition',
    message: `Step ${key} failed locally: ${err instanceof Error ? err.message : String(err)}`,
    stepId: key,
    retryable: false,
  });
}

/** Execute a single step under the attempt budget. */
export async function executeStep<T>(
  step: StepDefinition<T>,
  policy: StepPolicy,
  log: Logger,
): Promise<StepRunOutcome<T>> {
  const startedAt = Date.now();
  const maxAttempts = IDEMPOTENT_STEPS.has(step.key) ? Math.max(1, policy.maxAttempts) : 1;

  for (let attempt = 1; ; attempt++) {
    try {
      const outcome = await step.execute();
      const result: StepResult = Object.freeze({
        stepKey: step.key,
        status: outcome.status,
        body: outcome.body,
        outputs: step.describe(outcome.output),
        timestamp: new Date().toISOString(),
        attempts: attempt,
        durationMs: Date.now() - startedAt,
      });
      return { ok: true, result, output: outcome.output };
    } catch (err) {
      const error = toTypedError(step.key, err);
      if (!error.retryable || attempt >= maxAttempts) {
        return {
          ok: false,
          error: { ...error, details: { ...error.details, attempt, maxAttempts } },
          attempts: attempt,
        };
      }
      log.warn('Step attempt failed, retrying', {
        step: step.key,
        attempt,
        maxAttempts,
        code: error.code,
        delayMs: policy.retryDelayMs,
      });
      await sleep(policy.retryDelayMs);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
