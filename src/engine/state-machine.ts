/**
 * Flow state machine.
 *
 * Enforces the fixed step order, producing typed errors on invalid
 * transitions. The only branch is after the widget is attached:
 * cleanup or completion.
 */

import {
  FlowPhase,
  FlowState,
  STEP_ORDER,
  StepKey,
  VALID_FLOW_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a flow state transition. */
export function transitionFlowState(
  current: FlowState,
  target: FlowState,
): TransitionResult<FlowState> {
  const validTargets = VALID_FLOW_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        kind: 'precondition',
        message: `Invalid flow state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** The state that follows a successful `current`. */
export function nextFlowState(current: FlowState, cleanupRequested: boolean): FlowState {
  if (current === FlowPhase.NotStarted) return STEP_ORDER[0];
  if (current === StepKey.AddPdfWidget) {
    return cleanupRequested ? StepKey.DeletePdfWidget : FlowPhase.Completed;
  }
  if (current === StepKey.DeletePdfWidget) return FlowPhase.Completed;
  const index = STEP_ORDER.findIndex((step) => step === current);
  if (index === -1) return current;
  return STEP_ORDER[index + 1];
}

/** The full step sequence a successful run executes. */
export function plannedSteps(cleanupRequested: boolean): StepKey[] {
  return cleanupRequested ? [...STEP_ORDER, StepKey.DeletePdfWidget] : [...STEP_ORDER];
}

/** Check if a flow state is terminal. */
export function isTerminalFlowState(state: FlowState): boolean {
  return state === FlowPhase.Completed || state === FlowPhase.Failed;
}

export function isStepKey(state: FlowState): state is StepKey {
  return state !== FlowPhase.NotStarted && state !== FlowPhase.Completed && state !== FlowPhase.Failed;
}
