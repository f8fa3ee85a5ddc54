/**
 * Job and orchestrator state machines.
 *
 * Enforces valid state transitions for extraction jobs and batch runs,
 * producing typed errors on invalid transitions.
 */

import { JobStatus, VALID_JOB_TRANSITIONS } from '../domain/job';
import { OrchestratorState, VALID_ORCHESTRATOR_TRANSITIONS } from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a job state transition. */
export function transitionJobStatus(
  current: JobStatus,
  target: JobStatus,
): TransitionResult<JobStatus> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'JOB.INVALID_TRANSITION',
        message: `Invalid job state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt an orchestrator state transition. */
export function transitionOrchestratorState(
  current: OrchestratorState,
  target: OrchestratorState,
): TransitionResult<OrchestratorState> {
  const validTargets = VALID_ORCHESTRATOR_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid orchestrator state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a job status is terminal. */
export function isTerminalJobStatus(status: JobStatus): boolean {
  return status === JobStatus.Succeeded || status === JobStatus.Failed;
}
