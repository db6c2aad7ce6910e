/**
 * Build task state machine.
 *
 * Pending -> Building -> {Succeeded, BuildFailed}
 * Succeeded -> Verifying -> {Verified, VerificationFailed}
 * Pending -> PlanFailed
 *
 * Transitions only move forward; a run never retries a task.
 */

import {InvalidTransitionError} from './errors.js'
import type {BuildTask, TaskError, TaskStatus} from './types.js'

const validTransitions: Record<TaskStatus, readonly TaskStatus[]> = {
  Pending: ['Building', 'PlanFailed'],
  Building: ['Succeeded', 'BuildFailed'],
  Succeeded: ['Verifying'],
  Verifying: ['Verified', 'VerificationFailed'],
  BuildFailed: [],
  PlanFailed: [],
  Verified: [],
  VerificationFailed: []
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return validTransitions[from].includes(to)
}

/** Move a task to its next status, recording the error of a failed stage. */
export function transitionTask(task: BuildTask, to: TaskStatus, error?: TaskError): void {
  if (!canTransition(task.status, to)) {
    throw new InvalidTransitionError(task.name, task.status, to)
  }

  task.status = to
  if (error) {
    task.error = error
  }
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return validTransitions[status].length === 0
}

export function isFailedStatus(status: TaskStatus): boolean {
  return status === 'PlanFailed' || status === 'BuildFailed' || status === 'VerificationFailed'
}
