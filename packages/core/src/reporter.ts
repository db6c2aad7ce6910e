import process from 'node:process'
import pino from 'pino'
import type {BuildFailureReason, TaskStatus, VerificationCheck} from './types.js'

/** Reference to a target for display and keying purposes. */
export type TargetRef = {
  name: string;
  version: string;
}

/**
 * Discriminated union of run events.
 *
 * Lifecycle:
 * 1. RUN_START - The plan is ready
 * 2. For each target:
 *    a. TARGET_PLAN_FAILED - Version resolution failed (emitted right after RUN_START)
 *    b. TARGET_BUILDING - Build begins
 *    c. TARGET_LOG - Build output line (stdout/stderr)
 *    d. TARGET_BUILT - Build succeeded
 *       OR TARGET_BUILD_FAILED - Build failed, timed out or was cancelled
 *    e. TARGET_VERIFYING - Verification begins
 *    f. TARGET_VERIFIED - Every check passed
 *       OR TARGET_VERIFICATION_FAILED - At least one check failed
 * 3. RUN_CANCELLED - Cancellation requested (no new builds start)
 * 4. RUN_FINISHED - Report is ready
 */
export type RunStartEvent = {
  event: 'RUN_START';
  runId: string;
  targets: TargetRef[];
  concurrency: number;
}

export type TargetPlanFailedEvent = {
  event: 'TARGET_PLAN_FAILED';
  runId: string;
  target: TargetRef;
  error: string;
}

export type TargetBuildingEvent = {
  event: 'TARGET_BUILDING';
  runId: string;
  target: TargetRef;
  imageTag: string;
}

export type TargetLogEvent = {
  event: 'TARGET_LOG';
  runId: string;
  target: TargetRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type TargetBuiltEvent = {
  event: 'TARGET_BUILT';
  runId: string;
  target: TargetRef;
  imageRef: string;
  durationMs: number;
  sizeBytes?: number;
}

export type TargetBuildFailedEvent = {
  event: 'TARGET_BUILD_FAILED';
  runId: string;
  target: TargetRef;
  reason: BuildFailureReason;
  exitCode?: number;
  error: string;
}

export type TargetVerifyingEvent = {
  event: 'TARGET_VERIFYING';
  runId: string;
  target: TargetRef;
}

export type TargetVerifiedEvent = {
  event: 'TARGET_VERIFIED';
  runId: string;
  target: TargetRef;
  checks: VerificationCheck[];
}

export type TargetVerificationFailedEvent = {
  event: 'TARGET_VERIFICATION_FAILED';
  runId: string;
  target: TargetRef;
  checks: VerificationCheck[];
}

export type RunCancelledEvent = {
  event: 'RUN_CANCELLED';
  runId: string;
}

export type RunFinishedEvent = {
  event: 'RUN_FINISHED';
  runId: string;
  exitCode: number;
  summary: Record<TaskStatus, number>;
}

export type RunEvent =
  | RunStartEvent
  | TargetPlanFailedEvent
  | TargetBuildingEvent
  | TargetLogEvent
  | TargetBuiltEvent
  | TargetBuildFailedEvent
  | TargetVerifyingEvent
  | TargetVerifiedEvent
  | TargetVerificationFailedEvent
  | RunCancelledEvent
  | RunFinishedEvent

/**
 * Interface for reporting run events.
 */
export type Reporter = {
  /** Reports run and target state transitions */
  emit(event: RunEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger = pino({level: 'info'}, pino.destination(2))

  emit(event: RunEvent): void {
    if (event.event === 'TARGET_LOG') {
      this.logger.debug(event)
      return
    }

    this.logger.info(event)
  }
}

/**
 * Diagnostics logger (stderr). Level from IMAGEWRIGHT_LOG_LEVEL.
 */
export const logger = pino({
  name: 'imagewright',
  level: process.env.IMAGEWRIGHT_LOG_LEVEL ?? 'info'
}, pino.destination(2))
