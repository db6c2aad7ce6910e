import {BuildCancelledError, BuildTimeoutError} from './errors.js'
import type {ImageBuilder, OnLogLine} from './engine/index.js'
import type {BuildImageResult} from './engine/types.js'
import {transitionTask} from './task-state.js'
import {maxTimeoutSec, type BuildFailureReason, type BuildResult, type BuildTask} from './types.js'
import {logger} from './reporter.js'
import {LogTail} from './utils.js'

export type ExecuteOptions = {
  /** Wall-clock limit of this build. */
  timeoutSec: number;
  noCache?: boolean;
  /** Run-level cancellation. */
  signal?: AbortSignal;
  labels?: Record<string, string>;
  onLogLine?: OnLogLine;
}

export type BuildExecutorOptions = {
  /** Lines kept in `logExcerpt` (default: 50). */
  logTailLines?: number;
  /** Characters kept per excerpt line (default: 500). */
  logLineLength?: number;
}

/**
 * Runs the build of one task against the backend.
 *
 * Never throws for a build problem: backend errors, non-zero exits, timeouts
 * and cancellation all end in a BuildFailed task with a log excerpt.
 */
export class BuildExecutor {
  constructor(
    private readonly builder: ImageBuilder,
    private readonly options: BuildExecutorOptions = {}
  ) {}

  async execute(task: BuildTask, options: ExecuteOptions): Promise<BuildResult> {
    const {imageTag} = task
    if (!imageTag) {
      throw new Error(`Target ${task.name} has no image tag: it was not planned`)
    }

    transitionTask(task, 'Building')

    const tail = new LogTail(this.options.logTailLines, this.options.logLineLength)
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort(new BuildTimeoutError(options.timeoutSec))
    }, Math.min(options.timeoutSec, maxTimeoutSec) * 1000)
    const onCancel = () => {
      controller.abort(new BuildCancelledError())
    }

    if (options.signal?.aborted) {
      onCancel()
    } else {
      options.signal?.addEventListener('abort', onCancel, {once: true})
    }

    const startedAt = Date.now()
    let outcome: BuildImageResult
    try {
      outcome = await this.builder.build(
        {
          contextDir: task.contextDir,
          containerfile: task.containerfile,
          tag: imageTag,
          buildArgs: task.buildArgs,
          labels: options.labels,
          noCache: options.noCache,
          signal: controller.signal
        },
        log => {
          tail.push(log.line)
          options.onLogLine?.(log)
        }
      )
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return this.fail(task, 'BackendError', {durationMs: Date.now() - startedAt, logExcerpt: tail.toArray(), error: message})
    } finally {
      clearTimeout(timer)
      options.signal?.removeEventListener('abort', onCancel)
    }

    const durationMs = outcome.finishedAt.getTime() - outcome.startedAt.getTime()
    const logExcerpt = tail.toArray()

    if (outcome.exitCode === 0 && !outcome.aborted) {
      // Size is informational here; the verifier inspects the image again
      const info = await this.builder.inspect(imageTag).catch((error: unknown) => {
        logger.warn({target: task.name, err: error}, 'Image inspect failed after build')
        return undefined
      })
      transitionTask(task, 'Succeeded')
      return {
        name: task.name,
        outcome: 'succeeded',
        imageRef: imageTag,
        exitCode: 0,
        logExcerpt,
        durationMs,
        sizeBytes: info?.sizeBytes
      }
    }

    if (timedOut) {
      return this.fail(task, 'Timeout', {durationMs, logExcerpt, exitCode: outcome.exitCode, error: new BuildTimeoutError(options.timeoutSec).message})
    }

    if (controller.signal.aborted) {
      return this.fail(task, 'Cancelled', {durationMs, logExcerpt, exitCode: outcome.exitCode, error: new BuildCancelledError().message})
    }

    return this.fail(task, 'NonZeroExit', {
      durationMs,
      logExcerpt,
      exitCode: outcome.exitCode,
      error: outcome.error ?? `Build exited with code ${outcome.exitCode}`
    })
  }

  /**
   * Record a build that never started because the backend is unavailable.
   */
  unavailable(task: BuildTask, error: string): BuildResult {
    transitionTask(task, 'Building')
    return this.fail(task, 'BackendError', {durationMs: 0, logExcerpt: [], error})
  }

  private fail(
    task: BuildTask,
    reason: BuildFailureReason,
    details: {durationMs: number; logExcerpt: string[]; exitCode?: number; error: string}
  ): BuildResult {
    transitionTask(task, 'BuildFailed', {stage: 'build', code: reason, message: details.error})
    return {
      name: task.name,
      outcome: 'failed',
      reason,
      exitCode: details.exitCode,
      logExcerpt: details.logExcerpt,
      durationMs: details.durationMs,
      error: details.error
    }
  }
}
