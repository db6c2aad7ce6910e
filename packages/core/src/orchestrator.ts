import {randomUUID} from 'node:crypto'
import {cpus} from 'node:os'
import type {ImageBuilder} from './engine/index.js'
import {BuildExecutor, type BuildExecutorOptions} from './build-executor.js'
import {plan} from './planner.js'
import {aggregate} from './report.js'
import type {Reporter, TargetRef} from './reporter.js'
import type {BuildResult, BuildTask, RegistryEntry, RunReport, Selector, VerificationReport} from './types.js'
import type {VersionResolver} from './version-resolver.js'
import {Verifier} from './verifier.js'

export const defaultTimeoutSec = 1800
export const defaultProbeTimeoutSec = 30

export type RunOptions = {
  concurrency?: number;
  /** Build timeout for targets without their own (default: 1800s). */
  timeoutSec?: number;
  /** Version probe timeout (default: 30s). */
  probeTimeoutSec?: number;
  /** Directory build contexts are resolved against. */
  registryRoot?: string;
  imagePrefix?: string;
  noCache?: boolean;
  /** Stops dispatching new builds and cancels in-flight ones cooperatively. */
  signal?: AbortSignal;
}

export type OrchestratorOptions = BuildExecutorOptions & {
  builder: ImageBuilder;
  resolver: VersionResolver;
  reporter: Reporter;
}

/**
 * Plans, builds and verifies a selection of registry targets.
 *
 * Each task runs its build → verify pipeline as one unit on a bounded worker
 * pool. Workers share nothing mutable: every task writes its outcome into its
 * own slot, indexed by plan position, so the report keeps plan order
 * whatever the completion order.
 */
export class BuildOrchestrator {
  private readonly builder: ImageBuilder
  private readonly resolver: VersionResolver
  private readonly reporter: Reporter
  private readonly executor: BuildExecutor
  private readonly verifier: Verifier

  constructor(options: OrchestratorOptions) {
    this.builder = options.builder
    this.resolver = options.resolver
    this.reporter = options.reporter
    this.executor = new BuildExecutor(options.builder, options)
    this.verifier = new Verifier(options.builder)
  }

  async run(entries: RegistryEntry[], selector: Selector, options: RunOptions = {}): Promise<RunReport> {
    const {signal} = options
    const runId = randomUUID()
    const concurrency = Math.max(1, options.concurrency ?? cpus().length)

    // Selection errors are fatal and thrown before anything is built
    const tasks = await plan(entries, selector, {
      resolver: this.resolver,
      registryRoot: options.registryRoot,
      imagePrefix: options.imagePrefix,
      signal
    })

    const entryByName = new Map(entries.map(entry => [entry.name, entry]))
    const results: Array<BuildResult | undefined> = Array.from({length: tasks.length})
    const verifications: Array<VerificationReport | undefined> = Array.from({length: tasks.length})

    this.reporter.emit({event: 'RUN_START', runId, targets: tasks.map(targetRef), concurrency})
    for (const task of tasks) {
      if (task.status === 'PlanFailed') {
        this.reporter.emit({event: 'TARGET_PLAN_FAILED', runId, target: targetRef(task), error: task.error?.message ?? 'planning failed'})
      }
    }

    let runnable = tasks.filter(task => task.status === 'Pending')
    const backendError = runnable.length > 0 ? await this.checkBackend() : undefined
    if (backendError !== undefined) {
      // Nothing can be built, but the plan outcome is still reported
      for (const task of runnable) {
        const result = this.executor.unavailable(task, backendError)
        results[task.index] = result
        this.reporter.emit({event: 'TARGET_BUILD_FAILED', runId, target: targetRef(task), reason: 'BackendError', error: backendError})
      }

      runnable = []
    }

    const onCancel = () => {
      this.reporter.emit({event: 'RUN_CANCELLED', runId})
    }

    signal?.addEventListener('abort', onCancel, {once: true})
    let settled: Array<PromiseSettledResult<void> | undefined>
    try {
      settled = await withConcurrency(runnable.map(task => async () => {
        const entry = entryByName.get(task.name)
        if (!entry) {
          return
        }

        const target = targetRef(task)
        this.reporter.emit({event: 'TARGET_BUILDING', runId, target, imageTag: task.imageTag ?? ''})

        const result = await this.executor.execute(task, {
          timeoutSec: entry.timeoutSec ?? options.timeoutSec ?? defaultTimeoutSec,
          noCache: options.noCache,
          signal,
          labels: {'imagewright.run': runId, 'imagewright.target': task.name},
          onLogLine: ({stream, line}) => {
            this.reporter.emit({event: 'TARGET_LOG', runId, target, stream, line})
          }
        })
        results[task.index] = result

        if (result.outcome === 'failed' || !result.imageRef) {
          this.reporter.emit({
            event: 'TARGET_BUILD_FAILED',
            runId,
            target,
            reason: result.reason ?? 'NonZeroExit',
            exitCode: result.exitCode,
            error: result.error ?? 'build failed'
          })
          return
        }

        this.reporter.emit({event: 'TARGET_BUILT', runId, target, imageRef: result.imageRef, durationMs: result.durationMs, sizeBytes: result.sizeBytes})

        // Cancellation is honoured between stages: a built image is not verified
        if (signal?.aborted) {
          return
        }

        this.reporter.emit({event: 'TARGET_VERIFYING', runId, target})
        const verification = await this.verifier.verify(task, result, entry, {
          probeTimeoutSec: options.probeTimeoutSec ?? defaultProbeTimeoutSec
        })
        verifications[task.index] = verification

        this.reporter.emit({
          event: verification.overallPassed ? 'TARGET_VERIFIED' : 'TARGET_VERIFICATION_FAILED',
          runId,
          target,
          checks: verification.checks
        })
      }), concurrency, signal)
    } finally {
      signal?.removeEventListener('abort', onCancel)
    }

    // Build problems are captured per task; a rejection here is a defect
    for (const outcome of settled) {
      if (outcome?.status === 'rejected') {
        throw outcome.reason
      }
    }

    const report = aggregate(tasks, results, verifications)
    this.reporter.emit({event: 'RUN_FINISHED', runId, exitCode: report.exitCode, summary: report.summary})
    return report
  }

  /** Returns the backend error message, or undefined when the backend is usable. */
  private async checkBackend(): Promise<string | undefined> {
    try {
      await this.builder.check()
      return undefined
    } catch (error) {
      return error instanceof Error ? error.message : String(error)
    }
  }
}

function targetRef(task: BuildTask): TargetRef {
  return {name: task.name, version: task.resolvedVersion ?? task.requestedVersion}
}

/**
 * Run tasks on at most `limit` workers. Workers stop taking new tasks once
 * `signal` aborts; tasks already started run to completion.
 */
export async function withConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
  signal?: AbortSignal
): Promise<Array<PromiseSettledResult<T> | undefined>> {
  const results: Array<PromiseSettledResult<T> | undefined> = Array.from({length: tasks.length})
  let next = 0

  async function worker() {
    while (next < tasks.length && !signal?.aborted) {
      const i = next++
      try {
        results[i] = {status: 'fulfilled', value: await tasks[i]()}
      } catch (error) {
        results[i] = {status: 'rejected', reason: error}
      }
    }
  }

  await Promise.all(Array.from({length: Math.min(limit, tasks.length)}, async () => worker()))
  return results
}
