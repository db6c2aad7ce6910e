import {writeFile} from 'node:fs/promises'
import type {BuildResult, BuildTask, RunReport, TaskFailure, TaskReport, TaskStatus, VerificationReport} from './types.js'
import {formatDuration, formatSize} from './utils.js'

/**
 * Combine plan, build and verification outcomes into one report.
 *
 * `results` and `verifications` are indexed by plan position. The report
 * lists every task in plan order, whatever its outcome. Pure: the same input
 * always yields an equal report.
 */
export function aggregate(
  tasks: readonly BuildTask[],
  results: ReadonlyArray<BuildResult | undefined>,
  verifications: ReadonlyArray<VerificationReport | undefined>
): RunReport {
  const summary: Record<TaskStatus, number> = {
    Pending: 0,
    PlanFailed: 0,
    Building: 0,
    BuildFailed: 0,
    Succeeded: 0,
    Verifying: 0,
    VerificationFailed: 0,
    Verified: 0
  }

  const entries = tasks.map((task, index): TaskReport => {
    summary[task.status]++
    const result = results[index]
    const verification = verifications[index]
    const entry: TaskReport = {task: snapshot(task)}
    if (result) {
      entry.result = {...result, logExcerpt: [...result.logExcerpt]}
    }

    if (verification) {
      entry.verification = {...verification, checks: verification.checks.map(check => ({...check}))}
    }

    const failure = describeFailure(task, result, verification)
    if (failure) {
      entry.failure = failure
    }

    return entry
  })

  const exitCode = tasks.every(task => task.status === 'Verified') ? 0 : 1
  return {tasks: entries, summary, exitCode}
}

function snapshot(task: BuildTask): BuildTask {
  const copy: BuildTask = {
    ...task,
    strategy: {...task.strategy},
    buildArgs: {...task.buildArgs}
  }
  if (task.error) {
    copy.error = {...task.error}
  }

  return copy
}

function describeFailure(task: BuildTask, result?: BuildResult, verification?: VerificationReport): TaskFailure | undefined {
  switch (task.status) {
    case 'PlanFailed': {
      return {stage: 'plan', detail: task.error?.message ?? 'version resolution failed'}
    }

    case 'BuildFailed': {
      const reason = result?.reason ?? 'NonZeroExit'
      return {stage: 'build', detail: `${reason}: ${result?.error ?? task.error?.message ?? 'build failed'}`}
    }

    case 'VerificationFailed': {
      const failed = verification?.checks.filter(check => !check.passed) ?? []
      return {stage: 'verify', detail: failed.map(check => `${check.name}: ${check.detail}`).join('; ')}
    }

    case 'Pending': {
      return {stage: 'cancelled', detail: 'run cancelled before the build started'}
    }

    case 'Succeeded': {
      return {stage: 'cancelled', detail: 'run cancelled before verification'}
    }

    case 'Building':
    case 'Verifying': {
      return {stage: 'cancelled', detail: `run stopped while ${task.status.toLowerCase()}`}
    }

    case 'Verified': {
      return undefined
    }
  }
}

export function serializeReport(report: RunReport): string {
  return JSON.stringify(report, null, 2) + '\n'
}

export async function writeReport(filePath: string, report: RunReport): Promise<void> {
  await writeFile(filePath, serializeReport(report), 'utf8')
}

/**
 * Human-readable summary: one line per target, followed by the stage or
 * check that failed.
 */
export function formatReport(report: RunReport): string {
  const lines: string[] = []
  const nameWidth = Math.max(0, ...report.tasks.map(({task}) => task.name.length))

  for (const {task, result, failure} of report.tasks) {
    const version = task.resolvedVersion ?? task.requestedVersion
    const details: string[] = []
    if (result) {
      details.push(formatDuration(result.durationMs))
      if (result.sizeBytes !== undefined) {
        details.push(formatSize(result.sizeBytes))
      }
    }

    const suffix = details.length > 0 ? ` (${details.join(', ')})` : ''
    lines.push(`${task.status === 'Verified' ? 'ok  ' : 'FAIL'} ${task.name.padEnd(nameWidth)}  ${version}  ${task.status}${suffix}`)
    if (failure) {
      lines.push(`     ${failure.stage}: ${failure.detail}`)
    }
  }

  const verified = report.summary.Verified
  lines.push(`${verified}/${report.tasks.length} verified`)
  return lines.join('\n')
}
