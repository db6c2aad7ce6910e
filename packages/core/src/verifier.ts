import type {ImageBuilder, ImageInfo} from './engine/index.js'
import {transitionTask} from './task-state.js'
import type {BuildResult, BuildTask, RegistryEntry, VerificationCheck, VerificationReport} from './types.js'
import {formatSize} from './utils.js'

export const defaultProbeArgs = ['--version']

export type VerifyOptions = {
  /** Limit of the version probe, separate from the build timeout. */
  probeTimeoutSec: number;
}

/**
 * Checks a built image against the standard contract:
 * the image exists, answers a version probe, and fits its size budget.
 *
 * Every check runs even when an earlier one failed, so a report always
 * carries the full picture.
 */
export class Verifier {
  constructor(private readonly builder: ImageBuilder) {}

  async verify(task: BuildTask, result: BuildResult, entry: RegistryEntry, options: VerifyOptions): Promise<VerificationReport> {
    transitionTask(task, 'Verifying')

    const imageRef = result.imageRef ?? task.imageTag ?? ''
    const checks: VerificationCheck[] = []

    let info: ImageInfo | undefined
    checks.push(await runCheck('image-exists', async () => {
      info = await this.builder.inspect(imageRef)
      return info
        ? {passed: true, detail: `${imageRef} (${info.id})`}
        : {passed: false, detail: `${imageRef} does not resolve to an image`}
    }))

    checks.push(await runCheck('version-probe', async () => this.probe(imageRef, task, entry, options)))

    if (entry.sizeBudgetBytes !== undefined) {
      const budget = entry.sizeBudgetBytes
      checks.push(await runCheck('size-budget', async () => {
        const size = info?.sizeBytes ?? result.sizeBytes
        if (size === undefined) {
          return {passed: false, detail: `image size unavailable (budget ${formatSize(budget)})`}
        }

        return size <= budget
          ? {passed: true, detail: `${formatSize(size)} within budget of ${formatSize(budget)}`}
          : {passed: false, detail: `${formatSize(size)} exceeds budget of ${formatSize(budget)} by ${formatSize(size - budget)}`}
      }))
    }

    const overallPassed = checks.every(check => check.passed)
    if (overallPassed) {
      transitionTask(task, 'Verified')
    } else {
      const failed = checks.filter(check => !check.passed).map(check => check.name)
      transitionTask(task, 'VerificationFailed', {stage: 'verify', code: 'VERIFICATION_FAILED', message: `Failed checks: ${failed.join(', ')}`})
    }

    return {name: task.name, checks, overallPassed}
  }

  private async probe(imageRef: string, task: BuildTask, entry: RegistryEntry, options: VerifyOptions): Promise<{passed: boolean; detail: string}> {
    const args = entry.probe?.args ?? defaultProbeArgs
    const probe = await this.builder.probe({
      image: imageRef,
      args,
      entrypoint: entry.probe?.entrypoint,
      timeoutSec: options.probeTimeoutSec
    })

    const invocation = [entry.probe?.entrypoint, ...args].filter(Boolean).join(' ')
    if (probe.timedOut) {
      return {passed: false, detail: `'${invocation}' did not answer within ${options.probeTimeoutSec}s`}
    }

    const output = `${probe.stdout}\n${probe.stderr}`.trim()
    const firstLine = output.split('\n')[0] ?? ''
    if (probe.exitCode !== 0) {
      return {passed: false, detail: `'${invocation}' exited with code ${probe.exitCode}${firstLine ? `: ${firstLine}` : ''}`}
    }

    if (entry.probe?.expectVersion && task.resolvedVersion) {
      const expected = task.resolvedVersion.replace(/^v/, '')
      if (!output.includes(expected)) {
        return {passed: false, detail: `'${invocation}' output does not mention version ${expected}${firstLine ? `: ${firstLine}` : ''}`}
      }
    }

    return {passed: true, detail: firstLine || `'${invocation}' exited with code 0`}
  }
}

async function runCheck(name: string, check: () => Promise<{passed: boolean; detail: string}>): Promise<VerificationCheck> {
  try {
    const {passed, detail} = await check()
    return {name, passed, detail}
  } catch (error) {
    return {name, passed: false, detail: error instanceof Error ? error.message : String(error)}
  }
}
