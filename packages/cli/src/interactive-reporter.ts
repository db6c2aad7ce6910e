import process from 'node:process'
import {createLogUpdate} from 'log-update'
import chalk from 'chalk'
import {type Reporter, type RunEvent, type TargetBuiltEvent, type TargetBuildFailedEvent, formatDuration, formatSize} from '@imagewright/core'

type TargetStatus = 'pending' | 'building' | 'verifying' | 'verified' | 'failed' | 'plan-failed'

type TargetDisplayState = {
  displayName: string;
  status: TargetStatus;
  detail?: string;
}

const spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏']

/**
 * Reporter with interactive terminal UI using log-update for a live
 * per-target display. Suitable for local development and manual runs.
 */
export class InteractiveReporter implements Reporter {
  private static get maxLogLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly logUpdate = createLogUpdate(process.stderr)
  private readonly targets = new Map<string, TargetDisplayState>()
  private readonly logBuffers = new Map<string, string[]>()
  private frame = 0
  private timer: ReturnType<typeof setInterval> | undefined

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        console.error(chalk.bold(`\n▶ Building ${event.targets.length} image(s), concurrency ${event.concurrency}\n`))
        for (const target of event.targets) {
          this.targets.set(target.name, {displayName: `${target.name} ${chalk.gray(target.version)}`, status: 'pending'})
        }

        this.startRendering()
        break
      }

      case 'TARGET_PLAN_FAILED': {
        this.update(event.target.name, 'plan-failed', ` (${event.error})`)
        break
      }

      case 'TARGET_BUILDING': {
        this.update(event.target.name, 'building')
        break
      }

      case 'TARGET_LOG': {
        if (this.verbose) {
          const prefix = chalk.gray(`  [${event.target.name}]`)
          this.logUpdate.clear()
          console.error(`${prefix} ${event.line}`)
          this.render()
        }

        let buffer = this.logBuffers.get(event.target.name)
        if (!buffer) {
          buffer = []
          this.logBuffers.set(event.target.name, buffer)
        }

        buffer.push(event.line)
        if (buffer.length > InteractiveReporter.maxLogLines) {
          buffer.shift()
        }

        break
      }

      case 'TARGET_BUILT': {
        this.handleBuilt(event)
        break
      }

      case 'TARGET_BUILD_FAILED': {
        this.handleBuildFailed(event)
        break
      }

      case 'TARGET_VERIFYING': {
        const target = this.targets.get(event.target.name)
        if (target) {
          target.status = 'verifying'
        }

        break
      }

      case 'TARGET_VERIFIED': {
        const target = this.targets.get(event.target.name)
        if (target) {
          target.status = 'verified'
        }

        this.logBuffers.delete(event.target.name)
        break
      }

      case 'TARGET_VERIFICATION_FAILED': {
        const failed = event.checks.filter(check => !check.passed).map(check => check.name)
        this.update(event.target.name, 'failed', ` (${failed.join(', ')} failed)`)
        this.logBuffers.delete(event.target.name)
        break
      }

      case 'RUN_CANCELLED': {
        this.logUpdate.clear()
        console.error(chalk.yellow('  Cancelling: no new builds will start'))
        this.render()
        break
      }

      case 'RUN_FINISHED': {
        this.stopRendering()
        this.printFailedLogs()
        if (event.exitCode === 0) {
          console.error(chalk.bold.green(`\n✓ ${event.summary.Verified} image(s) built and verified\n`))
        } else {
          console.error(chalk.bold.red('\n✗ Some images failed\n'))
        }

        break
      }
    }
  }

  private update(name: string, status: TargetStatus, detail?: string): void {
    const target = this.targets.get(name)
    if (target) {
      target.status = status
      target.detail = detail
    } else {
      this.targets.set(name, {displayName: name, status, detail})
    }
  }

  private render(): void {
    const lines: string[] = []
    for (const target of this.targets.values()) {
      lines.push(`  ${this.symbolFor(target)} ${this.textFor(target)}`)
    }

    this.logUpdate(lines.join('\n'))
    this.frame++
  }

  private symbolFor(target: TargetDisplayState): string {
    switch (target.status) {
      case 'pending': {
        return chalk.gray('○')
      }

      case 'building':
      case 'verifying': {
        return chalk.cyan(spinnerFrames[this.frame % spinnerFrames.length])
      }

      case 'verified': {
        return chalk.green('✓')
      }

      case 'failed':
      case 'plan-failed': {
        return chalk.red('✗')
      }
    }
  }

  private textFor(target: TargetDisplayState): string {
    const suffix = target.detail ?? ''
    switch (target.status) {
      case 'pending': {
        return chalk.gray(target.displayName)
      }

      case 'building': {
        return target.displayName
      }

      case 'verifying': {
        return `${target.displayName}${suffix} ${chalk.gray('verifying')}`
      }

      case 'verified': {
        return chalk.green(`${target.displayName}${suffix}`)
      }

      case 'failed':
      case 'plan-failed': {
        return chalk.red(`${target.displayName}${suffix}`)
      }
    }
  }

  private startRendering(): void {
    if (!this.timer) {
      this.render()
      this.timer = setInterval(() => {
        this.render()
      }, 80)
    }
  }

  private stopRendering(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }

    this.render()
    this.logUpdate.done()
  }

  private handleBuilt(event: TargetBuiltEvent): void {
    const target = this.targets.get(event.target.name)
    if (target) {
      const details = [formatDuration(event.durationMs)]
      if (typeof event.sizeBytes === 'number') {
        details.push(formatSize(event.sizeBytes))
      }

      target.detail = ` (${details.join(', ')})`
    }
  }

  private handleBuildFailed(event: TargetBuildFailedEvent): void {
    const detail = event.reason === 'NonZeroExit' && event.exitCode !== undefined
      ? ` (exit ${event.exitCode})`
      : ` (${event.reason})`
    this.update(event.target.name, 'failed', detail)
  }

  private printFailedLogs(): void {
    for (const [name, target] of this.targets) {
      if (target.status === 'failed') {
        const lines = this.logBuffers.get(name)
        if (lines?.length) {
          console.error(chalk.red(`  ── ${name} build output ──`))
          for (const line of lines) {
            console.error(chalk.red(`  ${line}`))
          }
        }
      }
    }
  }
}
