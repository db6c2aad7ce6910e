import process from 'node:process'
import {randomUUID} from 'node:crypto'
import {join} from 'node:path'
import {execa} from 'execa'
import {DockerNotAvailableError} from '../errors.js'
import type {BuildImageRequest, BuildImageResult, ImageInfo, ProbeRequest, ProbeResult} from './types.js'
import {ImageBuilder, type OnLogLine} from './builder.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, BUILDKIT_PROGRESS and DOCKER_* are passed through.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_') || key === 'BUILDKIT_PROGRESS')) {
      env[key] = value
    }
  }

  return env
}

/**
 * Arguments of `docker build` for a request.
 */
export function dockerBuildArgs(request: BuildImageRequest): string[] {
  const args = [
    'build',
    '--file',
    join(request.contextDir, request.containerfile),
    '--tag',
    request.tag,
    '--progress',
    'plain',
    '--label',
    'imagewright=true'
  ]

  for (const [key, value] of Object.entries(request.labels ?? {})) {
    args.push('--label', `${key}=${value}`)
  }

  for (const [key, value] of Object.entries(request.buildArgs)) {
    args.push('--build-arg', `${key}=${value}`)
  }

  if (request.noCache) {
    args.push('--no-cache')
  }

  args.push(request.contextDir)
  return args
}

/**
 * Arguments of `docker run` for a version probe. The container never gets
 * network access.
 */
export function dockerProbeArgs(name: string, request: ProbeRequest): string[] {
  const args = ['run', '--rm', '--name', name, '--network', 'none', '--label', 'imagewright=true']
  if (request.entrypoint) {
    args.push('--entrypoint', request.entrypoint)
  }

  args.push(request.image, ...request.args)
  return args
}

export function parseInspectOutput(stdout: string): ImageInfo | undefined {
  const [id, size] = stdout.trim().split(/\s+/)
  const sizeBytes = Number(size)
  if (!id || !Number.isFinite(sizeBytes)) {
    return undefined
  }

  return {id, sizeBytes}
}

export class DockerCliBuilder extends ImageBuilder {
  private readonly env = dockerCliEnv()
  private readonly running = new Set<() => void>()

  async check(): Promise<void> {
    try {
      await execa('docker', ['--version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async build(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult> {
    const startedAt = new Date()

    try {
      const proc = execa('docker', dockerBuildArgs(request), {
        env: this.env,
        extendEnv: false,
        reject: false,
        cancelSignal: request.signal,
        forceKillAfterDelay: 10_000
      })

      const kill = () => {
        proc.kill('SIGKILL')
      }

      this.running.add(kill)
      try {
        await this.streamLogs(proc, onLogLine)
        const result = await proc
        return {
          exitCode: result.exitCode ?? 1,
          startedAt,
          finishedAt: new Date(),
          aborted: result.isCanceled,
          error: result.exitCode === undefined && !result.isCanceled ? 'docker build was terminated' : undefined
        }
      } finally {
        this.running.delete(kill)
      }
    } catch (error) {
      return {
        exitCode: 1,
        startedAt,
        finishedAt: new Date(),
        aborted: request.signal?.aborted,
        error: error instanceof Error ? error.message : String(error)
      }
    }
  }

  async inspect(imageRef: string): Promise<ImageInfo | undefined> {
    const result = await execa('docker', ['image', 'inspect', '--format', '{{.Id}} {{.Size}}', imageRef], {
      env: this.env,
      extendEnv: false,
      reject: false
    })

    if (result.exitCode !== 0) {
      return undefined
    }

    return parseInspectOutput(result.stdout)
  }

  async probe(request: ProbeRequest): Promise<ProbeResult> {
    const name = `imagewright-probe-${randomUUID().slice(0, 8)}`

    try {
      const result = await execa('docker', dockerProbeArgs(name, request), {
        env: this.env,
        extendEnv: false,
        reject: false,
        timeout: request.timeoutSec * 1000
      })

      return {
        exitCode: result.exitCode ?? 1,
        stdout: result.stdout,
        stderr: result.stderr,
        timedOut: result.timedOut
      }
    } finally {
      // Killing the CLI does not stop the container
      await execa('docker', ['rm', '-f', name], {env: this.env, extendEnv: false, reject: false})
    }
  }

  async killRunningBuilds(): Promise<void> {
    for (const kill of this.running) {
      kill()
    }

    this.running.clear()
  }

  /**
   * Stream stdout/stderr from a subprocess via iterables.
   */
  private async streamLogs(
    proc: {iterable(options: {from: 'stdout' | 'stderr'}): AsyncIterable<unknown>},
    onLogLine: OnLogLine
  ): Promise<void> {
    const stdoutDone = (async () => {
      for await (const line of proc.iterable({from: 'stdout'})) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })()

    const stderrDone = (async () => {
      for await (const line of proc.iterable({from: 'stderr'})) {
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()

    await Promise.all([stdoutDone, stderrDone])
  }
}
