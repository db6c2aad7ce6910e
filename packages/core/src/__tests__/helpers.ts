import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {ImageBuilder, type OnLogLine} from '../engine/builder.js'
import type {BuildImageRequest, BuildImageResult, ImageInfo, ProbeRequest, ProbeResult} from '../engine/types.js'
import type {Reporter, RunEvent} from '../reporter.js'
import type {RegistryEntry, VersionSource} from '../types.js'
import type {VersionResolver} from '../version-resolver.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'imagewright-test-'))
}

/**
 * Silent reporter: every event is dropped.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: RunEvent[]} {
  const events: RunEvent[] = []
  const reporter: Reporter = {
    emit(event: RunEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

export function entry(overrides: Partial<RegistryEntry> & {name: string}): RegistryEntry {
  return {
    kind: 'module-install',
    version: '1.0.0',
    buildStrategy: 'multi-stage-static',
    ...overrides
  }
}

/** Scripted behaviour of one image in the fake backend. */
export type FakeImage = {
  /** Exit code of the build (default: 0). */
  exitCode?: number;
  /** Build duration in ms (default: 0). */
  delayMs?: number;
  /** Never finishes until the request signal aborts. */
  hang?: boolean;
  /** Thrown by build(). */
  throws?: Error;
  logs?: string[];
  sizeBytes?: number;
  probe?: Partial<ProbeResult>;
}

/**
 * In-process image backend. Behaviour is scripted per image tag prefix
 * (target name), and every call is recorded.
 */
export class FakeImageBuilder extends ImageBuilder {
  readonly builds: BuildImageRequest[] = []
  readonly probes: ProbeRequest[] = []
  readonly started: string[] = []
  readonly finished: string[] = []
  checked = 0
  killed = 0
  inFlight = 0
  maxInFlight = 0

  private readonly built = new Map<string, ImageInfo>()

  constructor(private readonly images: Record<string, FakeImage> = {}) {
    super()
  }

  async check(): Promise<void> {
    this.checked++
  }

  async build(request: BuildImageRequest, onLogLine: OnLogLine): Promise<BuildImageResult> {
    const name = targetOf(request.tag)
    const image = this.images[name] ?? {}
    this.builds.push(request)
    this.started.push(name)
    this.inFlight++
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    const startedAt = new Date()

    try {
      if (image.throws) {
        throw image.throws
      }

      for (const line of image.logs ?? []) {
        onLogLine({stream: 'stdout', line})
      }

      const aborted = await waitFor(image, request.signal)
      const exitCode = aborted ? 143 : (image.exitCode ?? 0)
      if (exitCode === 0) {
        this.built.set(request.tag, {id: `sha256:${name}`, sizeBytes: image.sizeBytes ?? 1024})
      }

      return {exitCode, startedAt, finishedAt: new Date(startedAt.getTime() + (image.delayMs ?? 0)), aborted}
    } finally {
      this.inFlight--
      this.finished.push(name)
    }
  }

  async inspect(imageRef: string): Promise<ImageInfo | undefined> {
    return this.built.get(imageRef)
  }

  async probe(request: ProbeRequest): Promise<ProbeResult> {
    this.probes.push(request)
    const image = this.images[targetOf(request.image)] ?? {}
    return {exitCode: 0, stdout: 'ok', stderr: '', timedOut: false, ...image.probe}
  }

  async killRunningBuilds(): Promise<void> {
    this.killed++
  }
}

function targetOf(tag: string): string {
  const name = tag.slice(tag.lastIndexOf('/') + 1)
  return name.split(':')[0]
}

async function waitFor(image: FakeImage, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return true
  }

  if (!image.hang && !image.delayMs) {
    return false
  }

  return new Promise(resolve => {
    const timer = image.hang
      ? undefined
      : setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve(false)
      }, image.delayMs)
    const onAbort = () => {
      clearTimeout(timer)
      resolve(true)
    }

    signal?.addEventListener('abort', onAbort, {once: true})
  })
}

/**
 * Resolver answering from a fixed table keyed by `package` or `repo`.
 * Missing keys fail like an unreachable index.
 */
export class FakeVersionResolver implements VersionResolver {
  readonly calls: VersionSource[] = []

  constructor(private readonly versions: Record<string, string>) {}

  async resolve(source: VersionSource): Promise<string> {
    this.calls.push(source)
    const key = source.package ?? source.repo ?? source.command ?? ''
    const version = this.versions[key]
    if (version === undefined) {
      throw new Error(`${key}: index unreachable`)
    }

    return version
  }
}
