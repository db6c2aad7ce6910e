import process from 'node:process'
import {execa} from 'execa'
import {VersionResolutionError} from './errors.js'
import {isRecord} from './registry.js'
import type {RegistryEntry, VersionSource} from './types.js'

/**
 * Looks up the latest upstream version of a target.
 * Implementations throw VersionResolutionError when the index is unreachable
 * or returns no version.
 */
export type VersionResolver = {
  resolve(source: VersionSource, signal?: AbortSignal): Promise<string>;
}

export type UpstreamVersionResolverOptions = {
  fetch?: typeof fetch;
  /** Per-request timeout (default: 20s). */
  timeoutMs?: number;
  /** Token sent to the GitHub API (default: $GITHUB_TOKEN). */
  githubToken?: string;
}

/**
 * Resolves versions against the public release indexes
 * (npm, PyPI, GitHub releases, Go module proxy, crates.io) or a custom command.
 */
export class UpstreamVersionResolver implements VersionResolver {
  private readonly fetch: typeof fetch
  private readonly timeoutMs: number
  private readonly githubToken: string | undefined

  constructor(options: UpstreamVersionResolverOptions = {}) {
    this.fetch = options.fetch ?? globalThis.fetch
    this.timeoutMs = options.timeoutMs ?? 20_000
    this.githubToken = options.githubToken ?? process.env.GITHUB_TOKEN
  }

  async resolve(source: VersionSource, signal?: AbortSignal): Promise<string> {
    const raw = await this.lookup(source, signal)
    const version = source.stripV ? raw.replace(/^v/, '') : raw
    if (version.trim() === '') {
      throw new VersionResolutionError(`${describeSource(source)}: upstream returned an empty version`)
    }

    return version.trim()
  }

  private async lookup(source: VersionSource, signal?: AbortSignal): Promise<string> {
    switch (source.type) {
      case 'npm': {
        const body = await this.getJson(`https://registry.npmjs.org/${requireField(source, 'package')}/latest`, source, signal)
        return readString(body, ['version'], source)
      }

      case 'pypi': {
        const body = await this.getJson(`https://pypi.org/pypi/${requireField(source, 'package')}/json`, source, signal)
        return readString(body, ['info', 'version'], source)
      }

      case 'github': {
        const headers: Record<string, string> = {'User-Agent': 'imagewright'}
        if (this.githubToken) {
          headers.Authorization = `Bearer ${this.githubToken}`
        }

        const body = await this.getJson(`https://api.github.com/repos/${requireField(source, 'repo')}/releases/latest`, source, signal, headers)
        return readString(body, ['tag_name'], source)
      }

      case 'go': {
        const body = await this.getJson(`https://proxy.golang.org/${escapeModulePath(requireField(source, 'package'))}/@latest`, source, signal)
        return readString(body, ['Version'], source)
      }

      case 'crates': {
        const body = await this.getJson(`https://crates.io/api/v1/crates/${requireField(source, 'package')}`, source, signal, {'User-Agent': 'imagewright'})
        return readString(body, ['crate', 'max_stable_version'], source)
      }

      case 'custom': {
        return this.runCommand(requireField(source, 'command'), signal)
      }
    }
  }

  private async getJson(
    url: string,
    source: VersionSource,
    signal?: AbortSignal,
    headers?: Record<string, string>
  ): Promise<unknown> {
    const controller = new AbortController()
    const timer = setTimeout(() => {
      controller.abort()
    }, this.timeoutMs)
    const onAbort = () => {
      controller.abort()
    }

    signal?.addEventListener('abort', onAbort, {once: true})

    try {
      const response = await this.fetch(url, {headers, signal: controller.signal})
      if (!response.ok) {
        throw new VersionResolutionError(`${describeSource(source)}: ${url} returned HTTP ${response.status}`)
      }

      return await response.json()
    } catch (error) {
      if (error instanceof VersionResolutionError) {
        throw error
      }

      const reason = error instanceof Error ? error.message : String(error)
      throw new VersionResolutionError(`${describeSource(source)}: ${url} unreachable (${reason})`, {cause: error})
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  private async runCommand(command: string, signal?: AbortSignal): Promise<string> {
    try {
      const {stdout} = await execa(command, {
        shell: true,
        timeout: this.timeoutMs,
        cancelSignal: signal
      })
      return stdout.trim()
    } catch (error) {
      const stderr = error instanceof Error && 'stderr' in error ? String(error.stderr).trim() : ''
      const reason = stderr || (error instanceof Error ? error.message : String(error))
      throw new VersionResolutionError(`Command failed: ${reason}`, {cause: error})
    }
  }
}

export type LatestVersions = {
  versions: Map<string, string>;
  failures: Map<string, VersionResolutionError>;
}

/** Resolve the latest version of every entry that declares a source. */
export async function resolveLatestVersions(entries: RegistryEntry[], resolver: VersionResolver): Promise<LatestVersions> {
  const withSource = entries.filter(entry => entry.source !== undefined)
  const settled = await Promise.allSettled(withSource.map(async entry => entry.source ? resolver.resolve(entry.source) : ''))

  const versions = new Map<string, string>()
  const failures = new Map<string, VersionResolutionError>()
  for (const [i, result] of settled.entries()) {
    const {name} = withSource[i]
    if (result.status === 'fulfilled') {
      versions.set(name, result.value)
    } else {
      failures.set(name, toResolutionError(result.reason))
    }
  }

  return {versions, failures}
}

export function toResolutionError(error: unknown): VersionResolutionError {
  if (error instanceof VersionResolutionError) {
    return error
  }

  return new VersionResolutionError(error instanceof Error ? error.message : String(error), {cause: error})
}

/**
 * Escape a Go module path for the module proxy: every upper-case letter
 * becomes "!" followed by its lower-case form.
 */
export function escapeModulePath(modulePath: string): string {
  return modulePath.replaceAll(/[A-Z]/g, letter => `!${letter.toLowerCase()}`)
}

export function describeSource(source: VersionSource): string {
  return `${source.type}:${source.package ?? source.repo ?? source.command ?? '?'}`
}

function requireField(source: VersionSource, field: 'package' | 'repo' | 'command'): string {
  const value = source[field]
  if (!value) {
    throw new VersionResolutionError(`${source.type} source is missing "${field}"`)
  }

  return value
}

function readString(body: unknown, path: string[], source: VersionSource): string {
  let current: unknown = body
  for (const key of path) {
    current = isRecord(current) ? current[key] : undefined
  }

  if (typeof current !== 'string' || current === '') {
    throw new VersionResolutionError(`${describeSource(source)}: response has no ${path.join('.')}`)
  }

  return current
}
