import {join, resolve} from 'node:path'
import {deburr} from 'lodash-es'
import ignore from 'ignore'
import {DuplicateTargetError, EmptySelectionError, SelectionError, UnknownTargetError} from './errors.js'
import type {VersionResolver} from './version-resolver.js'
import {toResolutionError} from './version-resolver.js'
import {transitionTask} from './task-state.js'
import {latestVersion, type BuildTask, type RegistryEntry, type Selector, type StrategyProfile} from './types.js'

export const defaultContainerfile = 'ContainerFile'
export const defaultImagePrefix = 'imagewright/'

const defaultRuntimeBases: Record<StrategyProfile['baseImageClass'], string | undefined> = {
  static: 'gcr.io/distroless/static-debian12',
  libc: 'gcr.io/distroless/cc-debian12',
  runtime: undefined
}

export type PlanOptions = {
  resolver: VersionResolver;
  /** Directory build contexts are resolved against (default: cwd). */
  registryRoot?: string;
  imagePrefix?: string;
  signal?: AbortSignal;
}

/**
 * Parse a `--targets` value: "all", a glob-style pattern, or a
 * comma-separated list of names.
 */
export function parseSelector(text: string | undefined): Selector {
  const value = text?.trim() ?? 'all'
  if (value === '' || value === 'all') {
    return {type: 'all'}
  }

  if (/[*?[\]!]/.test(value)) {
    return {type: 'pattern', pattern: value}
  }

  return {type: 'names', names: value.split(',').map(name => name.trim()).filter(Boolean)}
}

/**
 * Pick the entries a selector asks for.
 * Explicit names keep the requested order; "all" and patterns keep registry order.
 */
export function selectEntries(entries: RegistryEntry[], selector: Selector): RegistryEntry[] {
  switch (selector.type) {
    case 'all': {
      return [...entries]
    }

    case 'pattern': {
      const matcher = ignore().add(selector.pattern)
      const selected = entries.filter(entry => matcher.ignores(entry.name))
      if (selected.length === 0) {
        throw new EmptySelectionError(selector.pattern)
      }

      return selected
    }

    case 'names': {
      if (selector.names.length === 0) {
        throw new SelectionError('EMPTY_SELECTION', 'No target names requested')
      }

      const seen = new Set<string>()
      const duplicates = new Set<string>()
      for (const name of selector.names) {
        if (seen.has(name)) {
          duplicates.add(name)
        }

        seen.add(name)
      }

      if (duplicates.size > 0) {
        throw new DuplicateTargetError([...duplicates])
      }

      const byName = new Map(entries.map(entry => [entry.name, entry]))
      const unknown = selector.names.filter(name => !byName.has(name))
      if (unknown.length > 0) {
        throw new UnknownTargetError(unknown)
      }

      return selector.names.flatMap(name => {
        const entry = byName.get(name)
        return entry ? [entry] : []
      })
    }
  }
}

export function resolveStrategy(entry: RegistryEntry): StrategyProfile {
  const baseImageClass = entry.buildStrategy === 'multi-stage-static'
    ? 'static'
    : (entry.buildStrategy === 'multi-stage-dynamic-libc' ? 'libc' : 'runtime')

  const runtimeBase = entry.runtimeBase ?? defaultRuntimeBases[baseImageClass]
  return runtimeBase
    ? {strategy: entry.buildStrategy, baseImageClass, runtimeBase}
    : {strategy: entry.buildStrategy, baseImageClass}
}

/** Docker tags allow [A-Za-z0-9_.-], at most 128 characters, no leading '.' or '-'. */
export function toImageTag(prefix: string, name: string, version: string): string {
  const tag = deburr(version)
    .replaceAll(/[^\w.-]/g, '-')
    .replace(/^[.-]+/, '')
    .slice(0, 128)
  return `${prefix}${name.toLowerCase()}:${tag || 'untagged'}`
}

/**
 * Turn a selection into an ordered build plan.
 *
 * Selection problems (unknown or duplicate names) fail the whole call before
 * any task exists. A version that cannot be resolved only fails its own task,
 * which ends up PlanFailed.
 */
export async function plan(entries: RegistryEntry[], selector: Selector, options: PlanOptions): Promise<BuildTask[]> {
  const selected = selectEntries(entries, selector)
  const registryRoot = resolve(options.registryRoot ?? '.')
  const imagePrefix = options.imagePrefix ?? defaultImagePrefix

  const tasks = selected.map((entry, index): BuildTask => ({
    index,
    name: entry.name,
    requestedVersion: entry.version,
    status: 'Pending',
    strategy: resolveStrategy(entry),
    contextDir: join(registryRoot, entry.context ?? entry.name),
    containerfile: entry.containerfile ?? defaultContainerfile,
    buildArgs: {}
  }))

  await Promise.all(tasks.map(async task => {
    const entry = selected[task.index]
    let version: string
    try {
      version = await resolveVersion(entry, options.resolver, options.signal)
    } catch (error) {
      const failure = toResolutionError(error)
      transitionTask(task, 'PlanFailed', {stage: 'plan', code: failure.code, message: `${entry.name}: ${failure.message}`})
      return
    }

    task.resolvedVersion = version
    task.imageTag = toImageTag(imagePrefix, entry.name, version)
    task.buildArgs = buildArgsFor(entry, task.strategy, version)
  }))

  return tasks
}

async function resolveVersion(entry: RegistryEntry, resolver: VersionResolver, signal?: AbortSignal): Promise<string> {
  if (entry.version !== latestVersion) {
    return entry.version
  }

  if (!entry.source) {
    throw toResolutionError(`no version source declared for ${entry.name}`)
  }

  return resolver.resolve(entry.source, signal)
}

function buildArgsFor(entry: RegistryEntry, strategy: StrategyProfile, version: string): Record<string, string> {
  const args: Record<string, string> = {
    VERSION: version,
    BUILD_STRATEGY: strategy.strategy
  }
  if (strategy.runtimeBase) {
    args.RUNTIME_BASE = strategy.runtimeBase
  }

  return {...args, ...entry.buildArgs}
}
