import {readFile} from 'node:fs/promises'
import {extname} from 'node:path'
import {parse as parseToml} from 'smol-toml'
import {parse as parseYaml} from 'yaml'
import {UnknownVariantError, ValidationError} from './errors.js'
import {
  buildStrategies,
  latestVersion,
  maxTimeoutSec,
  sourceKinds,
  versionSourceTypes,
  type ProbeSpec,
  type RegistryEntry,
  type VersionSource
} from './types.js'

export type RegistryFormat = 'yaml' | 'json' | 'toml'

/** A registry file path, raw file content, or an already parsed document. */
export type RegistrySource = string | {content: string; format: RegistryFormat} | {document: unknown}

/**
 * Name-keyed set of registry entries.
 * Entries are immutable once registered and keep their registration order.
 */
export class Registry {
  private readonly byName = new Map<string, RegistryEntry>()

  register(entry: RegistryEntry): void {
    const existing = this.byName.get(entry.name)
    if (existing) {
      const conflict = existing.kind === entry.kind
        ? ''
        : ` (registered as ${existing.kind}, redeclared as ${entry.kind})`
      throw new ValidationError(`Duplicate registry entry '${entry.name}'${conflict}`)
    }

    this.byName.set(entry.name, Object.freeze({...entry}))
  }

  has(name: string): boolean {
    return this.byName.has(name)
  }

  get(name: string): RegistryEntry | undefined {
    return this.byName.get(name)
  }

  entries(): RegistryEntry[] {
    return [...this.byName.values()]
  }

  get size(): number {
    return this.byName.size
  }
}

export async function loadRegistry(source: RegistrySource): Promise<RegistryEntry[]> {
  if (typeof source === 'string') {
    const content = await readRegistryFile(source)
    return parseRegistry(parseRegistryFile(content, formatFromPath(source)))
  }

  if ('document' in source) {
    return parseRegistry(source.document)
  }

  return parseRegistry(parseRegistryFile(source.content, source.format))
}

async function readRegistryFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ValidationError(`Cannot read registry file ${filePath}: ${reason}`, {cause: error})
  }
}

export function formatFromPath(filePath: string): RegistryFormat {
  switch (extname(filePath).toLowerCase()) {
    case '.json': {
      return 'json'
    }

    case '.toml': {
      return 'toml'
    }

    default: {
      return 'yaml'
    }
  }
}

export function parseRegistryFile(content: string, format: RegistryFormat): unknown {
  try {
    switch (format) {
      case 'json': {
        return JSON.parse(content)
      }

      case 'toml': {
        return parseToml(content)
      }

      case 'yaml': {
        return parseYaml(content)
      }
    }
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ValidationError(`Invalid registry file: ${reason}`, {cause: error})
  }
}

/**
 * Validate a parsed registry document.
 *
 * Accepts a mapping of name to entry, or an array of entries carrying their
 * own `name`.
 */
export function parseRegistry(document: unknown): RegistryEntry[] {
  const registry = new Registry()

  if (Array.isArray(document)) {
    for (const [i, raw] of document.entries()) {
      if (!isRecord(raw)) {
        throw new ValidationError(`Invalid registry entry at index ${i}: must be an object`)
      }

      registry.register(parseEntry(raw.name, raw, `entry at index ${i}`))
    }

    return registry.entries()
  }

  if (!isRecord(document)) {
    throw new ValidationError('Invalid registry: expected a mapping of targets or a list of entries')
  }

  for (const [key, raw] of Object.entries(document)) {
    if (!isRecord(raw)) {
      throw new ValidationError(`Invalid registry entry '${key}': must be an object`)
    }

    if (raw.name !== undefined && raw.name !== key) {
      throw new ValidationError(`Invalid registry entry '${key}': name '${String(raw.name)}' does not match its key`)
    }

    registry.register(parseEntry(key, raw, `entry '${key}'`))
  }

  return registry.entries()
}

function parseEntry(name: unknown, raw: Record<string, unknown>, context: string): RegistryEntry {
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ValidationError(`Invalid registry ${context}: name is required`)
  }

  validateIdentifier(name)
  const where = `Target ${name}`

  const kind = requireString(raw.kind, 'kind', where)
  if (!isOneOf(kind, sourceKinds)) {
    throw new UnknownVariantError('kind', kind, sourceKinds, where)
  }

  const version = requireVersion(raw.version, where)

  const buildStrategy = requireString(raw.buildStrategy, 'buildStrategy', where)
  if (!isOneOf(buildStrategy, buildStrategies)) {
    throw new UnknownVariantError('buildStrategy', buildStrategy, buildStrategies, where)
  }

  const entry: RegistryEntry = {name, kind, version, buildStrategy}

  if (raw.sizeBudgetBytes !== undefined) {
    entry.sizeBudgetBytes = requirePositiveInteger(raw.sizeBudgetBytes, 'sizeBudgetBytes', where)
  }

  if (raw.source !== undefined) {
    entry.source = parseSource(raw.source, where)
  }

  if (version === latestVersion && !entry.source) {
    throw new ValidationError(`${where}: version "latest" requires a source to resolve it`)
  }

  if (raw.context !== undefined) {
    entry.context = requireRelativePath(raw.context, 'context', where)
  }

  if (raw.containerfile !== undefined) {
    entry.containerfile = requireRelativePath(raw.containerfile, 'containerfile', where)
  }

  if (raw.buildArgs !== undefined) {
    entry.buildArgs = parseBuildArgs(raw.buildArgs, where)
  }

  if (raw.runtimeBase !== undefined) {
    entry.runtimeBase = requireString(raw.runtimeBase, 'runtimeBase', where)
  }

  if (raw.probe !== undefined) {
    entry.probe = parseProbe(raw.probe, where)
  }

  if (raw.timeoutSec !== undefined) {
    if (typeof raw.timeoutSec !== 'number' || !Number.isFinite(raw.timeoutSec) || raw.timeoutSec <= 0 || raw.timeoutSec > maxTimeoutSec) {
      throw new ValidationError(`${where}: timeoutSec must be a positive number of seconds, at most ${maxTimeoutSec}`)
    }

    entry.timeoutSec = raw.timeoutSec
  }

  return entry
}

function parseSource(raw: unknown, where: string): VersionSource {
  if (!isRecord(raw)) {
    throw new ValidationError(`${where}: source must be an object`)
  }

  const type = requireString(raw.type, 'source.type', where)
  if (!isOneOf(type, versionSourceTypes)) {
    throw new UnknownVariantError('source.type', type, versionSourceTypes, where)
  }

  const source: VersionSource = {type}
  switch (type) {
    case 'github': {
      const repo = requireString(raw.repo, 'source.repo', where)
      if (!/^[\w.-]+\/[\w.-]+$/.test(repo)) {
        throw new ValidationError(`${where}: source.repo '${repo}' must be in owner/name form`)
      }

      source.repo = repo
      break
    }

    case 'custom': {
      source.command = requireString(raw.command, 'source.command', where)
      break
    }

    default: {
      source.package = requireString(raw.package, 'source.package', where)
    }
  }

  if (raw.stripV !== undefined) {
    if (typeof raw.stripV !== 'boolean') {
      throw new ValidationError(`${where}: source.stripV must be a boolean`)
    }

    source.stripV = raw.stripV
  }

  return source
}

function parseProbe(raw: unknown, where: string): ProbeSpec {
  if (!isRecord(raw)) {
    throw new ValidationError(`${where}: probe must be an object`)
  }

  const probe: ProbeSpec = {}
  if (raw.args !== undefined) {
    if (!Array.isArray(raw.args) || !raw.args.every(arg => typeof arg === 'string')) {
      throw new ValidationError(`${where}: probe.args must be an array of strings`)
    }

    probe.args = raw.args.map(String)
  }

  if (raw.entrypoint !== undefined) {
    probe.entrypoint = requireString(raw.entrypoint, 'probe.entrypoint', where)
  }

  if (raw.expectVersion !== undefined) {
    if (typeof raw.expectVersion !== 'boolean') {
      throw new ValidationError(`${where}: probe.expectVersion must be a boolean`)
    }

    probe.expectVersion = raw.expectVersion
  }

  return probe
}

function parseBuildArgs(raw: unknown, where: string): Record<string, string> {
  if (!isRecord(raw)) {
    throw new ValidationError(`${where}: buildArgs must be a mapping`)
  }

  const args: Record<string, string> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (!/^[A-Za-z_]\w*$/.test(key)) {
      throw new ValidationError(`${where}: build argument name '${key}' is invalid`)
    }

    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ValidationError(`${where}: build argument '${key}' must be a string`)
    }

    args[key] = String(value)
  }

  return args
}

function requireString(value: unknown, field: string, where: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${where}: ${field} is required and must be a non-empty string`)
  }

  return value
}

function requireVersion(value: unknown, where: string): string {
  // YAML and TOML read an unquoted `1.10` as the number 1.1.
  if (typeof value === 'number') {
    throw new ValidationError(`${where}: version must be a quoted string, got the number ${value}`)
  }

  return requireString(value, 'version', where)
}

function requirePositiveInteger(value: unknown, field: string, where: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${where}: ${field} must be a positive integer`)
  }

  return value
}

function requireRelativePath(value: unknown, field: string, where: string): string {
  const path = requireString(value, field, where)
  if (path.startsWith('/')) {
    throw new ValidationError(`${where}: ${field} '${path}' must be a relative path`)
  }

  if (path.split('/').includes('..')) {
    throw new ValidationError(`${where}: ${field} '${path}' must not contain '..'`)
  }

  return path
}

function validateIdentifier(name: string): void {
  // Names become image repositories, which are lower case.
  if (!/^[a-z\d_.-]+$/.test(name)) {
    throw new ValidationError(`Invalid target name '${name}': must contain only lowercase letters, digits, '.', '_' and '-'`)
  }

  if (name.includes('..')) {
    throw new ValidationError(`Invalid target name '${name}': cannot contain '..'`)
  }
}

function isOneOf<T extends string>(value: string, allowed: readonly T[]): value is T {
  return allowed.some(candidate => candidate === value)
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
