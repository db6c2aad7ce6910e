import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import {InvalidArgumentError, type Command} from 'commander'
import {ConfigError} from '@imagewright/core'

export type GlobalOptions = {
  registry?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

const registryFilenames = ['registry.yml', 'registry.yaml', 'registry.json', 'registry.toml']

/**
 * Resolve the registry file: an explicit file, or the first registry file
 * found in a directory (default: current directory).
 */
export async function resolveRegistryFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  try {
    const stats = await stat(target)
    if (stats.isFile()) {
      return target
    }
  } catch (error) {
    throw new ConfigError(`Path does not exist: ${target}`, {cause: error})
  }

  for (const filename of registryFilenames) {
    const candidate = join(target, filename)
    if (await fileExists(candidate)) {
      return candidate
    }
  }

  throw new ConfigError(
    `No registry file found in ${target}. Expected one of: ${registryFilenames.join(', ')}`
  )
}

async function fileExists(path: string): Promise<boolean> {
  return access(path).then(() => true, () => false)
}

/** Parse a positive number option (commander argParser). */
export function parsePositive(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive number, got '${value}'`)
  }

  return parsed
}

export function parsePositiveInteger(value: string): number {
  const parsed = parsePositive(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`)
  }

  return parsed
}
