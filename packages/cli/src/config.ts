import {readFile} from 'node:fs/promises'
import {basename, join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigError, isRecord, maxTimeoutSec, type ImagewrightConfig} from '@imagewright/core'

export const configFilename = '.imagewright.yml'

/**
 * Loads the project-level `.imagewright.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<ImagewrightConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFilename), 'utf8')
  } catch (error: unknown) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ConfigError(`Invalid ${configFilename}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  return validateConfig(parsed)
}

/**
 * Files whose change rebuilds every target: the configured list, or else the
 * registry file and `.imagewright.yml`.
 */
export function globalTriggersFor(config: ImagewrightConfig, registryFile: string): string[] {
  return config.globalTriggers ?? [basename(registryFile), configFilename]
}

export function validateConfig(raw: unknown): ImagewrightConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${configFilename} must contain a mapping`)
  }

  const config: ImagewrightConfig = {}

  if (raw.registry !== undefined) {
    if (typeof raw.registry !== 'string' || raw.registry === '') {
      throw new ConfigError(`${configFilename}: registry must be a path`)
    }

    config.registry = raw.registry
  }

  if (raw.concurrency !== undefined) {
    if (typeof raw.concurrency !== 'number' || !Number.isInteger(raw.concurrency) || raw.concurrency < 1) {
      throw new ConfigError(`${configFilename}: concurrency must be a positive integer`)
    }

    config.concurrency = raw.concurrency
  }

  if (raw.timeoutSec !== undefined) {
    config.timeoutSec = positiveNumber(raw.timeoutSec, 'timeoutSec')
  }

  if (raw.probeTimeoutSec !== undefined) {
    config.probeTimeoutSec = positiveNumber(raw.probeTimeoutSec, 'probeTimeoutSec')
  }

  if (raw.imagePrefix !== undefined) {
    if (typeof raw.imagePrefix !== 'string') {
      throw new ConfigError(`${configFilename}: imagePrefix must be a string`)
    }

    config.imagePrefix = raw.imagePrefix
  }

  if (raw.noCache !== undefined) {
    if (typeof raw.noCache !== 'boolean') {
      throw new ConfigError(`${configFilename}: noCache must be a boolean`)
    }

    config.noCache = raw.noCache
  }

  if (raw.globalTriggers !== undefined) {
    const triggers = raw.globalTriggers
    if (!Array.isArray(triggers) || !triggers.every(trigger => typeof trigger === 'string')) {
      throw new ConfigError(`${configFilename}: globalTriggers must be a list of paths`)
    }

    config.globalTriggers = triggers.map(String)
  }

  return config
}

function positiveNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0 || value > maxTimeoutSec) {
    throw new ConfigError(`${configFilename}: ${field} must be a positive number of seconds, at most ${maxTimeoutSec}`)
  }

  return value
}
