import {execa} from 'execa'
import type {RegistryEntry} from './types.js'

export type ChangedTargetsOptions = {
  /** Path prefixes that make every target changed. */
  globalTriggers?: string[];
}

/**
 * Targets whose build context contains a changed file, in registry order.
 * A change under a global trigger selects every target.
 */
export function selectChangedTargets(
  entries: RegistryEntry[],
  changedFiles: string[],
  options: ChangedTargetsOptions = {}
): string[] {
  const files = changedFiles.map(file => file.trim().replace(/^\.\//, '')).filter(Boolean)
  const triggers = options.globalTriggers ?? []

  if (files.some(file => triggers.some(trigger => file === trigger || file.startsWith(trigger)))) {
    return entries.map(entry => entry.name)
  }

  return entries
    .filter(entry => {
      const context = (entry.context ?? entry.name).replace(/\/+$/, '')
      return files.some(file => file.startsWith(`${context}/`))
    })
    .map(entry => entry.name)
}

export type ChangedFilesOptions = {
  /** Compare against the merge base (`base...head`). */
  tripleDot?: boolean;
  cwd?: string;
}

/**
 * Files changed between two revisions under `cwd`, relative to it, per
 * `git diff --name-only --relative`.
 * Returns an empty list when git fails (unknown revision, not a repository).
 */
export async function listChangedFiles(base: string, head = 'HEAD', options: ChangedFilesOptions = {}): Promise<string[]> {
  const range = options.tripleDot ? [`${base}...${head}`] : [base, head]
  const result = await execa('git', ['diff', '--name-only', '--relative', ...range], {cwd: options.cwd, reject: false})
  if (result.exitCode !== 0) {
    return []
  }

  return result.stdout.split('\n').filter(Boolean)
}
