import {dirname} from 'node:path'
import process from 'node:process'
import type {Command} from 'commander'
import {listChangedFiles, loadRegistry, selectChangedTargets} from '@imagewright/core'
import {globalTriggersFor, loadConfig} from '../config.js'
import {getGlobalOptions, resolveRegistryFile} from '../utils.js'

export function registerChangedCommand(program: Command): void {
  program
    .command('changed')
    .description('List targets whose build context changed between two git revisions')
    .argument('<base>', 'Base revision')
    .argument('[head]', 'Head revision', 'HEAD')
    .option('--triple-dot', 'Compare against the merge base of base and head')
    .action(async (base: string, head: string, options: {tripleDot?: boolean}, cmd: Command) => {
      const {registry} = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd())
      const registryFile = await resolveRegistryFile(registry ?? config.registry)
      const entries = await loadRegistry(registryFile)

      const changedFiles = await listChangedFiles(base, head, {tripleDot: options.tripleDot, cwd: dirname(registryFile)})
      const names = selectChangedTargets(entries, changedFiles, {globalTriggers: globalTriggersFor(config, registryFile)})
      console.log(JSON.stringify(names))
    })
}
