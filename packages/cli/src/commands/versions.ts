import process from 'node:process'
import type {Command} from 'commander'
import {UpstreamVersionResolver, describeSource, loadRegistry, logger, resolveLatestVersions} from '@imagewright/core'
import {loadConfig} from '../config.js'
import {getGlobalOptions, resolveRegistryFile} from '../utils.js'

export function registerVersionsCommand(program: Command): void {
  program
    .command('versions')
    .description('Resolve the latest upstream version of each target')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {registry} = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd())
      const entries = await loadRegistry(await resolveRegistryFile(registry ?? config.registry))

      const {versions, failures} = await resolveLatestVersions(entries, new UpstreamVersionResolver())
      for (const [name, error] of failures) {
        const entry = entries.find(candidate => candidate.name === name)
        logger.warn({target: name, source: entry?.source ? describeSource(entry.source) : undefined, err: error}, 'Version lookup failed')
      }

      console.log(JSON.stringify(Object.fromEntries(versions), null, 2))
    })
}
