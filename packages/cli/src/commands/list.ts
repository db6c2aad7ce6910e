import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {formatSize, loadRegistry} from '@imagewright/core'
import {loadConfig} from '../config.js'
import {getGlobalOptions, resolveRegistryFile} from '../utils.js'

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List registry targets')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {registry, json} = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd())
      const entries = await loadRegistry(await resolveRegistryFile(registry ?? config.registry))

      if (json) {
        console.log(JSON.stringify(entries, null, 2))
        return
      }

      if (entries.length === 0) {
        console.log(chalk.gray('No targets found.'))
        return
      }

      const rows = entries.map(entry => ({
        name: entry.name,
        kind: entry.kind,
        version: entry.version,
        strategy: entry.buildStrategy,
        budget: entry.sizeBudgetBytes === undefined ? '-' : formatSize(entry.sizeBudgetBytes)
      }))

      const nameWidth = Math.max('TARGET'.length, ...rows.map(r => r.name.length))
      const kindWidth = Math.max('KIND'.length, ...rows.map(r => r.kind.length))
      const versionWidth = Math.max('VERSION'.length, ...rows.map(r => r.version.length))
      const strategyWidth = Math.max('STRATEGY'.length, ...rows.map(r => r.strategy.length))
      const budgetWidth = Math.max('BUDGET'.length, ...rows.map(r => r.budget.length))
      const header = `${'TARGET'.padEnd(nameWidth)}  ${'KIND'.padEnd(kindWidth)}  ${'VERSION'.padEnd(versionWidth)}  ${'STRATEGY'.padEnd(strategyWidth)}  ${'BUDGET'.padStart(budgetWidth)}`
      console.log(chalk.bold(header))
      for (const row of rows) {
        console.log(`${row.name.padEnd(nameWidth)}  ${row.kind.padEnd(kindWidth)}  ${row.version.padEnd(versionWidth)}  ${row.strategy.padEnd(strategyWidth)}  ${row.budget.padStart(budgetWidth)}`)
      }
    })
}
