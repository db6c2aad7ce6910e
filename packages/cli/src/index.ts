#!/usr/bin/env tsx
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {ImagewrightError} from '@imagewright/core'
import {registerBuildCommand} from './commands/build.js'
import {registerChangedCommand} from './commands/changed.js'
import {registerListCommand} from './commands/list.js'
import {registerVersionsCommand} from './commands/versions.js'

async function main() {
  const program = new Command()

  program
    .name('imagewright')
    .description('Build and verify container images from a registry')
    .version('0.1.0')
    .option('--registry <path>', 'Registry file or directory (default: current directory)')
    .option('--json', 'Output structured JSON')

  registerBuildCommand(program)
  registerListCommand(program)
  registerVersionsCommand(program)
  registerChangedCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof ImagewrightError) {
    console.error(chalk.red(`${error.code}: ${error.message}`))
    process.exitCode = 2
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
