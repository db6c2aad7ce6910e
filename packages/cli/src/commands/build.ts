import process from 'node:process'
import {dirname} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {
  BuildOrchestrator,
  ConsoleReporter,
  DockerCliBuilder,
  UpstreamVersionResolver,
  formatReport,
  listChangedFiles,
  logger,
  loadRegistry,
  parseSelector,
  selectChangedTargets,
  serializeReport,
  writeReport,
  type Selector
} from '@imagewright/core'
import {InteractiveReporter} from '../interactive-reporter.js'
import {globalTriggersFor, loadConfig} from '../config.js'
import {getGlobalOptions, parsePositive, parsePositiveInteger, resolveRegistryFile} from '../utils.js'

type BuildCommandOptions = {
  targets?: string;
  since?: string;
  concurrency?: number;
  timeout?: number;
  probeTimeout?: number;
  cache: boolean;
  report?: string;
  verbose?: boolean;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build and verify registry images')
    .option('-t, --targets <selector>', 'all, a comma-separated list of names, or a pattern', 'all')
    .option('--since <ref>', 'Build only targets whose context changed since a git revision')
    .option('-c, --concurrency <number>', 'Max parallel builds (default: CPU count)', parsePositiveInteger)
    .option('--timeout <seconds>', 'Build timeout per target', parsePositive)
    .option('--probe-timeout <seconds>', 'Version probe timeout', parsePositive)
    .option('--no-cache', 'Build without the layer cache')
    .option('--report <file>', 'Write the JSON run report to a file')
    .option('--verbose', 'Stream build logs in real-time (interactive mode)')
    .action(async (options: BuildCommandOptions, cmd: Command) => {
      const {registry, json} = getGlobalOptions(cmd)
      const cwd = process.cwd()
      const config = await loadConfig(cwd)
      const registryFile = await resolveRegistryFile(registry ?? config.registry)
      const entries = await loadRegistry(registryFile)

      let selector: Selector = parseSelector(options.targets)
      if (options.since) {
        const registryRoot = dirname(registryFile)
        const changedFiles = await listChangedFiles(options.since, 'HEAD', {cwd: registryRoot})
        const names = selectChangedTargets(entries, changedFiles, {globalTriggers: globalTriggersFor(config, registryFile)})
        if (names.length === 0) {
          console.log(chalk.gray(`No targets changed since ${options.since}.`))
          return
        }

        selector = {type: 'names', names}
      }

      const builder = new DockerCliBuilder()
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const orchestrator = new BuildOrchestrator({builder, resolver: new UpstreamVersionResolver(), reporter})

      const controller = new AbortController()
      const onSignal = () => {
        if (controller.signal.aborted) {
          builder.killRunningBuilds().catch((error: unknown) => {
            logger.error({err: error}, 'Failed to remove running builds')
          })
          return
        }

        controller.abort()
      }

      process.on('SIGINT', onSignal)
      process.on('SIGTERM', onSignal)

      try {
        const report = await orchestrator.run(entries, selector, {
          concurrency: options.concurrency ?? config.concurrency,
          timeoutSec: options.timeout ?? config.timeoutSec,
          probeTimeoutSec: options.probeTimeout ?? config.probeTimeoutSec,
          registryRoot: dirname(registryFile),
          imagePrefix: config.imagePrefix,
          noCache: !options.cache || (config.noCache ?? false),
          signal: controller.signal
        })

        if (options.report) {
          await writeReport(options.report, report)
        }

        if (json) {
          process.stdout.write(serializeReport(report))
        } else {
          console.log(formatReport(report))
        }

        process.exitCode = report.exitCode
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
