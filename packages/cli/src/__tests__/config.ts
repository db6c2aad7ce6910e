import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {mkdir, writeFile} from 'node:fs/promises'
import {randomUUID} from 'node:crypto'
import test from 'ava'
import {ConfigError} from '@imagewright/core'
import {globalTriggersFor, loadConfig, validateConfig} from '../config.js'

function tempDir(): string {
  return join(tmpdir(), `imagewright-test-${randomUUID()}`)
}

test('loadConfig returns {} when no .imagewright.yml', async t => {
  const dir = tempDir()
  await mkdir(dir, {recursive: true})
  const config = await loadConfig(dir)
  t.deepEqual(config, {})
})

test('loadConfig parses every key', async t => {
  const dir = tempDir()
  await mkdir(dir, {recursive: true})
  await writeFile(join(dir, '.imagewright.yml'), [
    'registry: images/registry.yml',
    'concurrency: 4',
    'timeoutSec: 900',
    'probeTimeoutSec: 10',
    'imagePrefix: ghcr.io/example/',
    'noCache: true',
    'globalTriggers:',
    '  - scripts/',
    ''
  ].join('\n'), 'utf8')

  const config = await loadConfig(dir)
  t.deepEqual(config, {
    registry: 'images/registry.yml',
    concurrency: 4,
    timeoutSec: 900,
    probeTimeoutSec: 10,
    imagePrefix: 'ghcr.io/example/',
    noCache: true,
    globalTriggers: ['scripts/']
  })
})

test('loadConfig returns {} for empty file', async t => {
  const dir = tempDir()
  await mkdir(dir, {recursive: true})
  await writeFile(join(dir, '.imagewright.yml'), '', 'utf8')
  const config = await loadConfig(dir)
  t.deepEqual(config, {})
})

test('loadConfig throws on invalid YAML', async t => {
  const dir = tempDir()
  await mkdir(dir, {recursive: true})
  await writeFile(join(dir, '.imagewright.yml'), ':\n  - :\n    bad: [', 'utf8')
  await t.throwsAsync(async () => loadConfig(dir), {instanceOf: ConfigError})
})

test('validateConfig rejects a fractional concurrency', t => {
  t.throws(() => validateConfig({concurrency: 1.5}), {
    instanceOf: ConfigError,
    message: '.imagewright.yml: concurrency must be a positive integer'
  })
})

test('validateConfig rejects a non-positive timeout', t => {
  t.throws(() => validateConfig({timeoutSec: 0}), {message: '.imagewright.yml: timeoutSec must be a positive number of seconds, at most 2147483'})
})

test('validateConfig rejects an infinite timeout', t => {
  t.throws(() => validateConfig({timeoutSec: Number.POSITIVE_INFINITY}), {
    instanceOf: ConfigError,
    message: '.imagewright.yml: timeoutSec must be a positive number of seconds, at most 2147483'
  })
})

test('validateConfig rejects a probe timeout longer than a timer can hold', t => {
  t.throws(() => validateConfig({probeTimeoutSec: 3_000_000}), {
    message: '.imagewright.yml: probeTimeoutSec must be a positive number of seconds, at most 2147483'
  })
})

test('validateConfig rejects a list at the top level', t => {
  t.throws(() => validateConfig(['concurrency']), {message: '.imagewright.yml must contain a mapping'})
})

test('validateConfig rejects non-string triggers', t => {
  t.throws(() => validateConfig({globalTriggers: ['scripts/', 3]}), {instanceOf: ConfigError})
})

test('globalTriggersFor defaults to the registry file and the config file', t => {
  t.deepEqual(globalTriggersFor({}, join('/srv', 'images', 'registry.toml')), ['registry.toml', '.imagewright.yml'])
})

test('globalTriggersFor keeps configured triggers', t => {
  t.deepEqual(globalTriggersFor({globalTriggers: ['scripts/']}, 'registry.yml'), ['scripts/'])
})
