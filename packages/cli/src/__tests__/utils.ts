import {mkdtemp, writeFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import test from 'ava'
import {InvalidArgumentError} from 'commander'
import {ConfigError} from '@imagewright/core'
import {parsePositive, parsePositiveInteger, resolveRegistryFile} from '../utils.js'

// ---------------------------------------------------------------------------
// resolveRegistryFile
// ---------------------------------------------------------------------------

test('resolveRegistryFile: resolves registry.yml in directory', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'imagewright-test-'))
  try {
    await writeFile(join(dir, 'registry.yml'), 'gopls: {}')
    const result = await resolveRegistryFile(dir)
    t.is(result, join(dir, 'registry.yml'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolveRegistryFile: resolves registry.json in directory', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'imagewright-test-'))
  try {
    await writeFile(join(dir, 'registry.json'), '{}')
    const result = await resolveRegistryFile(dir)
    t.is(result, join(dir, 'registry.json'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolveRegistryFile: prefers yml over yaml and json', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'imagewright-test-'))
  try {
    await writeFile(join(dir, 'registry.yml'), '{}')
    await writeFile(join(dir, 'registry.yaml'), '{}')
    await writeFile(join(dir, 'registry.json'), '{}')
    const result = await resolveRegistryFile(dir)
    t.is(result, join(dir, 'registry.yml'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolveRegistryFile: resolves registry.toml in directory', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'imagewright-test-'))
  try {
    await writeFile(join(dir, 'registry.toml'), '')
    const result = await resolveRegistryFile(dir)
    t.is(result, join(dir, 'registry.toml'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolveRegistryFile: returns file path directly when given a file', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'imagewright-test-'))
  try {
    const filePath = join(dir, 'images.yaml')
    await writeFile(filePath, '{}')
    const result = await resolveRegistryFile(filePath)
    t.is(result, filePath)
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolveRegistryFile: throws when directory has no registry file', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'imagewright-test-'))
  try {
    await t.throwsAsync(async () => resolveRegistryFile(dir), {
      instanceOf: ConfigError,
      message: `No registry file found in ${dir}. Expected one of: registry.yml, registry.yaml, registry.json, registry.toml`
    })
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolveRegistryFile: throws when path does not exist', async t => {
  const missing = join(tmpdir(), 'imagewright-test-missing', 'nope')
  await t.throwsAsync(async () => resolveRegistryFile(missing), {instanceOf: ConfigError, message: `Path does not exist: ${missing}`})
})

// ---------------------------------------------------------------------------
// option parsers
// ---------------------------------------------------------------------------

test('parsePositive accepts fractional seconds', t => {
  t.is(parsePositive('2.5'), 2.5)
})

test('parsePositive rejects zero and text', t => {
  t.throws(() => parsePositive('0'), {instanceOf: InvalidArgumentError})
  t.throws(() => parsePositive('soon'), {instanceOf: InvalidArgumentError})
})

test('parsePositiveInteger rejects fractions', t => {
  t.is(parsePositiveInteger('4'), 4)
  t.throws(() => parsePositiveInteger('1.5'), {message: 'Expected a positive integer, got \'1.5\''})
})
