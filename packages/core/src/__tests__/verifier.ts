import test from 'ava'
import {BuildExecutor} from '../build-executor.js'
import type {BuildResult, BuildTask, RegistryEntry} from '../types.js'
import {Verifier} from '../verifier.js'
import {FakeImageBuilder, entry, type FakeImage} from './helpers.js'

async function builtTask(
  target: RegistryEntry,
  image: FakeImage
): Promise<{builder: FakeImageBuilder; task: BuildTask; result: BuildResult}> {
  const builder = new FakeImageBuilder({[target.name]: image})
  const task: BuildTask = {
    index: 0,
    name: target.name,
    requestedVersion: target.version,
    resolvedVersion: 'v0.15.0',
    status: 'Pending',
    imageTag: `imagewright/${target.name}:v0.15.0`,
    strategy: {strategy: target.buildStrategy, baseImageClass: 'static'},
    contextDir: `/srv/${target.name}`,
    containerfile: 'ContainerFile',
    buildArgs: {}
  }
  const result = await new BuildExecutor(builder).execute(task, {timeoutSec: 60})
  return {builder, task, result}
}

test('an image passing every check is Verified', async t => {
  const target = entry({name: 'gopls'})
  const {builder, task, result} = await builtTask(target, {sizeBytes: 1024, probe: {stdout: 'golang.org/x/tools/gopls v0.15.0'}})

  const report = await new Verifier(builder).verify(task, result, target, {probeTimeoutSec: 30})

  t.true(report.overallPassed)
  t.is(task.status, 'Verified')
  t.deepEqual(report.checks, [
    {name: 'image-exists', passed: true, detail: 'imagewright/gopls:v0.15.0 (sha256:gopls)'},
    {name: 'version-probe', passed: true, detail: 'golang.org/x/tools/gopls v0.15.0'}
  ])
})

test('the probe uses the default --version invocation and the probe timeout', async t => {
  const target = entry({name: 'gopls'})
  const {builder, task, result} = await builtTask(target, {})

  await new Verifier(builder).verify(task, result, target, {probeTimeoutSec: 7})

  t.deepEqual(builder.probes, [{image: 'imagewright/gopls:v0.15.0', args: ['--version'], entrypoint: undefined, timeoutSec: 7}])
})

test('an image over its size budget fails verification', async t => {
  const target = entry({name: 'gopls', sizeBudgetBytes: 5_000_000})
  const {builder, task, result} = await builtTask(target, {sizeBytes: 8_000_000})

  const report = await new Verifier(builder).verify(task, result, target, {probeTimeoutSec: 30})

  t.false(report.overallPassed)
  t.is(task.status, 'VerificationFailed')
  t.deepEqual(report.checks.at(-1), {name: 'size-budget', passed: false, detail: '7.6 MB exceeds budget of 4.8 MB by 2.9 MB'})
  t.deepEqual(task.error, {stage: 'verify', code: 'VERIFICATION_FAILED', message: 'Failed checks: size-budget'})
})

test('an image within its size budget passes the size check', async t => {
  const target = entry({name: 'gopls', sizeBudgetBytes: 2048})
  const {builder, task, result} = await builtTask(target, {sizeBytes: 2048})

  const report = await new Verifier(builder).verify(task, result, target, {probeTimeoutSec: 30})
  t.deepEqual(report.checks.at(-1), {name: 'size-budget', passed: true, detail: '2.0 KB within budget of 2.0 KB'})
})

test('a probe exiting non-zero fails with its first output line', async t => {
  const target = entry({name: 'gopls', probe: {args: ['version']}})
  const {builder, task, result} = await builtTask(target, {probe: {exitCode: 127, stdout: '', stderr: 'exec: "gopls": not found'}})

  const report = await new Verifier(builder).verify(task, result, target, {probeTimeoutSec: 30})

  t.deepEqual(report.checks[1], {name: 'version-probe', passed: false, detail: '\'version\' exited with code 127: exec: "gopls": not found'})
  t.is(task.status, 'VerificationFailed')
})

test('a probe that does not answer in time fails', async t => {
  const target = entry({name: 'gopls', probe: {entrypoint: '/usr/bin/gopls', args: ['version']}})
  const {builder, task, result} = await builtTask(target, {probe: {timedOut: true}})

  const report = await new Verifier(builder).verify(task, result, target, {probeTimeoutSec: 30})
  t.deepEqual(report.checks[1], {name: 'version-probe', passed: false, detail: '\'/usr/bin/gopls version\' did not answer within 30s'})
})

test('expectVersion requires the resolved version in the probe output', async t => {
  const target = entry({name: 'gopls', probe: {expectVersion: true}})
  const {builder, task, result} = await builtTask(target, {probe: {stdout: 'gopls v0.14.2'}})

  const report = await new Verifier(builder).verify(task, result, target, {probeTimeoutSec: 30})
  t.deepEqual(report.checks[1], {name: 'version-probe', passed: false, detail: '\'--version\' output does not mention version 0.15.0: gopls v0.14.2'})
})

test('an image that no longer resolves fails image-exists and the size check', async t => {
  const target = entry({name: 'gopls', sizeBudgetBytes: 5_000_000})
  const {builder, task, result} = await builtTask(target, {})
  const ghost: BuildResult = {...result, imageRef: 'imagewright/gopls:gone', sizeBytes: undefined}

  const report = await new Verifier(builder).verify(task, ghost, target, {probeTimeoutSec: 30})

  t.deepEqual(report.checks.map(check => [check.name, check.passed]), [
    ['image-exists', false],
    ['version-probe', true],
    ['size-budget', false]
  ])
  t.is(report.checks[2].detail, 'image size unavailable (budget 4.8 MB)')
  t.is(task.error?.message, 'Failed checks: image-exists, size-budget')
})
