import test from 'ava'
import {LogTail, formatDuration, formatSize} from '../utils.js'

test('formatSize picks a unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(1536), '1.5 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(3 * 1024 * 1024 * 1024), '3.0 GB')
})

test('formatDuration picks a unit', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('LogTail keeps the last lines and truncates long ones', t => {
  const tail = new LogTail(2, 4)
  tail.push('one')
  tail.push('two')
  tail.push('three-four')

  t.deepEqual(tail.toArray(), ['two', 'thre…'])
})
