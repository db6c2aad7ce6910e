import test from 'ava'
import {selectChangedTargets} from '../changes.js'
import {entry} from './helpers.js'

const entries = [
  entry({name: 'gopls'}),
  entry({name: 'clangd', context: 'cpp/clangd/'}),
  entry({name: 'pyright'})
]

test('a changed file selects the target owning its context', t => {
  t.deepEqual(selectChangedTargets(entries, ['pyright/ContainerFile', 'cpp/clangd/patches/fix.diff']), ['clangd', 'pyright'])
})

test('files outside any context select nothing', t => {
  t.deepEqual(selectChangedTargets(entries, ['README.md', 'goplsx/notes.txt']), [])
})

test('a leading ./ is ignored', t => {
  t.deepEqual(selectChangedTargets(entries, ['./gopls/ContainerFile']), ['gopls'])
})

test('a global trigger selects every target', t => {
  t.deepEqual(
    selectChangedTargets(entries, ['scripts/common.sh'], {globalTriggers: ['scripts/', 'registry.yml']}),
    ['gopls', 'clangd', 'pyright']
  )
})

test('a trigger naming a file matches that file', t => {
  t.deepEqual(selectChangedTargets(entries, ['registry.yml'], {globalTriggers: ['registry.yml']}), ['gopls', 'clangd', 'pyright'])
})
