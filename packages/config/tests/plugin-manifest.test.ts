import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { PluginManifestError, parsePluginManifest, readPluginManifest } from '../src/index.js'

describe('parsePluginManifest', () => {
  it('parses names and pinned versions', () => {
    const entries = parsePluginManifest('git\nworkflow-aggregator:596.v8c21c963d92d\n')
    expect(entries).toEqual([
      { name: 'git' },
      { name: 'workflow-aggregator', version: '596.v8c21c963d92d' },
    ])
  })

  it('skips blank lines and comments', () => {
    const text = ['# build plugins', '', '  credentials  ', 'matrix-auth # access control', '   '].join(
      '\n'
    )
    expect(parsePluginManifest(text)).toEqual([{ name: 'credentials' }, { name: 'matrix-auth' }])
  })

  it('accepts CRLF line endings', () => {
    expect(parsePluginManifest('git\r\nssh-agent\r\n')).toEqual([
      { name: 'git' },
      { name: 'ssh-agent' },
    ])
  })

  it('returns an empty list for an empty manifest', () => {
    expect(parsePluginManifest('')).toEqual([])
  })

  it('reports the line of an invalid name', () => {
    expect(() => parsePluginManifest('git\nbad name\n')).toThrow('line 2: invalid plugin entry "bad name"')
  })

  it('rejects more than one version separator', () => {
    expect(() => parsePluginManifest('git:1:2')).toThrow(PluginManifestError)
    expect(() => parsePluginManifest('git:1:2')).toThrow(
      'line 1: expected "name" or "name:version", got "git:1:2"'
    )
  })

  it('rejects duplicate plugins', () => {
    expect(() => parsePluginManifest('git\ncredentials\ngit:5.0.0')).toThrow(
      'line 3: duplicate plugin "git"'
    )
  })
})

describe('readPluginManifest', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gantry-plugins-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads and parses a manifest file', async () => {
    const path = join(dir, 'plugins.txt')
    await writeFile(path, 'git\ncredentials:1.0\n')
    expect(await readPluginManifest(path)).toEqual([
      { name: 'git' },
      { name: 'credentials', version: '1.0' },
    ])
  })
})
