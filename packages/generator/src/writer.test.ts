import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import { WriteFailedError } from '@buildplan/model'

import { writeArtifacts } from './writer.js'

describe('writeArtifacts', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildplan-writer-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('creates directories and replaces existing files', () => {
    const out = path.join(dir, 'build')
    fs.mkdirSync(out)
    fs.writeFileSync(path.join(out, 'build.ninja'), 'old\n')

    const written = writeArtifacts(out, [
      { path: 'build.ninja', contents: 'new\n' },
      { path: '.buildplan/environment.json', contents: '{}\n' },
    ])

    expect(written).toEqual([
      path.join(out, 'build.ninja'),
      path.join(out, '.buildplan', 'environment.json'),
    ])
    expect(fs.readFileSync(path.join(out, 'build.ninja'), 'utf-8')).toBe('new\n')
    expect(fs.readFileSync(path.join(out, '.buildplan', 'environment.json'), 'utf-8')).toBe('{}\n')
    expect(fs.readdirSync(out).sort()).toEqual(['.buildplan', 'build.ninja'])
  })

  it('keeps the previous files and removes staged ones when a write fails', () => {
    fs.writeFileSync(path.join(dir, 'build.ninja'), 'old\n')
    fs.writeFileSync(path.join(dir, 'blocker'), '')

    expect(() =>
      writeArtifacts(
        dir,
        [
          { path: 'build.ninja', contents: 'new\n' },
          { path: 'blocker/nested.txt', contents: '' },
        ],
        4242,
      ),
    ).toThrow(WriteFailedError)

    expect(fs.readFileSync(path.join(dir, 'build.ninja'), 'utf-8')).toBe('old\n')
    expect(fs.readdirSync(dir).sort()).toEqual(['blocker', 'build.ninja'])
  })

  it('names the file it failed on', () => {
    fs.writeFileSync(path.join(dir, 'blocker'), '')
    expect(() => writeArtifacts(dir, [{ path: 'blocker/nested.txt', contents: '' }])).toThrow(
      `failed to write ${path.join(dir, 'blocker', 'nested.txt')}: `,
    )
  })
})
