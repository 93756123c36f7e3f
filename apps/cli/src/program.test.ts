import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  DanglingInputError,
  EnvironmentError,
  UndeclaredTargetError,
  UnknownBackendError,
} from '@buildplan/model'

import { CliIo, EXIT_CODES, exitCodeFor, run } from './program.js'

const DESCRIPTION = {
  targets: [{ type: 'executable', name: '${options.name}', sources: ['main.c'] }],
}
const OPTIONS = { options: [{ name: 'name', type: 'string', default: 'hello' }] }

describe('buildplan cli', () => {
  let srcdir: string
  let out: string
  let err: string

  const io: CliIo = {
    out: (text) => {
      out += text
    },
    err: (text) => {
      err += text
    },
  }
  const env = { LOG_LEVEL: 'silent', BUILDPLAN_PLATFORM: 'linux' }
  const cli = (...argv: string[]) => run(argv, { env, io, cwd: srcdir, command: ['buildplan'] })
  const write = (file: string, contents: unknown) =>
    fs.writeFileSync(path.join(srcdir, file), JSON.stringify(contents))

  beforeEach(() => {
    srcdir = fs.mkdtempSync(path.join(os.tmpdir(), 'buildplan-cli-'))
    out = ''
    err = ''
    write('build.json', DESCRIPTION)
    write('options.json', OPTIONS)
    fs.writeFileSync(path.join(srcdir, 'main.c'), 'int main(void) { return 0; }\n')
  })

  afterEach(() => {
    fs.rmSync(srcdir, { recursive: true, force: true })
  })

  it('configures a build directory', () => {
    expect(cli('configure', 'build')).toBe(EXIT_CODES.ok)
    expect(out).toBe('wrote build/build.ninja\nwrote build/.buildplan/environment.json\n')
    expect(err).toBe('')

    const ninja = fs.readFileSync(path.join(srcdir, 'build', 'build.ninja'), 'utf-8')
    expect(ninja).toContain('\nbuild hello: link_cc hello.dir/main.o\n')
    expect(ninja).toContain('\n  command = buildplan regenerate .\n')
  })

  it('lists the project options in configure help', () => {
    expect(cli('configure', '--help')).toBe(EXIT_CODES.ok)
    expect(out).toContain(
      '\nProject options (options.json):\n  -D name=<string>  (default: hello)\n',
    )
  })

  it('lists the options of the file --options-file names', () => {
    write('more.json', {
      options: [{ name: 'mode', type: 'enum', values: ['debug', 'release'], default: 'debug' }],
    })
    expect(cli('configure', '--options-file', 'more.json', '--help')).toBe(EXIT_CODES.ok)
    expect(out).toContain(
      '\nProject options (more.json):\n  -D mode=debug|release  (default: debug)\n',
    )
  })

  it('passes -D overrides and the chosen backend', () => {
    expect(cli('configure', 'out', '-b', 'make', '-D', 'name=tool', '--compiler', 'clang')).toBe(0)
    expect(out).toBe('wrote out/Makefile\nwrote out/.buildplan/environment.json\n')

    const makefile = fs.readFileSync(path.join(srcdir, 'out', 'Makefile'), 'utf-8')
    expect(makefile).toContain('\nall: tool\n')
    const recorded = JSON.parse(
      fs.readFileSync(path.join(srcdir, 'out', '.buildplan', 'environment.json'), 'utf-8'),
    )
    expect(recorded.family).toBe('clang')
    expect(recorded.overrides).toEqual({ name: 'tool' })
  })

  it('regenerates from the recorded environment', () => {
    expect(cli('configure', 'build', '-D', 'name=tool')).toBe(0)
    const before = fs.readFileSync(path.join(srcdir, 'build', 'build.ninja'), 'utf-8')
    out = ''

    expect(cli('regenerate', 'build')).toBe(0)
    expect(out).toBe('wrote build/build.ninja\nwrote build/.buildplan/environment.json\n')
    expect(fs.readFileSync(path.join(srcdir, 'build', 'build.ninja'), 'utf-8')).toBe(before)
  })

  it('exits with 2 on description errors', () => {
    write('build.json', {
      targets: [{ type: 'executable', name: 'hello', sources: ['main.c'], libs: ['nope'] }],
    })
    expect(cli('configure', 'build')).toBe(EXIT_CODES.description)
    expect(err).toMatch(/^buildplan: reference to undeclared target 'nope' at /)
    expect(fs.existsSync(path.join(srcdir, 'build'))).toBe(false)
  })

  it('exits with 3 on graph errors', () => {
    write('build.json', {
      targets: [{ type: 'executable', name: 'hello', sources: ['main.c', 'missing.c'] }],
    })
    expect(cli('configure', 'build')).toBe(EXIT_CODES.graph)
    expect(err).toContain('missing.c')
  })

  it('exits with 4 on an unknown backend', () => {
    expect(cli('configure', 'build', '--backend', 'scons')).toBe(EXIT_CODES.emission)
    expect(err).toContain('scons')
  })

  it('exits with 1 on usage errors', () => {
    expect(cli('frobnicate')).toBe(EXIT_CODES.usage)
    expect(err).toContain("unknown command 'frobnicate'")

    err = ''
    expect(cli('configure', 'build', '--platform', 'beos')).toBe(EXIT_CODES.usage)
    expect(err).toContain('expected one of: linux, darwin, windows')

    err = ''
    expect(cli('configure', 'build', '-D', 'name')).toBe(EXIT_CODES.usage)
    expect(err).toContain('expected name=value')
  })

  it('exits with 1 when there is nothing to regenerate', () => {
    expect(cli('regenerate', 'nowhere')).toBe(EXIT_CODES.usage)
    expect(err).toMatch(/^buildplan: cannot read .*environment\.json: .*; run configure first\n$/)
  })

  it('rejects an invalid environment', () => {
    const code = run(['backends'], { env: { BUILDPLAN_COMPILER: 'tcc' }, io, cwd: srcdir })
    expect(code).toBe(EXIT_CODES.usage)
    expect(err).toMatch(/^buildplan: invalid environment: BUILDPLAN_COMPILER: /)
  })

  it('lists the backends', () => {
    expect(cli('backends')).toBe(0)
    expect(out).toBe(
      [
        'ninja\tbuild.ninja\torder-only,multi-output,response-files\tdeps=gcc,msvc',
        'make\tMakefile\torder-only,multi-output\tdeps=gcc',
        'posix-make\tMakefile\t-\tdeps=gcc',
        '',
      ].join('\n'),
    )
  })

  it('prints help and version without failing', () => {
    expect(cli('--version')).toBe(0)
    expect(out).toBe('0.1.0\n')

    out = ''
    expect(cli('--help')).toBe(0)
    expect(out).toContain('Usage: buildplan [options] [command]')
  })
})

describe('exitCodeFor', () => {
  it('maps error categories to exit codes', () => {
    expect(exitCodeFor(new UndeclaredTargetError('x', 'build.json'))).toBe(2)
    expect(exitCodeFor(new DanglingInputError('a.o', 'x.c'))).toBe(3)
    expect(exitCodeFor(new UnknownBackendError('scons', ['ninja']))).toBe(4)
    expect(exitCodeFor(new EnvironmentError('broken'))).toBe(1)
    expect(exitCodeFor(new Error('boom'))).toBe(1)
  })
})
