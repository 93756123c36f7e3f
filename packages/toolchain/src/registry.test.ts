import { describe, it, expect } from 'vitest'
import { UnsupportedToolchainError, buildFile, lit, srcFile, t } from '@buildplan/model'

import { ToolchainRegistry } from './registry.js'
import { pickToolchainEnvironment } from './environment.js'

const linuxCxx = { language: 'c++', platform: 'linux', family: 'gcc' } as const

describe('ToolchainRegistry', () => {
  it('returns one frozen descriptor per key', () => {
    const registry = new ToolchainRegistry()
    const first = registry.resolve(linuxCxx)
    expect(registry.resolve({ ...linuxCxx })).toBe(first)
    expect(Object.isFrozen(first)).toBe(true)
    expect(Object.isFrozen(first.compile.tokens)).toBe(true)
  })

  it('fails for combinations it does not know', () => {
    const registry = new ToolchainRegistry()
    expect(registry.supports({ language: 'c', platform: 'windows', family: 'gcc' })).toBe(false)
    expect(() =>
      registry.resolve({ language: 'c', platform: 'windows', family: 'gcc' }, 'build.json'),
    ).toThrow(new UnsupportedToolchainError({ language: 'c', platform: 'windows', family: 'gcc' }))
    expect(() => registry.resolve({ language: 'c', platform: 'linux', family: 'msvc' })).toThrow(
      'no msvc toolchain for c on linux',
    )
  })

  it('names the supported combinations when one is missing', () => {
    const registry = new ToolchainRegistry({}, { builtIns: false })
    registry.register({ language: 'c', platform: 'linux', family: 'gcc' }, (key, env) =>
      new ToolchainRegistry(env).resolve(key),
    )
    let caught: unknown
    try {
      registry.resolve({ language: 'c++', platform: 'linux', family: 'gcc' })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(UnsupportedToolchainError)
    expect(caught instanceof UnsupportedToolchainError && caught.details).toEqual({
      language: 'c++',
      platform: 'linux',
      family: 'gcc',
      site: undefined,
      supported: ['c/linux/gcc'],
    })
  })

  it('registers every built-in family', () => {
    expect(new ToolchainRegistry().keys()).toEqual([
      'c/linux/gcc',
      'c++/linux/gcc',
      'c/darwin/gcc',
      'c++/darwin/gcc',
      'c/linux/clang',
      'c++/linux/clang',
      'c/darwin/clang',
      'c++/darwin/clang',
      'c/windows/msvc',
      'c++/windows/msvc',
    ])
  })

  it('accepts extra toolchains but no duplicates', () => {
    const registry = new ToolchainRegistry({}, { builtIns: false })
    const gcc = new ToolchainRegistry().resolve(linuxCxx)
    registry.register(linuxCxx, () => gcc)
    expect(registry.resolve(linuxCxx).compile.rule).toBe('cxx')
    expect(() => registry.register(linuxCxx, () => gcc)).toThrow(/already registered/)
  })

  it('keeps flags, then includes, then positional paths in compile commands', () => {
    const { compile } = new ToolchainRegistry().resolve(linuxCxx)
    expect(compile.tokens).toEqual([
      t.variable('cxx'),
      t.lit('-MMD'),
      t.lit('-MF'),
      t.depfile(),
      t.variable('cxxflags'),
      t.slot('flags'),
      t.slot('includes'),
      t.lit('-c'),
      t.inputs(),
      t.lit('-o'),
      t.outputs(),
    ])
    expect(compile.deps).toBe('gcc')
    expect(compile.depfileSuffix).toBe('.d')
  })

  it('reads commands and flags from the toolchain environment', () => {
    const env = pickToolchainEnvironment({
      CXX: 'clang++ -stdlib=libc++',
      CXXFLAGS: '-O2 -g',
      CPPFLAGS: '-DNDEBUG',
      PATH: '/usr/bin',
    })
    expect(env).toEqual({ CXX: 'clang++ -stdlib=libc++', CXXFLAGS: '-O2 -g', CPPFLAGS: '-DNDEBUG' })

    const descriptor = new ToolchainRegistry(env).resolve(linuxCxx)
    const variable = (name: string) => descriptor.variables.find((v) => v.name === name)?.value
    expect(variable('cxx')).toEqual([lit('clang++'), lit('-stdlib=libc++')])
    expect(variable('cxxflags')).toEqual([lit('-O2'), lit('-g'), lit('-DNDEBUG')])
    expect(variable('ar')).toEqual([lit('ar')])
    expect(variable('arflags')).toEqual([lit('crs')])
  })

  it('uses the family driver when CC is unset', () => {
    const descriptor = new ToolchainRegistry().resolve({
      language: 'c',
      platform: 'darwin',
      family: 'clang',
    })
    expect(descriptor.variables[0]).toEqual({ name: 'cc', value: [lit('clang')] })
    expect(descriptor.compileFlagsVariable).toBe('cflags')
    expect(descriptor.linkExecutable.rule).toBe('link_cc')
  })

  describe('output naming', () => {
    const registry = new ToolchainRegistry()

    it('follows linux conventions', () => {
      const { naming } = registry.resolve(linuxCxx)
      expect(naming.object('app', srcFile('src/main.cpp'))).toEqual(
        buildFile('app.dir/src/main.o'),
      )
      expect(naming.executable('simple')).toEqual(buildFile('simple'))
      expect(naming.library('sub/foo', 'static')).toEqual({
        runtime: buildFile('sub/libfoo.a'),
        link: buildFile('sub/libfoo.a'),
      })
      expect(naming.library('foo', 'shared').runtime).toEqual(buildFile('libfoo.so'))
    })

    it('follows darwin conventions', () => {
      const { naming } = registry.resolve({ ...linuxCxx, platform: 'darwin' })
      expect(naming.library('foo', 'shared').runtime).toEqual(buildFile('libfoo.dylib'))
    })

    it('gives windows shared libraries an import library', () => {
      const { naming, linkShared } = registry.resolve({
        language: 'c++',
        platform: 'windows',
        family: 'msvc',
      })
      expect(naming.object('simple', srcFile('main.cpp'))).toEqual(
        buildFile('simple.dir/main.obj'),
      )
      expect(naming.executable('simple')).toEqual(buildFile('simple.exe'))
      expect(naming.library('foo', 'shared')).toEqual({
        runtime: buildFile('foo.dll'),
        link: buildFile('foo.lib'),
      })
      expect(linkShared.responseFile).toBeDefined()
    })
  })

  describe('flag rules', () => {
    it('translates library files to -l on linux', () => {
      const { flags } = new ToolchainRegistry().resolve(linuxCxx)
      expect(flags.linkLibrary(buildFile('sub/libfoo.so'))).toEqual([lit('-lfoo')])
      expect(flags.linkLibrary(buildFile('odd.bin'))).toEqual([
        { type: 'path', ref: buildFile('odd.bin') },
      ])
      expect(flags.rpath(['.', 'sub'])).toEqual([lit('-Wl,-rpath,$ORIGIN:$ORIGIN/sub')])
      expect(flags.positionIndependent).toEqual([lit('-fPIC')])
      expect(flags.includeDir(srcFile('include'))).toEqual({
        type: 'path',
        ref: srcFile('include'),
        prefix: '-I',
      })
    })

    it('emits no rpath on darwin', () => {
      const { flags } = new ToolchainRegistry().resolve({ ...linuxCxx, platform: 'darwin' })
      expect(flags.rpath(['.'])).toEqual([])
    })

    it('uses msvc spellings on windows', () => {
      const { flags } = new ToolchainRegistry().resolve({
        language: 'c',
        platform: 'windows',
        family: 'msvc',
      })
      expect(flags.define('NAME=1')).toEqual(lit('/DNAME=1'))
      expect(flags.linkLibrary(buildFile('sub/foo.lib'))).toEqual([lit('foo.lib')])
      expect(flags.positionIndependent).toEqual([])
    })
  })
})
