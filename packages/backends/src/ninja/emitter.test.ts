import { describe, it, expect } from 'vitest'
import {
  Arg,
  CommandTemplate,
  Edge,
  FileRefType,
  Graph,
  buildFile,
  lit,
  pathArg,
  srcFile,
  t,
} from '@buildplan/model'
import { BuildContext } from '@buildplan/evaluator'
import { GraphBuilder, InMemoryFileSystemView } from '@buildplan/graph'
import { ToolchainRegistry } from '@buildplan/toolchain'

import { NinjaEmitter } from './emitter.js'

const toolchains = new ToolchainRegistry()

function simpleGraph(): Graph {
  const ctx = new BuildContext({
    platform: 'linux',
    family: 'gcc',
    toolchains,
    buildInputs: ['build.json'],
  })
  ctx.globalFlags('-DNAME="demo"', 'c++')
  ctx.executable('simple', { sources: 'simple.cpp' })
  return new GraphBuilder({
    fs: new InMemoryFileSystemView(['simple.cpp']),
    srcdir: '..',
    regenerate: ['buildplan', 'regenerate', '.'],
  }).build(ctx.seal())
}

const COMMAND: CommandTemplate = { rule: 'command', tokens: [t.slot('cmd')] }

function step(
  target: string,
  inputs: FileRefType[],
  outputs: FileRefType[],
  cmd: Arg[],
  template: CommandTemplate = COMMAND,
): Edge {
  return {
    kind: 'normal',
    target,
    site: `test: ${target}`,
    inputs,
    implicit: [],
    orderOnly: [],
    outputs,
    command: { template, slots: { cmd } },
  }
}

const graphOf = (edges: Edge[]): Graph => ({
  srcdir: '..',
  nodes: [],
  edges,
  variables: [],
  defaults: ['all'],
  buildInputs: [],
})

const render = (graph: Graph): string => {
  const [artifact] = new NinjaEmitter().emit(graph).artifacts
  return artifact.contents
}

describe('NinjaEmitter', () => {
  it('renders the simple executable', () => {
    const set = new NinjaEmitter().emit(simpleGraph())
    expect(set.backend).toBe('ninja')
    expect(set.artifacts.map((artifact) => artifact.path)).toEqual(['build.ninja'])
    expect(set.artifacts[0].contents).toBe(
      [
        '# Do not edit this file! It was automatically generated by buildplan.',
        '# Instead, you should edit the source file that created this:',
        '# build.json',
        '',
        'ninja_required_version = 1.7',
        '',
        'srcdir = ..',
        '',
        'cxx = g++',
        `cxxflags = '-DNAME="demo"'`,
        'ldflags =',
        'ldlibs =',
        '',
        'rule cxx',
        '  command = $cxx -MMD -MF $out.d $cxxflags $flags $includes -c $in -o $out',
        '  description = compile $out',
        '  depfile = $out.d',
        '  deps = gcc',
        '',
        'rule link_cxx',
        '  command = $cxx $ldflags $flags $libdirs $in $libs $ldlibs -o $out',
        '  description = link $out',
        '',
        'rule regenerate',
        '  command = buildplan regenerate .',
        '  description = regenerate build.ninja',
        '  generator = 1',
        '',
        'build simple.dir/simple.o: cxx $srcdir/simple.cpp',
        '',
        'build simple: link_cxx simple.dir/simple.o',
        '',
        'build all: phony simple',
        '',
        'build build.ninja: regenerate | $srcdir/build.json',
        '',
        'default all',
        '',
      ].join('\n'),
    )
  })

  it('is byte-identical across runs', () => {
    expect(render(simpleGraph())).toBe(render(simpleGraph()))
  })

  it('writes per-build slot variables', () => {
    const ctx = new BuildContext({ platform: 'linux', family: 'gcc', toolchains })
    const util = ctx.library('util', { sources: 'util.c', kind: 'shared' })
    ctx.executable('app', { sources: 'app.c', libs: util, defines: 'DEBUG' })
    const graph = new GraphBuilder({
      fs: new InMemoryFileSystemView(['util.c', 'app.c']),
      srcdir: '..',
    }).build(ctx.seal())
    const text = render(graph)

    expect(text).toContain('build util.dir/util.o: cc $srcdir/util.c\n  flags = -fPIC\n')
    expect(text).toContain('build libutil.so: link_cc_shared util.dir/util.o\n')
    expect(text).toContain('build app.dir/app.o: cc $srcdir/app.c\n  flags = -DDEBUG\n')
    expect(text).toContain(
      [
        'build app: link_cc app.dir/app.o | libutil.so',
        `  libdirs = -L. '-Wl,-rpath,$$ORIGIN'`,
        '  libs = -lutil',
      ].join('\n'),
    )
    expect(text).toContain('build util: phony libutil.so\n')
  })

  it('routes msvc link inputs through a response file', () => {
    const ctx = new BuildContext({ platform: 'windows', family: 'msvc', toolchains })
    ctx.executable('app', { sources: 'app.cpp' })
    const graph = new GraphBuilder({
      fs: new InMemoryFileSystemView(['app.cpp']),
      srcdir: '..',
    }).build(ctx.seal())
    const text = render(graph)

    expect(text).toContain(
      [
        'rule cxx',
        '  command = $cxx /nologo /showIncludes $cxxflags $flags $includes /c $in /Fo$out',
        '  description = compile $out',
        '  deps = msvc',
      ].join('\n'),
    )
    expect(text).toContain(
      [
        'rule link',
        '  command = $link /nologo $ldflags $flags @$out.rsp /OUT:$out',
        '  description = link $out',
        '  rspfile = $out.rsp',
        '  rspfile_content = $in $libdirs $libs $ldlibs',
      ].join('\n'),
    )
    expect(text).toContain('build app.exe: link app.dir/app.obj\n')
    expect(text).toContain('build app: phony app.exe\n')
  })

  it('binds each output of a template that names them one by one', () => {
    const template: CommandTemplate = {
      rule: 'pair',
      tokens: [t.lit('split'), t.inputs(), t.outputs('--header=', 0), t.outputs('--body=', 1)],
    }
    const text = render(
      graphOf([
        step('pair', [srcFile('in.txt')], [buildFile('a.h'), buildFile('a.c')], [], template),
      ]),
    )
    expect(text).toContain('  command = split $in --header=$out0 --body=$out1\n')
    expect(text).toContain('build a.h a.c: pair $srcdir/in.txt\n  out0 = a.h\n  out1 = a.c\n')
  })

  it('writes order-only inputs after ||', () => {
    const text = render(
      graphOf([
        {
          kind: 'order-only',
          target: 'stamp',
          site: 'test: stamp',
          inputs: [],
          implicit: [],
          orderOnly: [srcFile('schema.txt')],
          outputs: [buildFile('gen/stamp')],
          command: {
            template: COMMAND,
            slots: { cmd: [lit('touch'), pathArg(buildFile('gen/stamp'))] },
          },
          description: 'stamp schema',
        },
      ]),
    )
    expect(text).toContain('rule command\n  command = $cmd\n\n')
    expect(text).toContain(
      [
        'build gen/stamp: command || $srcdir/schema.txt',
        '  cmd = touch gen/stamp',
        '  description = stamp schema',
      ].join('\n'),
    )
  })

  it('suffixes rule names shared by different templates', () => {
    const first: CommandTemplate = { rule: 'gen', tokens: [t.lit('gen1'), t.outputs()] }
    const second: CommandTemplate = { rule: 'gen', tokens: [t.lit('gen2'), t.outputs()] }
    const text = render(
      graphOf([
        step('a', [], [buildFile('a')], [], first),
        step('b', [], [buildFile('b')], [], second),
        step('c', [], [buildFile('c')], [], first),
      ]),
    )
    expect(text).toContain('rule gen\n  command = gen1 $out\n')
    expect(text).toContain('rule gen_1\n  command = gen2 $out\n')
    expect(text).toContain('build a: gen\n')
    expect(text).toContain('build b: gen_1\n')
    expect(text).toContain('build c: gen\n')
  })

  it('escapes paths and commands', () => {
    const input = srcFile('in $x.txt')
    const output = buildFile('my out/a:b')
    const text = render(
      graphOf([step('odd', [input], [output], [lit('cp'), pathArg(input), pathArg(output)])]),
    )
    expect(text).toContain(
      `build my$ out/a$:b: command $srcdir/in$ $$x.txt\n  cmd = cp '$srcdir/in $$x.txt' 'my out/a:b'\n`,
    )
  })

  it('quotes a source directory the shell would split', () => {
    const ctx = new BuildContext({ platform: 'linux', family: 'gcc', toolchains })
    ctx.executable('simple', { sources: 'simple.cpp', includes: 'include' })
    const graph = new GraphBuilder({
      fs: new InMemoryFileSystemView(['simple.cpp']),
      srcdir: '../my proj',
    }).build(ctx.seal())
    const text = render(graph)

    expect(text).toContain('\nsrcdir = ../my proj\nsrcdir_q = ../my proj\n\n')
    expect(text).toContain(
      `build simple.dir/simple.o: cxx $srcdir/simple.cpp\n  includes = '-I$srcdir_q/include'\n`,
    )
  })

  it('binds no quoted source directory when none is needed', () => {
    expect(render(simpleGraph())).not.toContain('srcdir_q')
  })

  it('rejects newlines in commands', () => {
    expect(() =>
      render(graphOf([step('bad', [], [buildFile('out')], [lit('echo'), lit('a\nb')])])),
    ).toThrow(/illegal newline/)
  })

  it('writes only the generator line without build inputs', () => {
    const text = render(graphOf([]))
    expect(text.split('\n').slice(0, 3)).toEqual([
      '# Do not edit this file! It was automatically generated by buildplan.',
      '',
      'ninja_required_version = 1.7',
    ])
  })
})
