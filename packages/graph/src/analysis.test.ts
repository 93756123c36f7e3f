import { describe, it, expect } from 'vitest'
import { Graph, buildFile, srcFile } from '@buildplan/model'

import { findCycle, checkInvariants } from './analysis.js'
import { COMMAND_TEMPLATE } from './builder.js'
import { DiskFileSystemView, InMemoryFileSystemView } from './fileSystem.js'

describe('findCycle', () => {
  it('returns nothing for a DAG', () => {
    const deps = new Map([
      ['app', ['a.o', 'b.o']],
      ['a.o', ['$srcdir/a.c']],
      ['b.o', ['$srcdir/b.c', 'gen.h']],
      ['gen.h', []],
    ])
    expect(findCycle(deps)).toBeUndefined()
  })

  it('returns the path closing the first cycle', () => {
    const deps = new Map([
      ['top', ['a']],
      ['a', ['b']],
      ['b', ['c']],
      ['c', ['a']],
    ])
    expect(findCycle(deps)).toEqual(['a', 'b', 'c', 'a'])
  })
})

describe('checkInvariants', () => {
  const step = (target: string, output: string) => ({
    kind: 'normal' as const,
    target,
    site: target,
    inputs: [srcFile('in.txt')],
    implicit: [],
    orderOnly: [],
    outputs: [buildFile(output)],
    command: { template: COMMAND_TEMPLATE, slots: {} },
  })

  it('reports outputs with two producers and sources with one', () => {
    const graph: Graph = {
      srcdir: '..',
      nodes: [
        { key: '$srcdir/in.txt', ref: srcFile('in.txt'), kind: 'source', consumers: [0, 1] },
        { key: 'out.txt', ref: buildFile('out.txt'), kind: 'output', producer: 0, consumers: [] },
        { key: 'x', ref: buildFile('x'), kind: 'source', consumers: [] },
      ],
      edges: [step('one', 'out.txt'), step('two', 'out.txt'), step('three', 'x')],
      variables: [],
      defaults: [],
      buildInputs: [],
    }
    expect(checkInvariants(graph)).toEqual([
      `output 'out.txt' has 2 producing edges`,
      `source 'x' is produced by edge 2`,
    ])
  })
})

describe('file system views', () => {
  it('answers from a fixed set of source paths', () => {
    const view = new InMemoryFileSystemView(['src/a.c'])
    expect(view.exists(srcFile('src/a.c'))).toBe(true)
    expect(view.exists(srcFile('src/b.c'))).toBe(false)
    expect(view.exists(buildFile('src/a.c'))).toBe(false)
  })

  it('never reports build files as existing on disk', () => {
    expect(new DiskFileSystemView('.').exists(buildFile('package.json'))).toBe(false)
  })
})
