import {
  Dependency,
  FileRefType,
  Graph,
  NormalEdge,
  OrderOnlyEdge,
  PhonyEdge,
  Token,
  buildFile,
  isBuildStep,
  litArgs,
} from '@buildplan/model'
import { posixDirname, uniques } from '@buildplan/utils'

import { Emitter, EmitterCapabilities } from '../emitter.js'
import {
  CommandDialect,
  bindSrcdir,
  commandLiteral,
  generatedHeader,
  joinWords,
  renderArgs,
  renderPath,
} from '../render.js'
import {
  AssignmentFlavor,
  MakeRule,
  MakeWriter,
  escapeTarget,
  makeDialect,
  makeVariableName,
  targetPath,
} from './syntax.js'

type Step = NormalEdge | OrderOnlyEdge

export type MakeFlavor = 'gnu' | 'posix'

const DIR_SENTINEL = '.dir'

const outputDirs = (edge: Step): string[] =>
  uniques(edge.outputs.map((ref) => posixDirname(ref.path))).filter((dir) => dir !== '.')

const dependencyTarget = (dep: Dependency): string =>
  dep.type === 'file' ? targetPath(dep.ref) : escapeTarget(dep.name)

function depfileOf(edge: Step): FileRefType | undefined {
  const { depfileSuffix } = edge.command.template
  const [first] = edge.outputs
  return depfileSuffix && first ? buildFile(first.path + depfileSuffix) : undefined
}

function recipeToken(token: Token, edge: Step, dialect: CommandDialect): string {
  const prefix = 'prefix' in token ? token.prefix : undefined
  const paths = (refs: readonly FileRefType[]): string =>
    joinWords(refs.map((ref) => renderPath(ref, dialect, prefix)))

  switch (token.type) {
    case 'literal':
      return commandLiteral(token.value)
    case 'variable':
      return dialect.variable(token.name)
    case 'slot':
      return renderArgs(edge.command.slots[token.name] ?? [], dialect)
    case 'inputs':
      return paths(edge.inputs)
    case 'outputs': {
      if (token.index === undefined) return paths(edge.outputs)
      const output = edge.outputs[token.index]
      if (!output) {
        throw new Error(`'${edge.target}' has no output #${token.index}`)
      }
      return paths([output])
    }
    case 'depfile': {
      const depfile = depfileOf(edge)
      return depfile ? paths([depfile]) : ''
    }
    case 'rspfile':
      throw new Error('response files cannot be written to a makefile')
  }
}

/**
 * Writes a `Makefile`. The GNU flavor uses order-only prerequisites, grouped
 * targets and `.dir` sentinels; the POSIX flavor has none of these and
 * creates output directories inside each recipe.
 */
export class MakeEmitter extends Emitter {
  public readonly name: string
  public readonly primaryFile = 'Makefile'
  public readonly capabilities: EmitterCapabilities
  private readonly assignment: AssignmentFlavor

  constructor(private readonly flavor: MakeFlavor = 'gnu') {
    super()
    const gnu = flavor === 'gnu'
    this.name = gnu ? 'make' : 'posix-make'
    this.assignment = gnu ? ':=' : '='
    this.capabilities = {
      orderOnly: gnu,
      multiOutput: gnu,
      responseFiles: false,
      depfiles: ['gcc'],
    }
  }

  protected render(graph: Graph): string {
    const out = new MakeWriter()
    for (const line of generatedHeader(graph)) out.comment(line)
    out.blank()
    if (this.flavor === 'posix') out.raw('.POSIX:').blank()

    // prerequisite lists read `srcdir`, recipes the quoted form when there is one
    const { dialect, quoted } = bindSrcdir(graph.srcdir, makeDialect, '$(srcdir_q)')
    out.variable('srcdir', escapeTarget(graph.srcdir), this.assignment)
    if (quoted !== undefined) out.variable('srcdir_q', quoted, this.assignment)
    out.blank()
    if (graph.variables.length > 0) {
      for (const variable of graph.variables) {
        out.variable(
          makeVariableName(variable.name),
          renderArgs(variable.value, dialect),
          this.assignment,
        )
      }
      out.blank()
    }

    const aliases = graph.edges.filter((edge): edge is PhonyEdge => edge.kind === 'phony')
    // the first rule is what a bare `make` builds
    const leading = graph.defaults.flatMap((name) => aliases.filter((edge) => edge.alias === name))
    const names = uniques([...leading, ...aliases].map((edge) => edge.alias))
    if (names.length > 0) out.phony(names.map(escapeTarget)).blank()

    for (const edge of leading) out.rule(this.aliasRule(edge)).blank()
    for (const edge of graph.edges) {
      if (!isBuildStep(edge)) {
        if (!leading.includes(edge)) out.rule(this.aliasRule(edge)).blank()
        continue
      }
      if (edge.description) out.comment(edge.description)
      out.rule(this.stepRule(edge, dialect)).blank()
    }

    if (graph.regenerate) {
      out
        .rule({
          targets: [escapeTarget(this.primaryFile)],
          prerequisites: graph.buildInputs.map(targetPath),
          recipe: [renderArgs(litArgs(graph.regenerate), dialect)],
        })
        .blank()
    }

    if (this.flavor === 'gnu') {
      const dirs = uniques(graph.edges.filter(isBuildStep).flatMap(outputDirs))
      for (const dir of dirs) {
        const sentinel = buildFile(`${dir}/${DIR_SENTINEL}`)
        out
          .rule({
            targets: [targetPath(sentinel)],
            recipe: [
              `mkdir -p ${renderPath(buildFile(dir), makeDialect)}`,
              `touch ${renderPath(sentinel, makeDialect)}`,
            ],
          })
          .blank()
      }
    }

    const depfiles = graph.edges.filter(isBuildStep).flatMap((edge) => {
      const depfile = depfileOf(edge)
      return depfile ? [targetPath(depfile)] : []
    })
    if (depfiles.length > 0) out.raw(`-include ${depfiles.join(' ')}`)
    return out.toString()
  }

  private aliasRule(edge: PhonyEdge): MakeRule {
    return {
      targets: [escapeTarget(edge.alias)],
      prerequisites: edge.inputs.map(dependencyTarget),
    }
  }

  private stepRule(edge: Step, dialect: CommandDialect): MakeRule {
    const command = joinWords(
      edge.command.template.tokens.map((token) => recipeToken(token, edge, dialect)),
    )
    const dirs = outputDirs(edge)
    const gnu = this.flavor === 'gnu'

    return {
      targets: edge.outputs.map(targetPath),
      prerequisites: uniques([...edge.inputs, ...edge.implicit].map(targetPath)),
      orderOnly: gnu
        ? uniques([
            ...edge.orderOnly.map(targetPath),
            ...dirs.map((dir) => targetPath(buildFile(`${dir}/${DIR_SENTINEL}`))),
          ])
        : [],
      grouped: edge.outputs.length > 1,
      recipe: [
        ...(gnu ? [] : dirs.map((dir) => `mkdir -p ${renderPath(buildFile(dir), makeDialect)}`)),
        command,
      ],
    }
  }
}
