import {
  CommandTemplate,
  Dependency,
  Graph,
  NormalEdge,
  OrderOnlyEdge,
  Token,
  isBuildStep,
  litArgs,
  pathArg,
  templateKey,
} from '@buildplan/model'

import { Emitter, EmitterCapabilities } from '../emitter.js'
import {
  CommandDialect,
  bindSrcdir,
  commandLiteral,
  generatedHeader,
  joinWords,
  renderArg,
  renderArgs,
} from '../render.js'
import {
  BuildStatement,
  NinjaWriter,
  escapeInput,
  escapeOutput,
  escapePlain,
  inputPath,
  ninjaDialect,
  outputPath,
} from './syntax.js'

type Step = NormalEdge | OrderOnlyEdge
type Binding = readonly [string, string]

const REQUIRED_VERSION = '1.7'
const REGENERATE_RULE = 'regenerate'

// templates naming single outputs get one `outN` binding per output on each build
const usesIndexedOutputs = (template: CommandTemplate): boolean =>
  [...template.tokens, ...(template.responseFile ?? [])].some(
    (token) => token.type === 'outputs' && token.index !== undefined,
  )

function ruleToken(token: Token, firstOutput: string, template: CommandTemplate): string {
  const prefix = 'prefix' in token && token.prefix ? commandLiteral(token.prefix) : ''
  switch (token.type) {
    case 'literal':
      return commandLiteral(token.value)
    case 'variable':
    case 'slot':
      return `$${token.name}`
    case 'inputs':
      return `${prefix}$in`
    case 'outputs':
      return token.index === undefined ? `${prefix}$out` : `${prefix}$out${token.index}`
    case 'depfile':
      return `${prefix}${firstOutput}${template.depfileSuffix ?? '.d'}`
    case 'rspfile':
      return `${prefix}${firstOutput}.rsp`
  }
}

/**
 * Rule names for every template in edge order. Two templates sharing a rule
 * name get `_1`, `_2` suffixes in the order they are first used.
 */
function assignRuleNames(steps: readonly Step[]): Map<string, string> {
  const byKey = new Map<string, string>()
  const taken = new Set<string>([REGENERATE_RULE])
  for (const { command } of steps) {
    const key = templateKey(command.template)
    if (byKey.has(key)) continue
    let name = command.template.rule
    for (let n = 1; taken.has(name); n++) name = `${command.template.rule}_${n}`
    taken.add(name)
    byKey.set(key, name)
  }
  return byKey
}

/** Writes `build.ninja` for ninja 1.7 and later. */
export class NinjaEmitter extends Emitter {
  public readonly name = 'ninja'
  public readonly primaryFile = 'build.ninja'
  public readonly capabilities: EmitterCapabilities = {
    orderOnly: true,
    multiOutput: true,
    responseFiles: true,
    depfiles: ['gcc', 'msvc'],
  }

  protected render(graph: Graph): string {
    const out = new NinjaWriter()
    for (const line of generatedHeader(graph)) out.comment(line)
    out.blank()
    out.variable('ninja_required_version', REQUIRED_VERSION).blank()
    const { dialect, quoted } = bindSrcdir(graph.srcdir, ninjaDialect, '$srcdir_q')
    out.variable('srcdir', escapePlain(graph.srcdir))
    if (quoted !== undefined) out.variable('srcdir_q', quoted)
    out.blank()

    if (graph.variables.length > 0) {
      for (const variable of graph.variables) {
        out.variable(variable.name, renderArgs(variable.value, dialect))
      }
      out.blank()
    }

    const steps = graph.edges.filter(isBuildStep)
    const ruleNames = assignRuleNames(steps)
    const written = new Set<string>()
    for (const { command } of steps) {
      const key = templateKey(command.template)
      const name = ruleNames.get(key)
      if (name === undefined || written.has(key)) continue
      written.add(key)
      out.rule(name, this.ruleBindings(command.template)).blank()
    }
    if (graph.regenerate) {
      out
        .rule(REGENERATE_RULE, [
          ['command', renderArgs(litArgs(graph.regenerate), dialect)],
          ['description', `regenerate ${this.primaryFile}`],
          ['generator', '1'],
        ])
        .blank()
    }

    for (const edge of graph.edges) {
      if (isBuildStep(edge)) {
        const rule = ruleNames.get(templateKey(edge.command.template)) ?? edge.command.template.rule
        out.build(this.buildStatement(edge, rule, dialect)).blank()
      } else {
        out
          .build({
            outputs: [escapeOutput(edge.alias)],
            rule: 'phony',
            inputs: edge.inputs.map(dependencyPath),
          })
          .blank()
      }
    }
    if (graph.regenerate) {
      out
        .build({
          outputs: [escapeOutput(this.primaryFile)],
          rule: REGENERATE_RULE,
          implicit: graph.buildInputs.map(inputPath),
        })
        .blank()
    }

    out.defaults(graph.defaults.map(escapeOutput))
    return out.toString()
  }

  private ruleBindings(template: CommandTemplate): Binding[] {
    const firstOutput = usesIndexedOutputs(template) ? '$out0' : '$out'
    const render = (tokens: readonly Token[]): string =>
      joinWords(tokens.map((token) => ruleToken(token, firstOutput, template)))

    const bindings: Binding[] = [['command', render(template.tokens)]]
    if (template.verb) bindings.push(['description', `${template.verb} $out`])
    if (template.depfileSuffix) {
      bindings.push(['depfile', `${firstOutput}${template.depfileSuffix}`])
    }
    if (template.deps) bindings.push(['deps', template.deps])
    if (template.responseFile) {
      bindings.push(
        ['rspfile', `${firstOutput}.rsp`],
        ['rspfile_content', render(template.responseFile)],
      )
    }
    return bindings
  }

  private buildStatement(edge: Step, rule: string, dialect: CommandDialect): BuildStatement {
    const variables: Binding[] = []
    if (usesIndexedOutputs(edge.command.template)) {
      edge.outputs.forEach((ref, index) => {
        variables.push([`out${index}`, renderArg(pathArg(ref), dialect)])
      })
    }
    for (const [name, args] of Object.entries(edge.command.slots)) {
      if (args.length > 0) variables.push([name, renderArgs(args, dialect)])
    }
    if (edge.description) variables.push(['description', escapePlain(edge.description)])

    return {
      outputs: edge.outputs.map(outputPath),
      rule,
      inputs: edge.inputs.map(inputPath),
      implicit: edge.implicit.map(inputPath),
      orderOnly: edge.orderOnly.map(inputPath),
      variables,
    }
  }
}

const dependencyPath = (dep: Dependency): string =>
  dep.type === 'file' ? inputPath(dep.ref) : escapeInput(dep.name)
