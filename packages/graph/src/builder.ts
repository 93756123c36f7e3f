import {
  Arg,
  BuildStep,
  CommandTemplate,
  CompiledTarget,
  ConflictingOutputError,
  CustomCommandTarget,
  DEFAULT_ALIAS,
  DanglingInputError,
  Dependency,
  Edge,
  FileNode,
  FileRefType,
  Graph,
  GraphVariable,
  LanguageType,
  LibraryTarget,
  Target,
  TargetRegistry,
  ToolchainDescriptor,
  buildFile,
  fileKey,
  isCompiledTarget,
  litArgs,
  t,
} from '@buildplan/model'
import { Logger, makeLogger } from '@buildplan/logger'
import { deepFreeze, posixDirname, relativePosix, uniques } from '@buildplan/utils'

import { FileSystemView } from './fileSystem.js'
import { assertAcyclic, checkInvariants } from './analysis.js'

export interface GraphBuilderSettings {
  fs: FileSystemView
  /** the source directory as seen from the build directory */
  srcdir: string
  /** argv that re-runs the generator, recorded in the graph for the backends */
  regenerate?: readonly string[]
}

/** Shared by every custom command: the whole argv is bound per edge. */
export const COMMAND_TEMPLATE: CommandTemplate = deepFreeze({
  rule: 'command',
  tokens: [t.slot('cmd')],
})

interface NodeEntry {
  readonly ref: FileRefType
  producer?: number
  readonly consumers: number[]
}

type StepKind = 'normal' | 'order-only'

/** Libraries to link, dependents before their dependencies, each once. */
function linkClosure(libs: readonly LibraryTarget[]): LibraryTarget[] {
  const flat: LibraryTarget[] = []
  const walk = (lib: LibraryTarget): void => {
    flat.push(lib)
    lib.libs.forEach(walk)
  }
  libs.forEach(walk)
  return uniques([...flat].reverse(), (lib) => lib.name).reverse()
}

/**
 * Turns a sealed target registry into a validated Graph. Each call to
 * `build` works on fresh state, so one builder can serve repeated runs.
 */
export class GraphBuilder {
  private readonly logger: Logger = makeLogger('GraphBuilder')

  constructor(private readonly settings: GraphBuilderSettings) {}

  public build(registry: TargetRegistry): Graph {
    const assembly = new Assembly(registry, this.logger)
    for (const target of registry.targets) {
      assembly.expand(target)
    }
    assembly.addDefaults()

    assertAcyclic(assembly.edges)
    assembly.assertResolved(this.settings.fs)

    const graph: Graph = deepFreeze({
      srcdir: this.settings.srcdir,
      nodes: assembly.fileNodes(),
      edges: assembly.edges,
      variables: assembly.graphVariables(),
      defaults: [DEFAULT_ALIAS],
      buildInputs: registry.buildInputs,
      ...(this.settings.regenerate ? { regenerate: this.settings.regenerate } : {}),
    })

    const problems = checkInvariants(graph)
    if (problems.length > 0) {
      throw new Error(`graph invariants violated:\n  ${problems.join('\n  ')}`)
    }
    this.logger.debug(`built graph`, { nodes: graph.nodes.length, edges: graph.edges.length })
    return graph
  }
}

/** Mutable state of one build; discarded once the frozen Graph exists. */
class Assembly {
  public readonly edges: Edge[] = []
  private readonly nodes = new Map<string, NodeEntry>()
  private readonly aliases = new Map<string, string>()
  private readonly variables = new Map<string, GraphVariable>()
  private readonly byName = new Map<string, Target>()

  constructor(
    private readonly registry: TargetRegistry,
    private readonly logger: Logger,
  ) {}

  public expand(target: Target): void {
    this.byName.set(target.name, target)
    switch (target.kind) {
      case 'executable':
      case 'library':
        this.compiled(target)
        break
      case 'custom-command':
        this.command(target)
        break
      case 'alias':
        this.addAlias(
          target.name,
          target.name,
          target.site,
          target.deps.flatMap((dep) => this.dependenciesOf(dep.name)),
        )
        return
    }

    // a target is reachable by name unless its name already is one of its outputs
    if (!target.outputs.some((output) => fileKey(output) === target.name)) {
      this.addAlias(
        target.name,
        target.name,
        target.site,
        target.outputs.map((ref): Dependency => ({ type: 'file', ref })),
      )
    }
  }

  public addDefaults(): void {
    const names =
      this.registry.defaults.length > 0
        ? this.registry.defaults
        : this.registry.targets.filter(isCompiledTarget).map((target) => target.name)
    this.addAlias(
      DEFAULT_ALIAS,
      DEFAULT_ALIAS,
      'defaults',
      names.flatMap((name) => this.dependenciesOf(name)),
    )
  }

  public assertResolved(fs: FileSystemView): void {
    for (const [key, node] of this.nodes) {
      if (node.producer !== undefined) continue
      if (node.ref.root === 'srcdir' && fs.exists(node.ref)) continue

      const consumer = this.edges[node.consumers[0]]
      throw new DanglingInputError(key, consumer.target, consumer.site)
    }
  }

  public fileNodes(): FileNode[] {
    return [...this.nodes].map(([key, node]): FileNode => ({
      key,
      ref: node.ref,
      kind: node.producer === undefined ? 'source' : 'output',
      ...(node.producer !== undefined ? { producer: node.producer } : {}),
      consumers: node.consumers,
    }))
  }

  public graphVariables(): GraphVariable[] {
    return [...this.variables.values()]
  }

  private compiled(target: CompiledTarget): void {
    const libs = linkClosure(target.libs)
    const includes = uniques(
      [
        ...target.includes,
        ...(target.kind === 'library' ? target.publicIncludes : []),
        ...libs.flatMap((lib) => lib.publicIncludes),
      ],
      fileKey,
    )
    const headers = target.sources.flatMap((source) => (source.language ? [] : [source.ref]))
    const shared = target.kind === 'library' && target.libraryKind === 'shared'

    const objects: FileRefType[] = []
    for (const source of target.sources) {
      if (!source.language) continue
      const descriptor = this.toolchainOf(target, source.language)
      const object = descriptor.naming.object(target.name, source.ref)
      objects.push(object)

      const flags: Arg[] = [
        ...litArgs(target.flags),
        ...target.defines.map((definition) => descriptor.flags.define(definition)),
        ...(shared ? descriptor.flags.positionIndependent : []),
      ]
      this.addStep('normal', target, {
        inputs: [source.ref],
        implicit: headers,
        orderOnly: target.orderOnly,
        outputs: [object],
        command: {
          template: this.useTemplate(descriptor.compile, descriptor),
          slots: { flags, includes: includes.map((dir) => descriptor.flags.includeDir(dir)) },
        },
      })
    }

    const linker = this.toolchainOf(target, target.linkLanguage)
    if (target.kind === 'library' && target.libraryKind === 'static') {
      this.addStep('normal', target, {
        inputs: objects,
        implicit: [],
        orderOnly: [],
        outputs: target.outputs,
        command: { template: this.useTemplate(linker.archive, linker), slots: {} },
      })
      return
    }

    const outputDir = posixDirname(target.outputs[0].path)
    const libDirs = uniques(libs.map((lib) => posixDirname(lib.files.link.path)))
    const rpathDirs = uniques(
      libs
        .filter((lib) => lib.libraryKind === 'shared')
        .map((lib) => relativePosix(outputDir, posixDirname(lib.files.runtime.path))),
    )
    const template = target.kind === 'executable' ? linker.linkExecutable : linker.linkShared

    this.addStep('normal', target, {
      inputs: objects,
      implicit: libs.map((lib) => lib.files.link),
      orderOnly: [],
      outputs: target.outputs,
      command: {
        template: this.useTemplate(template, linker),
        slots: {
          flags: litArgs(target.linkFlags),
          libdirs: [
            ...libDirs.map((dir) => linker.flags.libraryDir(buildFile(dir))),
            ...linker.flags.rpath(rpathDirs),
          ],
          libs: libs.flatMap((lib) => linker.flags.linkLibrary(lib.files.link)),
        },
      },
    })
  }

  private command(target: CustomCommandTarget): void {
    const orderOnlyKind = target.dependencyKind === 'order-only'
    this.addStep(orderOnlyKind ? 'order-only' : 'normal', target, {
      inputs: orderOnlyKind ? [] : target.inputs,
      implicit: orderOnlyKind ? [] : target.implicit,
      orderOnly: orderOnlyKind
        ? uniques([...target.inputs, ...target.implicit, ...target.orderOnly], fileKey)
        : target.orderOnly,
      outputs: target.outputs,
      command: { template: COMMAND_TEMPLATE, slots: { cmd: target.argv } },
      ...(target.description !== undefined ? { description: target.description } : {}),
    })
  }

  private toolchainOf(target: CompiledTarget, language: LanguageType): ToolchainDescriptor {
    const descriptor = target.toolchains[language]
    if (!descriptor) {
      throw new Error(`no ${language} toolchain was resolved for '${target.name}'`)
    }
    return descriptor
  }

  /** What depending on the named target means: its alias when it has one, else its files. */
  private dependenciesOf(name: string): Dependency[] {
    if (this.aliases.has(name)) return [{ type: 'alias', name }]
    const target = this.byName.get(name)
    return (target?.outputs ?? []).map((ref): Dependency => ({ type: 'file', ref }))
  }

  /** Records the graph variables a template reads, in first-use order. */
  private useTemplate(template: CommandTemplate, descriptor: ToolchainDescriptor): CommandTemplate {
    const tokens = [...template.tokens, ...(template.responseFile ?? [])]
    for (const token of tokens) {
      if (token.type !== 'variable' || this.variables.has(token.name)) continue

      const declared = descriptor.variables.find((variable) => variable.name === token.name)
      if (!declared) {
        throw new Error(`rule '${template.rule}' reads undefined variable '${token.name}'`)
      }
      const extra =
        token.name === descriptor.compileFlagsVariable
          ? (this.registry.globalFlags[descriptor.key.language] ?? [])
          : token.name === descriptor.linkFlagsVariable
            ? this.registry.globalLinkFlags
            : []
      this.variables.set(token.name, {
        name: token.name,
        value: [...declared.value, ...litArgs(extra)],
      })
    }
    return template
  }

  private addStep(
    kind: StepKind,
    target: Target,
    step: Omit<BuildStep, 'target' | 'site'>,
  ): void {
    const index = this.edges.length
    for (const ref of [...step.inputs, ...step.implicit, ...step.orderOnly]) {
      this.consume(ref, index)
    }
    for (const ref of step.outputs) {
      this.produce(ref, index, target.name)
    }
    const base = { target: target.name, site: target.site, ...step }
    this.edges.push(kind === 'normal' ? { kind: 'normal', ...base } : { kind: 'order-only', ...base })
    this.logger.trace(`edge ${index}`, {
      target: target.name,
      rule: step.command.template.rule,
      outputs: step.outputs.map(fileKey),
    })
  }

  private addAlias(alias: string, owner: string, site: string, inputs: Dependency[]): void {
    const previous = this.aliases.get(alias)
    if (previous !== undefined) {
      throw new ConflictingOutputError(alias, owner, previous)
    }
    const producer = this.nodes.get(alias)?.producer
    if (producer !== undefined) {
      throw new ConflictingOutputError(alias, owner, this.edges[producer].target)
    }

    const index = this.edges.length
    for (const input of inputs) {
      if (input.type === 'file') this.consume(input.ref, index)
    }
    this.aliases.set(alias, owner)
    this.edges.push({ kind: 'phony', alias, target: owner, site, inputs })
  }

  private consume(ref: FileRefType, edge: number): void {
    const node = this.node(ref)
    if (!node.consumers.includes(edge)) node.consumers.push(edge)
  }

  private produce(ref: FileRefType, edge: number, target: string): void {
    const key = fileKey(ref)
    const node = this.node(ref)
    if (node.producer !== undefined) {
      throw new ConflictingOutputError(key, target, this.edges[node.producer].target)
    }
    const alias = this.aliases.get(key)
    if (alias !== undefined) {
      throw new ConflictingOutputError(key, target, alias)
    }
    node.producer = edge
  }

  private node(ref: FileRefType): NodeEntry {
    const key = fileKey(ref)
    let node = this.nodes.get(key)
    if (!node) {
      node = { ref, consumers: [] }
      this.nodes.set(key, node)
    }
    return node
  }
}
