import {
  AliasTarget,
  Arg,
  CommandDependencyKind,
  CompiledTarget,
  CompilerFamilyType,
  CustomCommandTarget,
  DuplicateTargetNameError,
  ExecutableTarget,
  FileRefType,
  InvalidDescriptionError,
  LanguageType,
  LibraryKindType,
  LibraryTarget,
  PlatformNameType,
  SourceFile,
  Target,
  TargetHandle,
  TargetRegistry,
  ToolchainDescriptor,
  UndeclaredTargetError,
  buildFile,
  fileKey,
  lit,
  pathArg,
  srcFile,
} from '@buildplan/model'
import { OptionValue, ResolvedOptions } from '@buildplan/options'
import { ToolchainLookup, classifySource, linkLanguage } from '@buildplan/toolchain'
import { Logger, makeLogger } from '@buildplan/logger'
import { Many, RelativePath, canonicalPath, deepFreeze, listify, uniques } from '@buildplan/utils'

/** A file in the build directory, such as one a custom command writes. */
export class BuildPath {
  constructor(public readonly path: string) {}
}

export const buildPath = (path: string): BuildPath => new BuildPath(path)

/**
 * A source path relative to the source directory, a build directory path, or
 * the outputs of a declared target.
 */
export type FileInput = string | BuildPath | TargetHandle

export interface DeclarationSite {
  /** where the declaration came from, used in error messages */
  site?: string
}

export interface CompiledOptions extends DeclarationSite {
  sources: Many<FileInput>
  flags?: Many<string>
  linkFlags?: Many<string>
  /** include directories, relative to the source directory */
  includes?: Many<string>
  defines?: Many<string>
  libs?: Many<TargetHandle>
  /** targets built before any compile step of this one, without making it stale */
  orderOnly?: Many<TargetHandle>
  /** compile every source as this language instead of guessing from its extension */
  language?: LanguageType
}

export interface LibraryOptions extends CompiledOptions {
  kind: LibraryKindType
  /** include directories handed on to every target linking this library */
  publicIncludes?: Many<string>
}

export type CommandArg = string | BuildPath | TargetHandle

export interface CustomCommandOptions extends DeclarationSite {
  inputs?: Many<FileInput>
  /** paths relative to the build directory */
  outputs: Many<string>
  /** argv; `${in}` and `${out}` stand for every input and every output */
  command: readonly CommandArg[]
  orderOnly?: Many<TargetHandle>
  dependencyKind?: CommandDependencyKind
  description?: string
}

export interface BuildContextSettings {
  platform: PlatformNameType
  family: CompilerFamilyType
  toolchains: ToolchainLookup
  options?: ResolvedOptions
  /** name of the description in default declaration sites */
  source?: string
  /** description files, relative to the source directory */
  buildInputs?: readonly string[]
}

const IN = '${in}'
const OUT = '${out}'

/**
 * Collects target declarations for one generation run. Every declaration is
 * checked as it is made: names must be unique, and every handle must come
 * from this context and name a target declared earlier.
 */
export class BuildContext {
  private readonly logger: Logger
  private readonly owner = Symbol('BuildContext')
  private readonly targets: Target[] = []
  private readonly byName = new Map<string, Target>()
  private readonly compileFlags = new Map<LanguageType, string[]>()
  private readonly linkFlags: string[] = []
  private readonly defaultNames: string[] = []
  private readonly options: ResolvedOptions
  private readonly source: string
  private sealed?: TargetRegistry

  constructor(private readonly settings: BuildContextSettings) {
    this.options = settings.options ?? ResolvedOptions.empty()
    this.source = settings.source ?? 'build description'
    this.logger = makeLogger('BuildContext', { source: this.source })
  }

  public executable(name: string, opts: CompiledOptions): TargetHandle {
    const site = this.siteOf(name, opts)
    const compiled = this.compiled(name, site, opts)
    const descriptor = this.toolchain(compiled.linkLanguage, compiled.toolchains, site)
    const target: ExecutableTarget = {
      ...compiled,
      kind: 'executable',
      outputs: [descriptor.naming.executable(compiled.name)],
    }
    return this.add(target)
  }

  public library(name: string, opts: LibraryOptions): TargetHandle {
    const site = this.siteOf(name, opts)
    const compiled = this.compiled(name, site, opts)
    const descriptor = this.toolchain(compiled.linkLanguage, compiled.toolchains, site)
    const files = descriptor.naming.library(compiled.name, opts.kind)
    const outputs =
      fileKey(files.runtime) === fileKey(files.link) ? [files.runtime] : [files.runtime, files.link]
    const target: LibraryTarget = {
      ...compiled,
      kind: 'library',
      libraryKind: opts.kind,
      files,
      outputs,
      publicIncludes: this.sourceDirs(opts.publicIncludes, site),
    }
    return this.add(target)
  }

  public customCommand(name: string, opts: CustomCommandOptions): TargetHandle {
    const site = this.siteOf(name, opts)
    this.assertOpen()
    const targetName = this.targetName(name, site)

    const inputs = uniques(
      listify(opts.inputs).flatMap((input) => this.files(input, site)),
      fileKey,
    )
    const outputs = listify(opts.outputs).map((output) => buildFile(this.relative(output, site)))
    if (outputs.length === 0) {
      throw new InvalidDescriptionError(site, [`command '${targetName}' declares no outputs`])
    }
    if (opts.command.length === 0) {
      throw new InvalidDescriptionError(site, [`command '${targetName}' has an empty command`])
    }

    const implicit: FileRefType[] = []
    const argv: Arg[] = opts.command.flatMap((arg): Arg[] => {
      if (arg === IN) return inputs.map((ref) => pathArg(ref))
      if (arg === OUT) return outputs.map((ref) => pathArg(ref))
      if (typeof arg === 'string') return [lit(arg)]
      const refs = this.files(arg, site)
      implicit.push(...refs)
      return refs.map((ref) => pathArg(ref))
    })
    const inputKeys = new Set(inputs.map(fileKey))

    const target: CustomCommandTarget = {
      id: this.targets.length,
      name: targetName,
      site,
      kind: 'custom-command',
      inputs,
      implicit: uniques(
        implicit.filter((ref) => !inputKeys.has(fileKey(ref))),
        fileKey,
      ),
      orderOnly: this.handleFiles(opts.orderOnly, site),
      outputs,
      argv,
      dependencyKind: opts.dependencyKind ?? 'normal',
      ...(opts.description !== undefined ? { description: opts.description } : {}),
    }
    return this.add(target)
  }

  public alias(name: string, deps: Many<TargetHandle>, opts: DeclarationSite = {}): TargetHandle {
    const site = this.siteOf(name, opts)
    this.assertOpen()
    const target: AliasTarget = {
      id: this.targets.length,
      name: this.targetName(name, site),
      site,
      kind: 'alias',
      outputs: [],
      deps: listify(deps).map((handle) => this.handle(handle, site)),
    }
    return this.add(target)
  }

  /** Flags passed to every compile step of `language`, after the toolchain's own. */
  public globalFlags(flags: Many<string>, language: LanguageType): void {
    this.assertOpen()
    const current = this.compileFlags.get(language) ?? []
    this.compileFlags.set(language, [...current, ...listify(flags)])
  }

  public globalLinkFlags(flags: Many<string>): void {
    this.assertOpen()
    this.linkFlags.push(...listify(flags))
  }

  public option(name: string): OptionValue {
    return this.options.get(name)
  }

  /** Targets built by `all`. Without a call every executable and library is. */
  public defaults(...handles: TargetHandle[]): void {
    this.assertOpen()
    for (const handle of handles) {
      this.defaultNames.push(this.handle(handle, 'defaults').name)
    }
  }

  /** Looks up a target declared earlier by name, for descriptions that refer to targets by name. */
  public lookup(name: string, site: string): TargetHandle {
    const target = this.byName.get(name)
    if (!target) {
      throw new UndeclaredTargetError(name, site)
    }
    return this.handleOf(target)
  }

  /** Ends the declaration phase; the same registry is returned on every later call. */
  public seal(): TargetRegistry {
    if (this.sealed) return this.sealed

    const globalFlags: Partial<Record<LanguageType, readonly string[]>> = {}
    for (const [language, flags] of this.compileFlags) {
      globalFlags[language] = flags
    }
    this.sealed = deepFreeze({
      targets: this.targets,
      globalFlags,
      globalLinkFlags: this.linkFlags,
      defaults: uniques(this.defaultNames),
      buildInputs: (this.settings.buildInputs ?? []).map((file) => srcFile(file)),
    })
    this.logger.debug(`sealed with ${this.targets.length} target(s)`)
    return this.sealed
  }

  private compiled(
    name: string,
    site: string,
    opts: CompiledOptions,
  ): Omit<CompiledTarget, 'kind' | 'outputs'> {
    this.assertOpen()
    const targetName = this.targetName(name, site)

    const sources: SourceFile[] = []
    for (const input of listify(opts.sources)) {
      for (const ref of this.files(input, site)) {
        sources.push(this.classify(ref, opts.language, site))
      }
    }
    const languages = uniques(
      sources.flatMap((source) => (source.language ? [source.language] : [])),
    )
    if (languages.length === 0) {
      throw new InvalidDescriptionError(site, [`'${targetName}' has no source files to compile`])
    }

    const toolchains: Partial<Record<LanguageType, ToolchainDescriptor>> = {}
    for (const language of languages) {
      toolchains[language] = this.settings.toolchains.resolve(
        { language, platform: this.settings.platform, family: this.settings.family },
        site,
      )
    }

    const libs = listify(opts.libs).map((handle) => {
      const target = this.targetOf(handle, site)
      if (target.kind !== 'library') {
        throw new InvalidDescriptionError(site, [`'${target.name}' is not a library`])
      }
      return target
    })

    return {
      id: this.targets.length,
      name: targetName,
      site,
      sources: uniques(sources, (source) => fileKey(source.ref)),
      flags: listify(opts.flags),
      defines: listify(opts.defines),
      linkFlags: listify(opts.linkFlags),
      includes: this.sourceDirs(opts.includes, site),
      libs,
      orderOnly: this.handleFiles(opts.orderOnly, site),
      toolchains,
      linkLanguage: linkLanguage(languages),
    }
  }

  private toolchain(
    language: LanguageType,
    toolchains: Partial<Record<LanguageType, ToolchainDescriptor>>,
    site: string,
  ): ToolchainDescriptor {
    return (
      toolchains[language] ??
      this.settings.toolchains.resolve(
        { language, platform: this.settings.platform, family: this.settings.family },
        site,
      )
    )
  }

  private classify(ref: FileRefType, language: LanguageType | undefined, site: string): SourceFile {
    const found = classifySource(ref.path)
    if (found.kind === 'header') return { ref }
    if (language) return { ref, language }
    if (found.kind === 'source') return { ref, language: found.language }
    throw new InvalidDescriptionError(site, [
      `cannot tell the language of '${ref.path}'; set 'language' to compile it`,
    ])
  }

  private add(target: Target): TargetHandle {
    this.targets.push(target)
    this.byName.set(target.name, target)
    this.logger.trace(`declared ${target.kind} ${target.name}`, { site: target.site })
    return this.handleOf(target)
  }

  private handleOf(target: Target): TargetHandle {
    return new TargetHandle(target.id, target.name, target.kind, target.outputs, this.owner)
  }

  private targetName(name: string, site: string): string {
    const parsed = RelativePath.safeParse(name)
    if (!parsed.success) {
      throw new InvalidDescriptionError(site, [`'${name}' is not a valid target name`])
    }
    const previous = this.byName.get(parsed.data)
    if (previous) {
      throw new DuplicateTargetNameError(parsed.data, site, previous.site)
    }
    return parsed.data
  }

  /** Accepts only handles this context issued. */
  private targetOf(handle: TargetHandle, site: string): Target {
    const target = handle.owner === this.owner ? this.targets[handle.id] : undefined
    if (!target || target.name !== handle.name) {
      throw new UndeclaredTargetError(handle.name, site)
    }
    return target
  }

  private handle(handle: TargetHandle, site: string): TargetHandle {
    return this.handleOf(this.targetOf(handle, site))
  }

  /** Files a dependency on `input` stands for; aliases stand for everything they group. */
  private files(input: FileInput, site: string): FileRefType[] {
    if (typeof input === 'string') {
      return [srcFile(this.relative(input, site))]
    }
    if (input instanceof BuildPath) {
      return [buildFile(this.relative(input.path, site))]
    }
    return this.targetFiles(this.targetOf(input, site))
  }

  private targetFiles(target: Target): FileRefType[] {
    if (target.kind !== 'alias') return [...target.outputs]
    return uniques(
      target.deps.flatMap((dep) => this.targetFiles(this.targetOf(dep, target.site))),
      fileKey,
    )
  }

  private handleFiles(handles: Many<TargetHandle>, site: string): FileRefType[] {
    return uniques(
      listify(handles).flatMap((handle) => this.files(handle, site)),
      fileKey,
    )
  }

  private sourceDirs(dirs: Many<string>, site: string): FileRefType[] {
    return uniques(
      listify(dirs).map((dir) => srcFile(dir === '.' ? '.' : this.relative(dir, site))),
      fileKey,
    )
  }

  private relative(raw: string, site: string): string {
    const canonical = canonicalPath(raw)
    if (canonical === undefined) {
      throw new InvalidDescriptionError(site, [`'${raw}' is not a path inside the project`])
    }
    return canonical
  }

  private siteOf(name: string, opts: DeclarationSite): string {
    return opts.site ?? `${this.source}: ${name}`
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new Error('the build context is sealed; declarations are closed')
    }
  }
}
