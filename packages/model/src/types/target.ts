import { Arg } from './command.js'
import { FileRefType } from './file.js'
import {
  LanguageType,
  LibraryFiles,
  LibraryKindType,
  ToolchainDescriptor,
} from './toolchain.js'

export type TargetKind = 'executable' | 'library' | 'custom-command' | 'alias'

/**
 * Returned by every declaration and accepted wherever another declaration
 * takes a dependency. Only the context that issued a handle accepts it.
 */
export class TargetHandle {
  constructor(
    public readonly id: number,
    public readonly name: string,
    public readonly kind: TargetKind,
    public readonly outputs: readonly FileRefType[],
    public readonly owner: symbol,
  ) {}

  toString(): string {
    return `<${this.kind} ${this.name}>`
  }
}

interface TargetBase {
  readonly id: number
  readonly name: string
  /** where the target was declared, e.g. "build.json: targets[2]" */
  readonly site: string
  /** primary outputs exposed to dependents */
  readonly outputs: readonly FileRefType[]
}

export interface SourceFile {
  readonly ref: FileRefType
  /** undefined for headers, which are tracked but never compiled */
  readonly language?: LanguageType
}

interface CompiledTargetBase extends TargetBase {
  readonly sources: readonly SourceFile[]
  readonly flags: readonly string[]
  readonly defines: readonly string[]
  readonly linkFlags: readonly string[]
  readonly includes: readonly FileRefType[]
  readonly libs: readonly LibraryTarget[]
  readonly orderOnly: readonly FileRefType[]
  readonly toolchains: Readonly<Partial<Record<LanguageType, ToolchainDescriptor>>>
  readonly linkLanguage: LanguageType
}

export interface ExecutableTarget extends CompiledTargetBase {
  readonly kind: 'executable'
}

export interface LibraryTarget extends CompiledTargetBase {
  readonly kind: 'library'
  readonly libraryKind: LibraryKindType
  readonly files: LibraryFiles
  /** include directories handed to every target linking this library */
  readonly publicIncludes: readonly FileRefType[]
}

export type CommandDependencyKind = 'normal' | 'order-only'

export interface CustomCommandTarget extends TargetBase {
  readonly kind: 'custom-command'
  readonly inputs: readonly FileRefType[]
  readonly implicit: readonly FileRefType[]
  readonly orderOnly: readonly FileRefType[]
  readonly argv: readonly Arg[]
  readonly dependencyKind: CommandDependencyKind
  readonly description?: string
}

export interface AliasTarget extends TargetBase {
  readonly kind: 'alias'
  readonly deps: readonly TargetHandle[]
}

export type CompiledTarget = ExecutableTarget | LibraryTarget
export type Target = ExecutableTarget | LibraryTarget | CustomCommandTarget | AliasTarget

export const isCompiledTarget = (target: Target): target is CompiledTarget =>
  target.kind === 'executable' || target.kind === 'library'

/** Everything one evaluation declared, handed to the graph builder. */
export interface TargetRegistry {
  readonly targets: readonly Target[]
  readonly globalFlags: Readonly<Partial<Record<LanguageType, readonly string[]>>>
  readonly globalLinkFlags: readonly string[]
  /** names of targets built by default; all compiled targets when empty */
  readonly defaults: readonly string[]
  /** description files the generated build plan was made from */
  readonly buildInputs: readonly FileRefType[]
}
