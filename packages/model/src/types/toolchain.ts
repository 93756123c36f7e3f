import { z } from 'zod'
import { Arg, CommandTemplate, GraphVariable } from './command.js'
import { FileRefType } from './file.js'

export const Language = z.enum(['c', 'c++'])
export type LanguageType = z.infer<typeof Language>

export const PlatformName = z.enum(['linux', 'darwin', 'windows'])
export type PlatformNameType = z.infer<typeof PlatformName>

export const CompilerFamily = z.enum(['gcc', 'clang', 'msvc'])
export type CompilerFamilyType = z.infer<typeof CompilerFamily>

export const LibraryKind = z.enum(['static', 'shared'])
export type LibraryKindType = z.infer<typeof LibraryKind>

export interface ToolchainKey {
  readonly language: LanguageType
  readonly platform: PlatformNameType
  readonly family: CompilerFamilyType
}

export const toolchainKeyString = (key: ToolchainKey): string =>
  `${key.language}/${key.platform}/${key.family}`

export interface PlatformInfo {
  readonly name: PlatformNameType
  readonly executableSuffix: string
  readonly objectSuffix: string
  readonly sharedLibrary: { readonly prefix: string; readonly suffix: string }
  readonly staticLibrary: { readonly prefix: string; readonly suffix: string }
  readonly hasImportLibrary: boolean
  readonly hasRpath: boolean
}

/** Files a library target produces: what runs, and what dependents link against. */
export interface LibraryFiles {
  readonly runtime: FileRefType
  readonly link: FileRefType
}

/** How abstract build settings are spelled on one compiler family's command line. */
export interface FlagRules {
  includeDir(dir: FileRefType): Arg
  define(definition: string): Arg
  libraryDir(dir: FileRefType): Arg
  linkLibrary(library: FileRefType): Arg[]
  rpath(relativeDirs: readonly string[]): Arg[]
  /** extra compile flags for objects going into a shared library */
  readonly positionIndependent: readonly Arg[]
}

export interface OutputNaming {
  /** objects of each target live in their own `<target>.dir/` directory */
  object(target: string, source: FileRefType): FileRefType
  executable(name: string): FileRefType
  library(name: string, kind: LibraryKindType): LibraryFiles
}

/**
 * Resolved command templates for one language, platform and compiler family.
 * Frozen once resolved and shared by every edge of that language.
 */
export interface ToolchainDescriptor {
  readonly key: ToolchainKey
  readonly platform: PlatformInfo
  readonly variables: readonly GraphVariable[]
  /** variable receiving flags declared through globalFlags(flags, language) */
  readonly compileFlagsVariable: string
  /** variable receiving flags declared through globalLinkFlags(flags) */
  readonly linkFlagsVariable: string
  readonly compile: CommandTemplate
  readonly linkExecutable: CommandTemplate
  readonly linkShared: CommandTemplate
  readonly archive: CommandTemplate
  readonly flags: FlagRules
  readonly naming: OutputNaming
}
