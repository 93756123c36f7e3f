import { z } from 'zod'
import { Language, LibraryKind } from '@buildplan/model'

const Strings = z.array(z.string())

/** `{ target: name }` refers to the outputs of a target declared earlier. */
export const TargetRef = z.object({ target: z.string().min(1) }).strict()
export type TargetRefType = z.infer<typeof TargetRef>

/** `{ build: path }` names a file in the build directory, usually a command's output. */
export const BuildRef = z.object({ build: z.string().min(1) }).strict()
export type BuildRefType = z.infer<typeof BuildRef>

const FileEntry = z.union([z.string().min(1), TargetRef, BuildRef])

const DeclarationBase = {
  name: z.string().min(1),
  /** name of a bool option; the target is declared only when it is true */
  when: z.string().optional(),
}

const CompiledFields = {
  ...DeclarationBase,
  sources: z.array(FileEntry).min(1),
  flags: Strings.optional(),
  linkFlags: Strings.optional(),
  includes: Strings.optional(),
  defines: Strings.optional(),
  libs: Strings.optional(),
  orderOnly: Strings.optional(),
  language: Language.optional(),
}

const ExecutableDecl = z
  .object({
    type: z.literal('executable'),
    ...CompiledFields,
  })
  .strict()

const LibraryDecl = z
  .object({
    type: z.literal('library'),
    ...CompiledFields,
    kind: LibraryKind.default('static'),
    publicIncludes: Strings.optional(),
  })
  .strict()

const CommandDecl = z
  .object({
    type: z.literal('command'),
    ...DeclarationBase,
    inputs: z.array(FileEntry).optional(),
    outputs: Strings.min(1),
    command: z.array(FileEntry).min(1),
    orderOnly: Strings.optional(),
    dependencyKind: z.enum(['normal', 'order-only']).default('normal'),
    description: z.string().optional(),
  })
  .strict()

const AliasDecl = z
  .object({
    type: z.literal('alias'),
    ...DeclarationBase,
    deps: Strings,
  })
  .strict()

export const TargetDeclaration = z.discriminatedUnion('type', [
  ExecutableDecl,
  LibraryDecl,
  CommandDecl,
  AliasDecl,
])
export type TargetDeclarationType = z.infer<typeof TargetDeclaration>

export const GlobalFlags = z
  .object({
    c: Strings.optional(),
    'c++': Strings.optional(),
    link: Strings.optional(),
  })
  .strict()

/**
 * Outer shape of a description file. Targets and global flags are checked
 * again after option values have been substituted into them.
 */
export const DescriptionFile = z
  .object({
    project: z.string().optional(),
    /** project-level option overrides */
    options: z.record(z.string(), z.unknown()).default({}),
    globalFlags: z.unknown().optional(),
    targets: z.array(z.unknown()).default([]),
    default: z.unknown().optional(),
  })
  .strict()
export type DescriptionFileType = z.infer<typeof DescriptionFile>

export const DefaultNames = Strings
