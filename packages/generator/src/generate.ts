import fs from 'node:fs'
import path from 'node:path'
import {
  CompilerFamilyType,
  InvalidDescriptionError,
  PlatformNameType,
} from '@buildplan/model'
import { OptionSchema, loadOptionFile } from '@buildplan/options'
import { ToolchainEnvironmentType, ToolchainRegistry } from '@buildplan/toolchain'
import { BuildContext, evaluateDescription, loadDescription } from '@buildplan/evaluator'
import { DiskFileSystemView, GraphBuilder } from '@buildplan/graph'
import { DEFAULT_BACKEND, createEmitter } from '@buildplan/backends'
import { makeLogger } from '@buildplan/logger'
import { relativePosix } from '@buildplan/utils'

import { writeArtifacts } from './writer.js'
import {
  ENVIRONMENT_VERSION,
  RecordedEnvironmentType,
  environmentArtifact,
  loadEnvironment,
} from './environment.js'

const logger = makeLogger('generate')

export const DESCRIPTION_FILES = ['build.json', 'build.yaml', 'build.yml'] as const
export const OPTION_FILES = ['options.json', 'options.yaml', 'options.yml'] as const

export interface GenerateRequest {
  srcdir: string
  builddir: string
  /** description file relative to srcdir; found by name when omitted */
  description?: string
  /** option declaration file relative to srcdir; found by name when omitted */
  optionsFile?: string
  backend?: string
  platform: PlatformNameType
  family: CompilerFamilyType
  /** invocation-level option overrides, as given on the command line */
  overrides?: Readonly<Record<string, string>>
  toolchainEnv?: ToolchainEnvironmentType
  /** argv that runs this generator; the emitted file re-runs `<command> regenerate .` */
  command?: readonly string[]
}

export interface GenerateResult {
  readonly backend: string
  /** absolute paths of every file written */
  readonly files: readonly string[]
  readonly environment: RecordedEnvironmentType
  readonly targets: number
  readonly edges: number
}

const findFirst = (dir: string, names: readonly string[]): string | undefined =>
  names.find((name) => fs.existsSync(path.join(dir, name)))

function findDescription(srcdir: string): string {
  const found = findFirst(srcdir, DESCRIPTION_FILES)
  if (!found) {
    throw new InvalidDescriptionError(srcdir, [
      `no build description found (looked for ${DESCRIPTION_FILES.join(', ')})`,
    ])
  }
  return found
}

export interface ProjectOptions {
  /** option declaration file relative to srcdir, when the project has one */
  readonly file?: string
  readonly schema: OptionSchema
}

/** The options a project declares, found and loaded the way configure does. */
export function projectOptions(srcdir: string, optionsFile?: string): ProjectOptions {
  const name = optionsFile ?? findFirst(srcdir, OPTION_FILES)
  if (name === undefined) return { schema: new OptionSchema() }
  const file = relativePosix(srcdir, path.resolve(srcdir, name))
  return { file, schema: loadOptionFile(path.resolve(srcdir, file)) }
}

/**
 * One generation run: resolve options, evaluate the description, build the
 * graph, emit, write. Nothing touches the build directory until emission has
 * succeeded, and then every file goes in atomically.
 */
export function generate(request: GenerateRequest): GenerateResult {
  const srcdir = path.resolve(request.srcdir)
  const builddir = path.resolve(request.builddir)
  const backend = request.backend ?? DEFAULT_BACKEND
  const emitter = createEmitter(backend)

  // the description and option file are kept relative to srcdir, even when given absolute
  const description = relativePosix(
    srcdir,
    path.resolve(srcdir, request.description ?? findDescription(srcdir)),
  )
  const overrides = { ...(request.overrides ?? {}) }
  const toolchainEnv = { ...(request.toolchainEnv ?? {}) }
  logger.info(`configuring ${builddir}`, { srcdir, description, backend })

  const parsed = loadDescription(path.resolve(srcdir, description))
  const { file: optionsFile, schema } = projectOptions(srcdir, request.optionsFile)
  const options = schema.resolve({ project: parsed.options, invocation: overrides })

  const context = new BuildContext({
    platform: request.platform,
    family: request.family,
    toolchains: new ToolchainRegistry(toolchainEnv),
    options,
    source: description,
    buildInputs: optionsFile ? [description, optionsFile] : [description],
  })
  evaluateDescription(parsed, context, description)
  const registry = context.seal()

  const graph = new GraphBuilder({
    fs: new DiskFileSystemView(srcdir),
    srcdir: relativePosix(builddir, srcdir),
    ...(request.command ? { regenerate: [...request.command, 'regenerate', '.'] } : {}),
  }).build(registry)

  const { artifacts } = emitter.emit(graph)
  const environment: RecordedEnvironmentType = {
    version: ENVIRONMENT_VERSION,
    srcdir,
    description,
    ...(optionsFile ? { optionsFile } : {}),
    backend,
    platform: request.platform,
    family: request.family,
    overrides,
    toolchainEnv,
  }
  const files = writeArtifacts(builddir, [...artifacts, environmentArtifact(environment)])

  logger.info(`generated ${artifacts.map((artifact) => artifact.path).join(', ')}`, {
    builddir,
    targets: registry.targets.length,
    edges: graph.edges.length,
  })
  return {
    backend,
    files,
    environment,
    targets: registry.targets.length,
    edges: graph.edges.length,
  }
}

/** Re-runs generation for `builddir` with the arguments recorded by configure. */
export function regenerate(builddir: string, command?: readonly string[]): GenerateResult {
  const recorded = loadEnvironment(builddir)
  return generate({
    srcdir: recorded.srcdir,
    builddir,
    description: recorded.description,
    optionsFile: recorded.optionsFile,
    backend: recorded.backend,
    platform: recorded.platform,
    family: recorded.family,
    overrides: recorded.overrides,
    toolchainEnv: recorded.toolchainEnv,
    command,
  })
}
