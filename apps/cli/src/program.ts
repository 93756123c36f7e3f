import path from 'node:path'
import { Command, CommanderError, InvalidArgumentError } from 'commander'
import {
  CompilerFamily,
  CompilerFamilyType,
  ErrorCategory,
  PlatformName,
  PlatformNameType,
  isBuildPlanError,
} from '@buildplan/model'
import { createEmitter, listBackends } from '@buildplan/backends'
import { GenerateResult, generate, projectOptions, regenerate } from '@buildplan/generator'
import { optionHelpLines } from '@buildplan/options'
import {
  defaultCompilerFamily,
  hostPlatform,
  pickToolchainEnvironment,
} from '@buildplan/toolchain'
import { makeLogger, setLogLevel } from '@buildplan/logger'

import { CliEnvironmentType, ProcessEnv, loadCliConfig } from './config.js'

const logger = makeLogger('cli')

export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  description: 2,
  graph: 3,
  emission: 4,
} as const

const EXIT_BY_CATEGORY: Record<ErrorCategory, number> = {
  description: EXIT_CODES.description,
  graph: EXIT_CODES.graph,
  emission: EXIT_CODES.emission,
  environment: EXIT_CODES.usage,
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof CommanderError) {
    return err.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.usage
  }
  return isBuildPlanError(err) ? EXIT_BY_CATEGORY[err.category] : EXIT_CODES.usage
}

/** Where the CLI writes its own output; text is written as given. */
export interface CliIo {
  out(text: string): void
  err(text: string): void
}

const processIo: CliIo = {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
}

export interface RunOptions {
  env?: ProcessEnv
  io?: CliIo
  cwd?: string
  /** argv starting this CLI; generated files re-run `<command> regenerate .` */
  command?: readonly string[]
}

interface ConfigureOptions {
  srcdir: string
  description?: string
  optionsFile?: string
  backend: string
  platform: PlatformNameType
  compiler?: CompilerFamilyType
  define: Record<string, string>
}

function parsePlatform(value: string): PlatformNameType {
  const parsed = PlatformName.safeParse(value)
  if (!parsed.success) {
    throw new InvalidArgumentError(`expected one of: ${PlatformName.options.join(', ')}`)
  }
  return parsed.data
}

function parseCompiler(value: string): CompilerFamilyType {
  const parsed = CompilerFamily.safeParse(value)
  if (!parsed.success) {
    throw new InvalidArgumentError(`expected one of: ${CompilerFamily.options.join(', ')}`)
  }
  return parsed.data
}

function collectDefine(value: string, previous: Record<string, string>): Record<string, string> {
  const eq = value.indexOf('=')
  if (eq <= 0) {
    throw new InvalidArgumentError('expected name=value')
  }
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) }
}

/** Help lines for the options the project in `srcdir` declares. */
function projectOptionsHelp(srcdir: string, optionsFile: string | undefined): string {
  try {
    const { file, schema } = projectOptions(srcdir, optionsFile)
    const lines = optionHelpLines(schema.declarations())
    if (file === undefined || lines.length === 0) return ''
    return `\nProject options (${file}):\n${lines.join('\n')}`
  } catch (err) {
    return `\nProject options: ${err instanceof Error ? err.message : String(err)}`
  }
}

export function createProgram(
  config: CliEnvironmentType,
  { env = process.env, io = processIo, cwd = process.cwd(), command }: RunOptions = {},
): Command {
  const report = (result: GenerateResult): void => {
    for (const file of result.files) {
      io.out(`wrote ${path.relative(cwd, file)}\n`)
    }
  }

  const program = new Command()
  program
    .name('buildplan')
    .description('Generate ninja or make build files from a project description')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err })

  // buildplan configure build --backend make -D debug=true
  const configure = program
    .command('configure')
    .description('Generate the build files for <builddir>')
    .argument('<builddir>', 'build directory to write into')
    .option('-s, --srcdir <dir>', 'source directory holding the description', '.')
    .option('--description <file>', 'description file, relative to the source directory')
    .option('--options-file <file>', 'option declaration file, relative to the source directory')
    .option(
      '-b, --backend <name>',
      `backend to emit (${listBackends().join(', ')})`,
      config.BUILDPLAN_BACKEND,
    )
    .option(
      '--platform <name>',
      'platform to build for',
      parsePlatform,
      config.BUILDPLAN_PLATFORM ?? hostPlatform(),
    )
    .option('--compiler <family>', 'compiler family (gcc, clang, msvc)', parseCompiler)
    .option('-D, --define <name=value>', 'override an option; repeatable', collectDefine, {})
    .action((builddir: string, opts: ConfigureOptions) => {
      const family =
        opts.compiler ?? config.BUILDPLAN_COMPILER ?? defaultCompilerFamily(opts.platform)
      logger.debug(`configure ${builddir}`, { ...opts, family })
      report(
        generate({
          srcdir: path.resolve(cwd, opts.srcdir),
          builddir: path.resolve(cwd, builddir),
          description: opts.description,
          optionsFile: opts.optionsFile,
          backend: opts.backend,
          platform: opts.platform,
          family,
          overrides: opts.define,
          toolchainEnv: pickToolchainEnvironment(env),
          command,
        }),
      )
    })
  configure.addHelpText('after', () => {
    const opts = configure.opts()
    const srcdir = typeof opts.srcdir === 'string' ? opts.srcdir : '.'
    const optionsFile = typeof opts.optionsFile === 'string' ? opts.optionsFile : undefined
    return projectOptionsHelp(path.resolve(cwd, srcdir), optionsFile)
  })

  // buildplan regenerate build
  program
    .command('regenerate')
    .description('Re-run configure with the arguments recorded in <builddir>')
    .argument('[builddir]', 'build directory', '.')
    .action((builddir: string) => {
      report(regenerate(path.resolve(cwd, builddir), command))
    })

  program
    .command('backends')
    .description('List the backends and what they can express')
    .action(() => {
      for (const name of listBackends()) {
        const { primaryFile, capabilities } = createEmitter(name)
        const features: string[] = []
        if (capabilities.orderOnly) features.push('order-only')
        if (capabilities.multiOutput) features.push('multi-output')
        if (capabilities.responseFiles) features.push('response-files')
        io.out(
          `${name}\t${primaryFile}\t${features.join(',') || '-'}\tdeps=${capabilities.depfiles.join(',')}\n`,
        )
      }
    })

  return program
}

/** Runs one CLI invocation and returns its exit code. */
export function run(argv: readonly string[], options: RunOptions = {}): number {
  const io = options.io ?? processIo
  try {
    const config = loadCliConfig(options.env ?? process.env)
    setLogLevel(config.LOG_LEVEL)
    createProgram(config, options).parse([...argv], { from: 'user' })
    return EXIT_CODES.ok
  } catch (err) {
    const code = exitCodeFor(err)
    // commander has already printed its own message
    if (!(err instanceof CommanderError)) {
      io.err(`buildplan: ${err instanceof Error ? err.message : String(err)}\n`)
      logger.debug('generation failed', {
        exitCode: code,
        ...(isBuildPlanError(err) ? { code: err.code, details: err.details } : {}),
      })
    }
    return code
  }
}
