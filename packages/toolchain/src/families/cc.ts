import {
  CommandTemplate,
  FileRefType,
  FlagRules,
  LibraryKindType,
  OutputNaming,
  PlatformInfo,
  ToolchainDescriptor,
  ToolchainKey,
  buildFile,
  lit,
  litArgs,
  pathArg,
  t,
} from '@buildplan/model'
import { posixBasename, posixDirname, splitExtension } from '@buildplan/utils'

import { ToolchainEnvironmentType, envWords } from '../environment.js'

const DRIVERS = {
  gcc: { c: 'gcc', 'c++': 'g++' },
  clang: { c: 'clang', 'c++': 'clang++' },
} as const

export type CcFamily = keyof typeof DRIVERS

const joinDir = (dir: string, file: string): string => (dir === '.' ? file : `${dir}/${file}`)

export function ccFlagRules(platform: PlatformInfo): FlagRules {
  const libPattern = new RegExp(
    `^${platform.staticLibrary.prefix}(.+)(?:${[platform.staticLibrary.suffix, platform.sharedLibrary.suffix]
      .map((s) => s.replace('.', '\\.'))
      .join('|')})$`,
  )

  return {
    includeDir: (dir) => pathArg(dir, '-I'),
    define: (definition) => lit(`-D${definition}`),
    libraryDir: (dir) => pathArg(dir, '-L'),
    linkLibrary(library: FileRefType) {
      const match = libPattern.exec(posixBasename(library.path))
      return match ? [lit(`-l${match[1]}`)] : [pathArg(library)]
    },
    rpath(relativeDirs) {
      if (!platform.hasRpath || relativeDirs.length === 0) return []
      const entries = relativeDirs.map((dir) => (dir === '.' ? '$ORIGIN' : `$ORIGIN/${dir}`))
      return [lit(`-Wl,-rpath,${entries.join(':')}`)]
    },
    positionIndependent: platform.name === 'windows' ? [] : [lit('-fPIC')],
  }
}

export function ccNaming(platform: PlatformInfo): OutputNaming {
  return {
    object: (target, source) =>
      buildFile(`${target}.dir/${splitExtension(source.path).stem}${platform.objectSuffix}`),
    executable: (name) => buildFile(name + platform.executableSuffix),
    library(name: string, kind: LibraryKindType) {
      const naming = kind === 'shared' ? platform.sharedLibrary : platform.staticLibrary
      const file = buildFile(
        joinDir(posixDirname(name), naming.prefix + posixBasename(name) + naming.suffix),
      )
      return { runtime: file, link: file }
    },
  }
}

/** gcc and clang share one command-line dialect. */
export function ccDescriptor(
  key: ToolchainKey,
  family: CcFamily,
  platform: PlatformInfo,
  env: ToolchainEnvironmentType,
): ToolchainDescriptor {
  const isCxx = key.language === 'c++'
  const driver = isCxx ? 'cxx' : 'cc'
  const flagsVar = isCxx ? 'cxxflags' : 'cflags'

  const compile: CommandTemplate = {
    rule: driver,
    verb: 'compile',
    tokens: [
      t.variable(driver),
      t.lit('-MMD'),
      t.lit('-MF'),
      t.depfile(),
      t.variable(flagsVar),
      t.slot('flags'),
      t.slot('includes'),
      t.lit('-c'),
      t.inputs(),
      t.lit('-o'),
      t.outputs(),
    ],
    depfileSuffix: '.d',
    deps: 'gcc',
  }

  const link = (shared: boolean): CommandTemplate => ({
    rule: shared ? `link_${driver}_shared` : `link_${driver}`,
    verb: 'link',
    tokens: [
      t.variable(driver),
      ...(shared ? [t.lit('-shared')] : []),
      t.variable('ldflags'),
      t.slot('flags'),
      t.slot('libdirs'),
      t.inputs(),
      t.slot('libs'),
      t.variable('ldlibs'),
      t.lit('-o'),
      t.outputs(),
    ],
  })

  const archive: CommandTemplate = {
    rule: 'ar',
    verb: 'archive',
    tokens: [t.variable('ar'), t.variable('arflags'), t.outputs(), t.inputs()],
  }

  return {
    key,
    platform,
    variables: [
      { name: driver, value: litArgs(envWords(env, isCxx ? 'CXX' : 'CC', [DRIVERS[family][key.language]])) },
      {
        name: flagsVar,
        value: litArgs([...envWords(env, isCxx ? 'CXXFLAGS' : 'CFLAGS'), ...envWords(env, 'CPPFLAGS')]),
      },
      { name: 'ldflags', value: litArgs(envWords(env, 'LDFLAGS')) },
      { name: 'ldlibs', value: litArgs(envWords(env, 'LDLIBS')) },
      { name: 'ar', value: litArgs(envWords(env, 'AR', ['ar'])) },
      { name: 'arflags', value: litArgs(envWords(env, 'ARFLAGS', ['crs'])) },
    ],
    compileFlagsVariable: flagsVar,
    linkFlagsVariable: 'ldflags',
    compile,
    linkExecutable: link(false),
    linkShared: link(true),
    archive,
    flags: ccFlagRules(platform),
    naming: ccNaming(platform),
  }
}
