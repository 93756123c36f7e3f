import {
  CommandTemplate,
  FlagRules,
  OutputNaming,
  PlatformInfo,
  Token,
  ToolchainDescriptor,
  ToolchainKey,
  buildFile,
  lit,
  litArgs,
  pathArg,
  t,
} from '@buildplan/model'
import { posixBasename, splitExtension } from '@buildplan/utils'

import { ToolchainEnvironmentType, envWords } from '../environment.js'

const msvcFlagRules: FlagRules = {
  includeDir: (dir) => pathArg(dir, '/I'),
  define: (definition) => lit(`/D${definition}`),
  libraryDir: (dir) => pathArg(dir, '/LIBPATH:'),
  linkLibrary: (library) => [lit(posixBasename(library.path))],
  rpath: () => [],
  positionIndependent: [],
}

function msvcNaming(platform: PlatformInfo): OutputNaming {
  return {
    object: (target, source) =>
      buildFile(`${target}.dir/${splitExtension(source.path).stem}${platform.objectSuffix}`),
    executable: (name) => buildFile(name + platform.executableSuffix),
    library(name, kind) {
      if (kind === 'static') {
        const file = buildFile(name + platform.staticLibrary.suffix)
        return { runtime: file, link: file }
      }
      return {
        runtime: buildFile(name + platform.sharedLibrary.suffix),
        link: buildFile(name + '.lib'),
      }
    },
  }
}

export function msvcDescriptor(
  key: ToolchainKey,
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
      t.lit('/nologo'),
      t.lit('/showIncludes'),
      t.variable(flagsVar),
      t.slot('flags'),
      t.slot('includes'),
      t.lit('/c'),
      t.inputs(),
      t.outputs('/Fo'),
    ],
    deps: 'msvc',
  }

  // link.exe command lines overflow quickly; inputs go through a response file
  const linkInputs: Token[] = [t.inputs(), t.slot('libdirs'), t.slot('libs'), t.variable('ldlibs')]

  const linkExecutable: CommandTemplate = {
    rule: 'link',
    verb: 'link',
    tokens: [
      t.variable('link'),
      t.lit('/nologo'),
      t.variable('ldflags'),
      t.slot('flags'),
      t.rspfile('@'),
      t.outputs('/OUT:'),
    ],
    responseFile: linkInputs,
  }

  const linkShared: CommandTemplate = {
    rule: 'link_shared',
    verb: 'link',
    tokens: [
      t.variable('link'),
      t.lit('/nologo'),
      t.lit('/DLL'),
      t.variable('ldflags'),
      t.slot('flags'),
      t.rspfile('@'),
      t.outputs('/OUT:', 0),
      t.outputs('/IMPLIB:', 1),
    ],
    responseFile: linkInputs,
  }

  const archive: CommandTemplate = {
    rule: 'lib',
    verb: 'archive',
    tokens: [t.variable('lib'), t.lit('/nologo'), t.variable('arflags'), t.outputs('/OUT:'), t.inputs()],
  }

  return {
    key,
    platform,
    variables: [
      { name: driver, value: litArgs(envWords(env, isCxx ? 'CXX' : 'CC', ['cl'])) },
      {
        name: flagsVar,
        value: litArgs([...envWords(env, isCxx ? 'CXXFLAGS' : 'CFLAGS'), ...envWords(env, 'CPPFLAGS')]),
      },
      { name: 'link', value: [lit('link')] },
      { name: 'ldflags', value: litArgs(envWords(env, 'LDFLAGS')) },
      { name: 'ldlibs', value: litArgs(envWords(env, 'LDLIBS')) },
      { name: 'lib', value: litArgs(envWords(env, 'AR', ['lib'])) },
      { name: 'arflags', value: litArgs(envWords(env, 'ARFLAGS')) },
    ],
    compileFlagsVariable: flagsVar,
    linkFlagsVariable: 'ldflags',
    compile,
    linkExecutable,
    linkShared,
    archive,
    flags: msvcFlagRules,
    naming: msvcNaming(platform),
  }
}
