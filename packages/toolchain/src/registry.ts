import {
  CompilerFamilyType,
  LanguageType,
  PlatformNameType,
  ToolchainDescriptor,
  ToolchainKey,
  UnsupportedToolchainError,
  toolchainKeyString,
} from '@buildplan/model'
import { Logger, makeLogger } from '@buildplan/logger'
import { deepFreeze } from '@buildplan/utils'

import { ToolchainEnvironmentType } from './environment.js'
import { PLATFORMS } from './platforms.js'
import { ccDescriptor } from './families/cc.js'
import { msvcDescriptor } from './families/msvc.js'

export type DescriptorBuilder = (
  key: ToolchainKey,
  env: ToolchainEnvironmentType,
) => ToolchainDescriptor

export interface ToolchainLookup {
  resolve(key: ToolchainKey, site?: string): ToolchainDescriptor
  supports(key: ToolchainKey): boolean
}

const LANGUAGES: readonly LanguageType[] = ['c', 'c++']

const BUILT_IN: ReadonlyArray<{
  family: CompilerFamilyType
  platforms: readonly PlatformNameType[]
  build: DescriptorBuilder
}> = [
  {
    family: 'gcc',
    platforms: ['linux', 'darwin'],
    build: (key, env) => ccDescriptor(key, 'gcc', PLATFORMS[key.platform], env),
  },
  {
    family: 'clang',
    platforms: ['linux', 'darwin'],
    build: (key, env) => ccDescriptor(key, 'clang', PLATFORMS[key.platform], env),
  },
  {
    family: 'msvc',
    platforms: ['windows'],
    build: (key, env) => msvcDescriptor(key, PLATFORMS[key.platform], env),
  },
]

/**
 * Maps {language, platform, compiler family} to command templates. A
 * descriptor is built on first use and the same frozen object is returned
 * for every later lookup of that key.
 */
export class ToolchainRegistry implements ToolchainLookup {
  private readonly logger: Logger = makeLogger('ToolchainRegistry')
  private readonly builders = new Map<string, DescriptorBuilder>()
  private readonly resolved = new Map<string, ToolchainDescriptor>()
  private readonly env: ToolchainEnvironmentType

  constructor(env: ToolchainEnvironmentType = {}, options: { builtIns?: boolean } = {}) {
    this.env = Object.freeze({ ...env })
    if (options.builtIns ?? true) {
      for (const entry of BUILT_IN) {
        for (const platform of entry.platforms) {
          for (const language of LANGUAGES) {
            this.register({ language, platform, family: entry.family }, entry.build)
          }
        }
      }
    }
  }

  public register(key: ToolchainKey, build: DescriptorBuilder): this {
    const id = toolchainKeyString(key)
    if (this.builders.has(id)) {
      throw new Error(`toolchain ${id} is already registered`)
    }
    this.builders.set(id, build)
    return this
  }

  public supports(key: ToolchainKey): boolean {
    return this.builders.has(toolchainKeyString(key))
  }

  public keys(): string[] {
    return [...this.builders.keys()]
  }

  public resolve(key: ToolchainKey, site?: string): ToolchainDescriptor {
    const id = toolchainKeyString(key)
    const cached = this.resolved.get(id)
    if (cached) return cached

    const build = this.builders.get(id)
    if (!build) {
      throw new UnsupportedToolchainError(key, site, this.keys())
    }

    const descriptor = deepFreeze(build(key, this.env))
    this.resolved.set(id, descriptor)
    this.logger.debug(`resolved toolchain ${id}`)
    return descriptor
  }
}
