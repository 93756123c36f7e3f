import { CompilerFamilyType, PlatformInfo, PlatformNameType } from '@buildplan/model'

export const PLATFORMS: Readonly<Record<PlatformNameType, PlatformInfo>> = Object.freeze({
  linux: Object.freeze({
    name: 'linux',
    executableSuffix: '',
    objectSuffix: '.o',
    sharedLibrary: { prefix: 'lib', suffix: '.so' },
    staticLibrary: { prefix: 'lib', suffix: '.a' },
    hasImportLibrary: false,
    hasRpath: true,
  }),
  darwin: Object.freeze({
    name: 'darwin',
    executableSuffix: '',
    objectSuffix: '.o',
    sharedLibrary: { prefix: 'lib', suffix: '.dylib' },
    staticLibrary: { prefix: 'lib', suffix: '.a' },
    hasImportLibrary: false,
    hasRpath: false,
  }),
  windows: Object.freeze({
    name: 'windows',
    executableSuffix: '.exe',
    objectSuffix: '.obj',
    sharedLibrary: { prefix: '', suffix: '.dll' },
    staticLibrary: { prefix: '', suffix: '.lib' },
    hasImportLibrary: true,
    hasRpath: false,
  }),
})

export function hostPlatform(nodePlatform: string = process.platform): PlatformNameType {
  if (nodePlatform === 'win32' || nodePlatform === 'cygwin') return 'windows'
  if (nodePlatform === 'darwin') return 'darwin'
  return 'linux'
}

const DEFAULT_FAMILIES: Readonly<Record<PlatformNameType, CompilerFamilyType>> = {
  linux: 'gcc',
  darwin: 'clang',
  windows: 'msvc',
}

/** The compiler family chosen when none is asked for. */
export const defaultCompilerFamily = (platform: PlatformNameType): CompilerFamilyType =>
  DEFAULT_FAMILIES[platform]
