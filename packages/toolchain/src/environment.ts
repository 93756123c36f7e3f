import { z } from 'zod'
import { shellSplit } from '@buildplan/utils'

export const TOOLCHAIN_VARIABLES = [
  'CC',
  'CXX',
  'CFLAGS',
  'CXXFLAGS',
  'CPPFLAGS',
  'LDFLAGS',
  'LDLIBS',
  'AR',
  'ARFLAGS',
] as const

export const ToolchainEnvironment = z.partialRecord(z.enum(TOOLCHAIN_VARIABLES), z.string())
export type ToolchainEnvironmentType = Readonly<z.infer<typeof ToolchainEnvironment>>

/** Keeps only the variables the toolchains read, e.g. from process.env. */
export function pickToolchainEnvironment(
  env: Readonly<Record<string, string | undefined>>,
): ToolchainEnvironmentType {
  const picked: Partial<Record<(typeof TOOLCHAIN_VARIABLES)[number], string>> = {}
  for (const name of TOOLCHAIN_VARIABLES) {
    const value = env[name]
    if (value !== undefined) picked[name] = value
  }
  return picked
}

export function envWords(
  env: ToolchainEnvironmentType,
  name: (typeof TOOLCHAIN_VARIABLES)[number],
  fallback: string[] = [],
): string[] {
  const value = env[name]
  const words = value === undefined ? [] : shellSplit(value)
  return words.length > 0 ? words : fallback
}
