import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { CompilerFamily, EnvironmentError, PlatformName } from '@buildplan/model'
import { formatIssues } from '@buildplan/options'
import { ToolchainEnvironment } from '@buildplan/toolchain'
import { Artifact } from '@buildplan/backends'

export const ENVIRONMENT_VERSION = 2

/** Where configure records its arguments, relative to the build directory. */
export const ENVIRONMENT_FILE = '.buildplan/environment.json'

export const RecordedEnvironment = z
  .object({
    version: z.literal(ENVIRONMENT_VERSION),
    /** absolute source directory */
    srcdir: z.string().min(1),
    /** description file, relative to srcdir */
    description: z.string().min(1),
    optionsFile: z.string().min(1).optional(),
    backend: z.string().min(1),
    platform: PlatformName,
    family: CompilerFamily,
    overrides: z.record(z.string(), z.string()),
    /** toolchain variables as they were at configure time */
    toolchainEnv: ToolchainEnvironment,
  })
  .strict()
export type RecordedEnvironmentType = z.infer<typeof RecordedEnvironment>

export function environmentArtifact(env: RecordedEnvironmentType): Artifact {
  return { path: ENVIRONMENT_FILE, contents: JSON.stringify(env, null, 2) + '\n' }
}

export function loadEnvironment(builddir: string): RecordedEnvironmentType {
  const file = path.join(builddir, ENVIRONMENT_FILE)
  let doc: unknown
  try {
    doc = JSON.parse(fs.readFileSync(file, 'utf-8'))
  } catch (err) {
    throw new EnvironmentError(
      `cannot read ${file}: ${err instanceof Error ? err.message : String(err)}; run configure first`,
      { file },
    )
  }

  const version =
    typeof doc === 'object' && doc !== null && 'version' in doc ? doc.version : undefined
  if (version !== ENVIRONMENT_VERSION) {
    throw new EnvironmentError(
      `unsupported environment version ${JSON.stringify(version)} in ${file} (expected ${ENVIRONMENT_VERSION}); run configure again`,
      { file, version },
    )
  }

  const parsed = RecordedEnvironment.safeParse(doc)
  if (!parsed.success) {
    throw new EnvironmentError(`invalid environment ${file}: ${formatIssues(parsed.error).join('; ')}`, {
      file,
    })
  }
  return parsed.data
}
