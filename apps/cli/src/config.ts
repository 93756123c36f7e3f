import { z } from 'zod'
import { CompilerFamily, EnvironmentError, PlatformName } from '@buildplan/model'
import { DEFAULT_BACKEND } from '@buildplan/backends'
import { makeLogger } from '@buildplan/logger'

const logger = makeLogger('cliConfig')

export const CliEnvironment = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  /** backend used when configure is not given --backend */
  BUILDPLAN_BACKEND: z.string().min(1).default(DEFAULT_BACKEND),
  BUILDPLAN_PLATFORM: PlatformName.optional(),
  BUILDPLAN_COMPILER: CompilerFamily.optional(),
})
export type CliEnvironmentType = z.infer<typeof CliEnvironment>

export type ProcessEnv = Readonly<Record<string, string | undefined>>

export function loadCliConfig(env: ProcessEnv): CliEnvironmentType {
  const parsed = CliEnvironment.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new EnvironmentError(`invalid environment: ${issues.join('; ')}`, { issues })
  }
  logger.trace(`backend: ${parsed.data.BUILDPLAN_BACKEND}`)
  logger.trace(`platform: ${parsed.data.BUILDPLAN_PLATFORM ?? '(host)'}`)
  return parsed.data
}
