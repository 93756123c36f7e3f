export type ErrorCategory = 'description' | 'graph' | 'emission' | 'environment'

export const ERROR_CODES = {
  INVALID_OPTION: 'INVALID_OPTION',
  UNSUPPORTED_TOOLCHAIN: 'UNSUPPORTED_TOOLCHAIN',
  DUPLICATE_TARGET_NAME: 'DUPLICATE_TARGET_NAME',
  UNDECLARED_TARGET: 'UNDECLARED_TARGET',
  INVALID_DESCRIPTION: 'INVALID_DESCRIPTION',
  CONFLICTING_OUTPUT: 'CONFLICTING_OUTPUT',
  DANGLING_INPUT: 'DANGLING_INPUT',
  CYCLIC_DEPENDENCY: 'CYCLIC_DEPENDENCY',
  UNSUPPORTED_EDGE_KIND: 'UNSUPPORTED_EDGE_KIND',
  UNKNOWN_BACKEND: 'UNKNOWN_BACKEND',
  WRITE_FAILED: 'WRITE_FAILED',
  ENVIRONMENT: 'ENVIRONMENT',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

const CATEGORY_BY_CODE: Record<ErrorCode, ErrorCategory> = {
  INVALID_OPTION: 'description',
  UNSUPPORTED_TOOLCHAIN: 'description',
  DUPLICATE_TARGET_NAME: 'description',
  UNDECLARED_TARGET: 'description',
  INVALID_DESCRIPTION: 'description',
  CONFLICTING_OUTPUT: 'graph',
  DANGLING_INPUT: 'graph',
  CYCLIC_DEPENDENCY: 'graph',
  UNSUPPORTED_EDGE_KIND: 'emission',
  UNKNOWN_BACKEND: 'emission',
  WRITE_FAILED: 'emission',
  ENVIRONMENT: 'environment',
}

/**
 * Base of every generation failure. All of them are terminal for the current
 * run: nothing is emitted once one has been raised.
 */
export class BuildPlanError extends Error {
  public readonly category: ErrorCategory

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'BuildPlanError'
    this.category = CATEGORY_BY_CODE[code]
  }
}

export class InvalidOptionError extends BuildPlanError {
  constructor(
    public readonly option: string,
    reason: string,
    details?: Record<string, unknown>,
  ) {
    super(ERROR_CODES.INVALID_OPTION, `invalid option '${option}': ${reason}`, {
      option,
      ...details,
    })
    this.name = 'InvalidOptionError'
  }
}

export class UnsupportedToolchainError extends BuildPlanError {
  constructor(
    key: { language: string; platform: string; family: string },
    site?: string,
    supported: string[] = [],
  ) {
    super(
      ERROR_CODES.UNSUPPORTED_TOOLCHAIN,
      `no ${key.family} toolchain for ${key.language} on ${key.platform}`,
      { ...key, site, supported },
    )
    this.name = 'UnsupportedToolchainError'
  }
}

export class DuplicateTargetNameError extends BuildPlanError {
  constructor(name: string, site: string, previousSite: string) {
    super(
      ERROR_CODES.DUPLICATE_TARGET_NAME,
      `target '${name}' declared at ${site} was already declared at ${previousSite}`,
      { target: name, site, previousSite },
    )
    this.name = 'DuplicateTargetNameError'
  }
}

export class UndeclaredTargetError extends BuildPlanError {
  constructor(name: string, site: string) {
    super(ERROR_CODES.UNDECLARED_TARGET, `reference to undeclared target '${name}' at ${site}`, {
      target: name,
      site,
    })
    this.name = 'UndeclaredTargetError'
  }
}

export class InvalidDescriptionError extends BuildPlanError {
  constructor(source: string, issues: string[]) {
    super(
      ERROR_CODES.INVALID_DESCRIPTION,
      `invalid description ${source}:\n  ${issues.join('\n  ')}`,
      { source, issues },
    )
    this.name = 'InvalidDescriptionError'
  }
}

export class ConflictingOutputError extends BuildPlanError {
  constructor(output: string, target: string, previousTarget: string) {
    super(
      ERROR_CODES.CONFLICTING_OUTPUT,
      `'${output}' is produced by both '${previousTarget}' and '${target}'`,
      { output, target, previousTarget },
    )
    this.name = 'ConflictingOutputError'
  }
}

export class DanglingInputError extends BuildPlanError {
  constructor(input: string, target: string, site?: string) {
    super(
      ERROR_CODES.DANGLING_INPUT,
      `input '${input}' of '${target}' is neither an existing source file nor built by any target`,
      { input, target, site },
    )
    this.name = 'DanglingInputError'
  }
}

export class CyclicDependencyError extends BuildPlanError {
  constructor(public readonly cycle: string[]) {
    super(ERROR_CODES.CYCLIC_DEPENDENCY, `dependency cycle: ${cycle.join(' -> ')}`, { cycle })
    this.name = 'CyclicDependencyError'
  }
}

export class UnsupportedEdgeKindError extends BuildPlanError {
  constructor(
    public readonly backend: string,
    public readonly feature: string,
    target: string,
    output?: string,
  ) {
    super(
      ERROR_CODES.UNSUPPORTED_EDGE_KIND,
      `backend '${backend}' cannot express ${feature} (needed by '${target}'${output ? ` for '${output}'` : ''})`,
      { backend, feature, target, output },
    )
    this.name = 'UnsupportedEdgeKindError'
  }
}

export class UnknownBackendError extends BuildPlanError {
  constructor(backend: string, known: string[]) {
    super(
      ERROR_CODES.UNKNOWN_BACKEND,
      `unknown backend '${backend}'; expected one of: ${known.join(', ')}`,
      { backend, known },
    )
    this.name = 'UnknownBackendError'
  }
}

export class WriteFailedError extends BuildPlanError {
  constructor(file: string, cause: unknown) {
    super(
      ERROR_CODES.WRITE_FAILED,
      `failed to write ${file}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { file },
    )
    this.name = 'WriteFailedError'
  }
}

export class EnvironmentError extends BuildPlanError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.ENVIRONMENT, message, details)
    this.name = 'EnvironmentError'
  }
}

export const isBuildPlanError = (err: unknown): err is BuildPlanError =>
  err instanceof BuildPlanError
