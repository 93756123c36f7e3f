import { z } from 'zod'
import { InvalidOptionError } from '@buildplan/model'
import { Logger, makeLogger } from '@buildplan/logger'

import {
  OptionDeclaration,
  OptionSpec,
  OptionValue,
  OptionValidator,
  formatIssues,
} from './schema.js'
import { OptionLayer, ResolvedOptions } from './resolvedOptions.js'

export interface OverrideLayers {
  /** values set by the project description itself */
  project?: Readonly<Record<string, unknown>>
  /** values given for this invocation, usually raw strings from the command line */
  invocation?: Readonly<Record<string, unknown>>
}

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1'])
const FALSE_WORDS = new Set(['false', 'no', 'off', '0'])

const describe = (value: unknown): string => {
  if (Array.isArray(value)) return 'a list'
  if (value === null) return 'null'
  return `${typeof value} ${JSON.stringify(value)}`
}

// own keys only: an option may be called `constructor` or `toString`
const overrideOf = (
  layer: Readonly<Record<string, unknown>> | undefined,
  name: string,
): unknown => (layer !== undefined && Object.hasOwn(layer, name) ? layer[name] : undefined)

export class OptionSchema {
  private readonly logger: Logger = makeLogger('OptionSchema')
  private readonly specs = new Map<string, OptionSpec>()

  public static fromDeclarations(declarations: readonly unknown[]): OptionSchema {
    const schema = new OptionSchema()
    for (const declaration of declarations) {
      schema.declare(declaration)
    }
    return schema
  }

  /** Adds one option. The declaration, including its default, is validated immediately. */
  public declare(declaration: unknown, validator?: OptionValidator): this {
    const parsed = OptionDeclaration.safeParse(declaration)
    if (!parsed.success) {
      const name =
        typeof declaration === 'object' && declaration !== null && 'name' in declaration
          ? String(declaration.name)
          : '<unnamed>'
      throw new InvalidOptionError(name, formatIssues(parsed.error).join('; '))
    }

    const spec: OptionSpec = validator ? { ...parsed.data, validator } : parsed.data
    if (this.specs.has(spec.name)) {
      throw new InvalidOptionError(spec.name, 'declared more than once')
    }
    if (spec.type === 'enum' && !spec.values.includes(spec.default)) {
      throw new InvalidOptionError(spec.name, `default '${spec.default}' is not one of its values`)
    }
    this.check(spec, spec.default, 'default')

    this.specs.set(spec.name, spec)
    this.logger.trace(`declared option ${spec.name}`, { type: spec.type })
    return this
  }

  public has(name: string): boolean {
    return this.specs.has(name)
  }

  public declarations(): OptionSpec[] {
    return [...this.specs.values()]
  }

  /**
   * Merges defaults with the override layers, later layers winning:
   * default < project < invocation.
   */
  public resolve(layers: OverrideLayers = {}): ResolvedOptions {
    this.assertKnown(layers.project, 'project')
    this.assertKnown(layers.invocation, 'invocation')

    const values = new Map<string, { value: OptionValue; layer: OptionLayer }>()
    for (const spec of this.specs.values()) {
      let value: OptionValue = spec.default
      let layer: OptionLayer = 'default'

      const project = overrideOf(layers.project, spec.name)
      if (project !== undefined) {
        value = this.check(spec, project, 'project')
        layer = 'project'
      }

      const invocation = overrideOf(layers.invocation, spec.name)
      if (invocation !== undefined) {
        const raw = typeof invocation === 'string' ? this.coerce(spec, invocation) : invocation
        value = this.check(spec, raw, 'invocation')
        layer = 'invocation'
      }

      values.set(spec.name, { value, layer })
      this.logger.debug(`option ${spec.name} resolved from ${layer}`, { value })
    }
    return new ResolvedOptions(values)
  }

  private assertKnown(layer: Readonly<Record<string, unknown>> | undefined, where: string): void {
    for (const name of Object.keys(layer ?? {})) {
      if (!this.specs.has(name)) {
        throw new InvalidOptionError(name, `unknown option in ${where} overrides`, {
          known: [...this.specs.keys()],
        })
      }
    }
  }

  /** Turns a command-line string into a value of the option's type. */
  private coerce(spec: OptionSpec, raw: string): unknown {
    switch (spec.type) {
      case 'bool': {
        const word = raw.trim().toLowerCase()
        if (TRUE_WORDS.has(word)) return true
        if (FALSE_WORDS.has(word)) return false
        throw new InvalidOptionError(spec.name, `expected a boolean, got '${raw}'`, {
          layer: 'invocation',
        })
      }
      case 'list':
        return raw.trim() === '' ? [] : raw.split(',').map((item) => item.trim())
      case 'string':
      case 'enum':
        return raw
    }
  }

  private check(spec: OptionSpec, value: unknown, layer: string): OptionValue {
    const result = this.checkType(spec, value, layer)
    if (spec.validator) {
      const verdict = spec.validator(result)
      if (verdict !== true) {
        throw new InvalidOptionError(spec.name, verdict, { layer })
      }
    }
    return result
  }

  private checkType(spec: OptionSpec, value: unknown, layer: string): OptionValue {
    const mismatch = (expected: string) =>
      new InvalidOptionError(spec.name, `expected ${expected}, got ${describe(value)}`, { layer })

    switch (spec.type) {
      case 'string': {
        const parsed = z.string().safeParse(value)
        if (!parsed.success) throw mismatch('a string')
        if (spec.pattern !== undefined && !wholeMatch(spec.pattern, parsed.data)) {
          throw new InvalidOptionError(
            spec.name,
            `'${parsed.data}' does not match /${spec.pattern}/`,
            { layer },
          )
        }
        return parsed.data
      }
      case 'bool': {
        const parsed = z.boolean().safeParse(value)
        if (!parsed.success) throw mismatch('a boolean')
        return parsed.data
      }
      case 'enum': {
        const parsed = z.string().safeParse(value)
        if (!parsed.success) throw mismatch('a string')
        if (!spec.values.includes(parsed.data)) {
          throw new InvalidOptionError(
            spec.name,
            `'${parsed.data}' is not one of ${spec.values.join(', ')}`,
            { layer },
          )
        }
        return parsed.data
      }
      case 'list': {
        const parsed = z.array(z.string()).safeParse(value)
        if (!parsed.success) throw mismatch('a list of strings')
        const pattern = spec.pattern
        const bad =
          pattern === undefined ? undefined : parsed.data.find((item) => !wholeMatch(pattern, item))
        if (bad !== undefined) {
          throw new InvalidOptionError(spec.name, `item '${bad}' does not match /${pattern}/`, {
            layer,
          })
        }
        return Object.freeze(parsed.data)
      }
    }
  }
}

const wholeMatch = (pattern: string, value: string): boolean =>
  new RegExp(`^(?:${pattern})$`).test(value)
