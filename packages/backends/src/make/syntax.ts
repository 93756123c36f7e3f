import { FileRefType } from '@buildplan/model'

import { CommandDialect } from '../render.js'

/** `CXXFLAGS` for the graph variable `cxxflags`. */
export const makeVariableName = (name: string): string =>
  name.toUpperCase().replace(/[^A-Z0-9_]/g, '_')

export const makeDialect: CommandDialect = {
  srcdir: '$(srcdir)',
  variable: (name) => `$(${makeVariableName(name)})`,
}

function noNewline(text: string): string {
  if (text.includes('\n')) {
    throw new Error(`illegal newline in makefile text: ${JSON.stringify(text)}`)
  }
  return text
}

/** Escapes a word in a target or prerequisite list. */
export const escapeTarget = (text: string): string =>
  noNewline(text).replace(/[\s:#%\\]/g, '\\$&').replace(/\$/g, '$$$$')

export function targetPath(ref: FileRefType): string {
  if (ref.root === 'builddir') return escapeTarget(ref.path)
  return ref.path === '.' ? '$(srcdir)' : `$(srcdir)/${escapeTarget(ref.path)}`
}

export interface MakeRule {
  readonly targets: readonly string[]
  readonly prerequisites?: readonly string[]
  readonly orderOnly?: readonly string[]
  /** GNU make 4.3 `&:`: one recipe run makes every target */
  readonly grouped?: boolean
  /** shell lines, already escaped */
  readonly recipe?: readonly string[]
}

export type AssignmentFlavor = ':=' | '='

/** Appends makefile statements; every value passed in is already escaped. */
export class MakeWriter {
  private readonly lines: string[] = []

  public comment(text: string): this {
    this.lines.push(`# ${noNewline(text)}`)
    return this
  }

  public blank(): this {
    this.lines.push('')
    return this
  }

  public raw(line: string): this {
    this.lines.push(noNewline(line))
    return this
  }

  public variable(name: string, value: string, flavor: AssignmentFlavor): this {
    const line = `${name} ${flavor}`
    this.lines.push(value === '' ? line : `${line} ${noNewline(value)}`)
    return this
  }

  public rule(rule: MakeRule): this {
    let line = rule.targets.join(' ') + (rule.grouped ? ' &:' : ':')
    if (rule.prerequisites?.length) line += ` ${rule.prerequisites.join(' ')}`
    if (rule.orderOnly?.length) line += ` | ${rule.orderOnly.join(' ')}`
    this.lines.push(line)
    for (const command of rule.recipe ?? []) this.lines.push(`\t${noNewline(command)}`)
    return this
  }

  public phony(names: readonly string[]): this {
    this.lines.push(`.PHONY: ${names.join(' ')}`)
    return this
  }

  public toString(): string {
    return this.lines.join('\n') + '\n'
  }
}
