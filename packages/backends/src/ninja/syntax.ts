import { FileRefType } from '@buildplan/model'

import { CommandDialect } from '../render.js'

export const ninjaDialect: CommandDialect = {
  srcdir: '$srcdir',
  variable: (name) => `$${name}`,
}

const RULE_NAME = /^\w+$/
const VARIABLE_NAME = /^[\w.-]+$/

function noNewline(text: string): string {
  if (text.includes('\n')) {
    throw new Error(`illegal newline in ninja text: ${JSON.stringify(text)}`)
  }
  return text
}

/** Outputs also escape `:`, which would otherwise end the output list. */
export const escapeOutput = (text: string): string => noNewline(text).replace(/[$: ]/g, '$$$&')

export const escapeInput = (text: string): string => noNewline(text).replace(/[$ ]/g, '$$$&')

/** Text that is not a command and not a path list, e.g. a description. */
export const escapePlain = (text: string): string => noNewline(text).replace(/\$/g, '$$$$')

export function inputPath(ref: FileRefType): string {
  if (ref.root === 'builddir') return escapeInput(ref.path)
  return ref.path === '.' ? '$srcdir' : `$srcdir/${escapeInput(ref.path)}`
}

export function outputPath(ref: FileRefType): string {
  if (ref.root === 'builddir') return escapeOutput(ref.path)
  return ref.path === '.' ? '$srcdir' : `$srcdir/${escapeOutput(ref.path)}`
}

export interface BuildStatement {
  readonly outputs: readonly string[]
  readonly rule: string
  readonly inputs?: readonly string[]
  readonly implicit?: readonly string[]
  readonly orderOnly?: readonly string[]
  /** per-build bindings; values are already escaped */
  readonly variables?: readonly (readonly [string, string])[]
}

/** Appends ninja statements; every value passed in is already escaped. */
export class NinjaWriter {
  private readonly lines: string[] = []

  public comment(text: string): this {
    this.lines.push(`# ${noNewline(text)}`)
    return this
  }

  public blank(): this {
    this.lines.push('')
    return this
  }

  public variable(name: string, value: string, indent = 0): this {
    if (!VARIABLE_NAME.test(name)) {
      throw new Error(`invalid ninja variable name '${name}'`)
    }
    const pad = ' '.repeat(indent)
    this.lines.push(value === '' ? `${pad}${name} =` : `${pad}${name} = ${noNewline(value)}`)
    return this
  }

  public rule(name: string, bindings: readonly (readonly [string, string])[]): this {
    if (!RULE_NAME.test(name)) {
      throw new Error(`invalid ninja rule name '${name}'`)
    }
    this.lines.push(`rule ${name}`)
    for (const [key, value] of bindings) this.variable(key, value, 2)
    return this
  }

  public build(statement: BuildStatement): this {
    let line = `build ${statement.outputs.join(' ')}: ${statement.rule}`
    if (statement.inputs?.length) line += ` ${statement.inputs.join(' ')}`
    if (statement.implicit?.length) line += ` | ${statement.implicit.join(' ')}`
    if (statement.orderOnly?.length) line += ` || ${statement.orderOnly.join(' ')}`
    this.lines.push(line)
    for (const [key, value] of statement.variables ?? []) this.variable(key, value, 2)
    return this
  }

  public defaults(paths: readonly string[]): this {
    this.lines.push(`default ${paths.join(' ')}`)
    return this
  }

  public toString(): string {
    return this.lines.join('\n') + '\n'
  }
}
