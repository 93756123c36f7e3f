import { FileRefType } from './file.js'

/**
 * One command-line argument as the graph knows it. Paths stay structured so
 * each backend can place them relative to its own build directory and escape
 * them with its own rules.
 */
export type Arg =
  | { readonly type: 'literal'; readonly value: string }
  | {
      readonly type: 'path'
      readonly ref: FileRefType
      readonly prefix?: string
      readonly suffix?: string
    }

export const lit = (value: string): Arg => ({ type: 'literal', value })

export const litArgs = (values: readonly string[]): Arg[] => values.map(lit)

export const pathArg = (ref: FileRefType, prefix?: string, suffix?: string): Arg => ({
  type: 'path',
  ref,
  ...(prefix ? { prefix } : {}),
  ...(suffix ? { suffix } : {}),
})

export type Token =
  | { readonly type: 'literal'; readonly value: string }
  /** a graph-level variable such as the compiler command or global flags */
  | { readonly type: 'variable'; readonly name: string }
  /** an argument list bound per edge, e.g. target flags or computed -I flags */
  | { readonly type: 'slot'; readonly name: string }
  | { readonly type: 'inputs'; readonly prefix?: string }
  | { readonly type: 'outputs'; readonly prefix?: string; readonly index?: number }
  | { readonly type: 'depfile'; readonly prefix?: string }
  | { readonly type: 'rspfile'; readonly prefix?: string }

export const t = {
  lit: (value: string): Token => ({ type: 'literal', value }),
  variable: (name: string): Token => ({ type: 'variable', name }),
  slot: (name: string): Token => ({ type: 'slot', name }),
  inputs: (prefix?: string): Token => (prefix ? { type: 'inputs', prefix } : { type: 'inputs' }),
  outputs: (prefix?: string, index?: number): Token => ({
    type: 'outputs',
    ...(prefix ? { prefix } : {}),
    ...(index !== undefined ? { index } : {}),
  }),
  depfile: (prefix?: string): Token => (prefix ? { type: 'depfile', prefix } : { type: 'depfile' }),
  rspfile: (prefix?: string): Token => (prefix ? { type: 'rspfile', prefix } : { type: 'rspfile' }),
}

export type DepsFormat = 'gcc' | 'msvc'

export interface CommandTemplate {
  /** human readable name shared by every edge running this template */
  readonly rule: string
  readonly tokens: readonly Token[]
  /** the depfile lives next to the first output with this suffix */
  readonly depfileSuffix?: string
  readonly deps?: DepsFormat
  /** when set, these tokens are written to `<first output>.rsp` and the command reads it */
  readonly responseFile?: readonly Token[]
  /** short progress text, e.g. 'compile' -> "compile simple.o" */
  readonly verb?: string
}

export interface EdgeCommand {
  readonly template: CommandTemplate
  readonly slots: Readonly<Record<string, readonly Arg[]>>
}

/** Stable identity of a template, used to deduplicate backend rules. */
export function templateKey(template: CommandTemplate): string {
  return JSON.stringify([
    template.rule,
    template.tokens,
    template.depfileSuffix ?? null,
    template.deps ?? null,
    template.responseFile ?? null,
    template.verb ?? null,
  ])
}

export interface GraphVariable {
  readonly name: string
  readonly value: readonly Arg[]
}
