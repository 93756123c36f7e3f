import { Arg, FileRefType, Graph } from '@buildplan/model'
import { shellEscape, shellQuote } from '@buildplan/utils'

/** How a backend spells references inside the commands it writes. */
export interface CommandDialect {
  /** reference to the source directory variable, e.g. `$srcdir` */
  readonly srcdir: string
  /** set when `srcdir` names text that only reads right inside single quotes */
  readonly srcdirQuoted?: boolean
  variable(name: string): string
}

/**
 * Escapes text that is already shell-quoted so the build file hands it to the
 * shell unchanged. ninja and make both read `$$` as a literal `$`.
 */
export function escapeCommand(text: string): string {
  if (text.includes('\n')) {
    throw new Error(`illegal newline in command text: ${JSON.stringify(text)}`)
  }
  return text.replace(/\$/g, '$$$$')
}

export const commandLiteral = (value: string): string => escapeCommand(shellQuote(value))

/**
 * Renders a path with an optional prefix and suffix as one shell word. A
 * source path keeps the srcdir reference unescaped so the executor expands
 * it; when any part needs quoting the whole word is quoted.
 */
export function renderPath(
  ref: FileRefType,
  dialect: CommandDialect,
  prefix = '',
  suffix = '',
): string {
  const base = ref.root === 'srcdir' ? (ref.path === '.' ? '' : `/${ref.path}`) : ref.path
  const parts = [prefix, base, suffix].filter((part) => part !== '').map(shellEscape)
  const quoted =
    parts.some((part) => part.quoted) || (ref.root === 'srcdir' && dialect.srcdirQuoted === true)
  const text = (part: string): string => escapeCommand(shellEscape(part).text)

  const body =
    (prefix ? text(prefix) : '') +
    (ref.root === 'srcdir' ? dialect.srcdir : '') +
    (base ? text(base) : '') +
    (suffix ? text(suffix) : '')
  return quoted ? `'${body}'` : body
}

export interface SrcdirBinding {
  readonly dialect: CommandDialect
  /** value of the quoted srcdir variable, when the source directory needs one */
  readonly quoted?: string
}

/**
 * Adapts a dialect to one source directory. A directory the shell would split
 * or expand is referenced through `quotedReference` instead, a variable
 * holding its single-quote escaped text.
 */
export function bindSrcdir(
  srcdir: string,
  dialect: CommandDialect,
  quotedReference: string,
): SrcdirBinding {
  const escaped = shellEscape(srcdir)
  if (!escaped.quoted) return { dialect }
  return {
    dialect: { ...dialect, srcdir: quotedReference, srcdirQuoted: true },
    quoted: escapeCommand(escaped.text),
  }
}

export function renderArg(arg: Arg, dialect: CommandDialect): string {
  return arg.type === 'literal'
    ? commandLiteral(arg.value)
    : renderPath(arg.ref, dialect, arg.prefix, arg.suffix)
}

export const renderArgs = (args: readonly Arg[], dialect: CommandDialect): string =>
  args.map((arg) => renderArg(arg, dialect)).join(' ')

/** Joins rendered words, dropping the empty ones an unset slot leaves behind. */
export const joinWords = (words: readonly string[]): string =>
  words.filter((word) => word !== '').join(' ')

export const GENERATOR_NAME = 'buildplan'

/** Comment lines opening every emitted file. */
export function generatedHeader(graph: Graph): string[] {
  const lines = [`Do not edit this file! It was automatically generated by ${GENERATOR_NAME}.`]
  const [description] = graph.buildInputs
  if (description) {
    lines.push(
      'Instead, you should edit the source file that created this:',
      description.path.replace(/\n/g, ' '),
    )
  }
  return lines
}
