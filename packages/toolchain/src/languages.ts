import { LanguageType } from '@buildplan/model'
import { splitExtension } from '@buildplan/utils'

const SOURCE_EXTENSIONS: ReadonlyMap<string, LanguageType> = new Map<string, LanguageType>([
  ['.c', 'c'],
  ['.cpp', 'c++'],
  ['.cc', 'c++'],
  ['.cxx', 'c++'],
  ['.c++', 'c++'],
  ['.C', 'c++'],
])

const HEADER_EXTENSIONS = new Set(['.h', '.hpp', '.hh', '.hxx', '.inl'])

export type SourceClass =
  | { kind: 'source'; language: LanguageType }
  | { kind: 'header' }
  | { kind: 'unknown' }

export function classifySource(path: string): SourceClass {
  const { ext } = splitExtension(path)
  const language = SOURCE_EXTENSIONS.get(ext)
  if (language) return { kind: 'source', language }
  if (HEADER_EXTENSIONS.has(ext)) return { kind: 'header' }
  return { kind: 'unknown' }
}

/** Objects from any c++ source need the c++ driver to link. */
export function linkLanguage(languages: Iterable<LanguageType>): LanguageType {
  for (const language of languages) {
    if (language === 'c++') return 'c++'
  }
  return 'c'
}
