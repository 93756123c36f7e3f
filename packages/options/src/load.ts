import fs from 'node:fs'
import path from 'node:path'
import yaml from 'js-yaml'
import { InvalidDescriptionError } from '@buildplan/model'
import { makeLogger } from '@buildplan/logger'

import { OptionFile, formatIssues } from './schema.js'
import { OptionSchema } from './optionSchema.js'

const logger = makeLogger('optionFile')

export type StructuredFormat = 'json' | 'yaml'

export function formatFromPath(file: string): StructuredFormat {
  const ext = path.extname(file).toLowerCase()
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json'
}

/** Parses a JSON or YAML document; syntax errors become InvalidDescriptionError. */
export function parseStructured(text: string, source: string, format: StructuredFormat): unknown {
  try {
    return format === 'yaml' ? yaml.load(text, { filename: source }) : JSON.parse(text)
  } catch (err) {
    throw new InvalidDescriptionError(source, [err instanceof Error ? err.message : String(err)])
  }
}

export function parseOptionFile(
  text: string,
  source: string,
  format: StructuredFormat = 'json',
): OptionSchema {
  const doc = parseStructured(text, source, format)
  const parsed = OptionFile.safeParse(doc ?? {})
  if (!parsed.success) {
    throw new InvalidDescriptionError(source, formatIssues(parsed.error))
  }
  logger.debug(`read ${parsed.data.options.length} option declaration(s)`, { source })
  return OptionSchema.fromDeclarations(parsed.data.options)
}

export function loadOptionFile(file: string): OptionSchema {
  let text: string
  try {
    text = fs.readFileSync(file, 'utf-8')
  } catch (err) {
    throw new InvalidDescriptionError(file, [
      `cannot read option file: ${err instanceof Error ? err.message : String(err)}`,
    ])
  }
  return parseOptionFile(text, file, formatFromPath(file))
}
