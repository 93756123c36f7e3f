import fs from 'node:fs'
import { InvalidDescriptionError, InvalidOptionError, TargetHandle } from '@buildplan/model'
import {
  OptionValue,
  StructuredFormat,
  formatFromPath,
  formatIssues,
  parseStructured,
} from '@buildplan/options'
import { makeLogger } from '@buildplan/logger'

import { BuildContext, FileInput, buildPath } from './context.js'
import {
  BuildRefType,
  DefaultNames,
  DescriptionFile,
  DescriptionFileType,
  GlobalFlags,
  TargetDeclaration,
  TargetRefType,
} from './description.js'

const logger = makeLogger('description')

const OPTION_REF = /\$\{\s*options\.([A-Za-z_][A-Za-z0-9_-]*)\s*\}/g
const WHOLE_OPTION_REF = /^\$\{\s*options\.([A-Za-z_][A-Za-z0-9_-]*)\s*\}$/

type OptionLookup = (name: string) => OptionValue

const render = (value: OptionValue): string =>
  typeof value === 'string' ? value : typeof value === 'boolean' ? String(value) : value.join(' ')

/**
 * Replaces `${options.NAME}` references. A string that is exactly one
 * reference to a list option becomes that list, spliced into the enclosing
 * array; any other reference is replaced by the value's text. Other `${...}`
 * forms are left as they are.
 */
export function substituteOptions(data: unknown, lookup: OptionLookup): unknown {
  if (typeof data === 'string') {
    const whole = WHOLE_OPTION_REF.exec(data)
    if (whole) {
      const value = lookup(whole[1])
      return typeof value === 'object' ? [...value] : render(value)
    }
    return data.replace(OPTION_REF, (_match: string, name: string) => render(lookup(name)))
  }

  if (Array.isArray(data)) {
    const out: unknown[] = []
    for (const item of data) {
      const value = substituteOptions(item, lookup)
      if (typeof item === 'string' && Array.isArray(value)) {
        out.push(...value)
      } else {
        out.push(value)
      }
    }
    return out
  }

  if (typeof data === 'object' && data !== null) {
    const out: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(data)) {
      out[key] = substituteOptions(value, lookup)
    }
    return out
  }

  return data
}

export function parseDescription(
  text: string,
  source: string,
  format: StructuredFormat = 'json',
): DescriptionFileType {
  const parsed = DescriptionFile.safeParse(parseStructured(text, source, format) ?? {})
  if (!parsed.success) {
    throw new InvalidDescriptionError(source, formatIssues(parsed.error))
  }
  return parsed.data
}

export function loadDescription(file: string): DescriptionFileType {
  let text: string
  try {
    text = fs.readFileSync(file, 'utf-8')
  } catch (err) {
    throw new InvalidDescriptionError(file, [
      `cannot read description: ${err instanceof Error ? err.message : String(err)}`,
    ])
  }
  return parseDescription(text, file, formatFromPath(file))
}

/**
 * Declares every target of a parsed description on `context`, in file
 * order. Names refer only to targets declared above them.
 */
export function evaluateDescription(
  description: DescriptionFileType,
  context: BuildContext,
  source: string,
): void {
  const lookup: OptionLookup = (name) => context.option(name)

  if (description.globalFlags !== undefined) {
    const flags = GlobalFlags.safeParse(substituteOptions(description.globalFlags, lookup))
    if (!flags.success) {
      throw new InvalidDescriptionError(`${source}: globalFlags`, formatIssues(flags.error))
    }
    if (flags.data.c) context.globalFlags(flags.data.c, 'c')
    if (flags.data['c++']) context.globalFlags(flags.data['c++'], 'c++')
    if (flags.data.link) context.globalLinkFlags(flags.data.link)
  }

  description.targets.forEach((raw, index) => {
    const site = `${source}: targets[${index}]`
    const parsed = TargetDeclaration.safeParse(substituteOptions(raw, lookup))
    if (!parsed.success) {
      throw new InvalidDescriptionError(site, formatIssues(parsed.error))
    }
    const decl = parsed.data

    if (decl.when !== undefined) {
      const enabled = context.option(decl.when)
      if (typeof enabled !== 'boolean') {
        throw new InvalidOptionError(decl.when, `is used in 'when' at ${site} but is not a bool`)
      }
      if (!enabled) {
        logger.debug(`skipping ${decl.name}`, { site, when: decl.when })
        return
      }
    }

    const ref = (entry: string | TargetRefType | BuildRefType): FileInput => {
      if (typeof entry === 'string') return entry
      return 'build' in entry ? buildPath(entry.build) : context.lookup(entry.target, site)
    }
    const names = (list: readonly string[] | undefined): TargetHandle[] =>
      (list ?? []).map((name) => context.lookup(name, site))

    switch (decl.type) {
      case 'executable':
        context.executable(decl.name, {
          site,
          sources: decl.sources.map(ref),
          flags: decl.flags,
          linkFlags: decl.linkFlags,
          includes: decl.includes,
          defines: decl.defines,
          libs: names(decl.libs),
          orderOnly: names(decl.orderOnly),
          language: decl.language,
        })
        break
      case 'library':
        context.library(decl.name, {
          site,
          kind: decl.kind,
          sources: decl.sources.map(ref),
          flags: decl.flags,
          linkFlags: decl.linkFlags,
          includes: decl.includes,
          publicIncludes: decl.publicIncludes,
          defines: decl.defines,
          libs: names(decl.libs),
          orderOnly: names(decl.orderOnly),
          language: decl.language,
        })
        break
      case 'command':
        context.customCommand(decl.name, {
          site,
          inputs: (decl.inputs ?? []).map(ref),
          outputs: decl.outputs,
          command: decl.command.map(ref),
          orderOnly: names(decl.orderOnly),
          dependencyKind: decl.dependencyKind,
          description: decl.description,
        })
        break
      case 'alias':
        context.alias(decl.name, names(decl.deps), { site })
        break
    }
  })

  if (description.default !== undefined) {
    const site = `${source}: default`
    const parsed = DefaultNames.safeParse(substituteOptions(description.default, lookup))
    if (!parsed.success) {
      throw new InvalidDescriptionError(site, formatIssues(parsed.error))
    }
    context.defaults(...parsed.data.map((name) => context.lookup(name, site)))
  }

  logger.debug(`evaluated ${description.targets.length} declaration(s)`, {
    source,
    project: description.project,
  })
}
