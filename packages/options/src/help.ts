import { OptionSpec } from './schema.js'

function placeholder(spec: OptionSpec): string {
  switch (spec.type) {
    case 'string':
      return '<string>'
    case 'bool':
      return '<bool>'
    case 'enum':
      return spec.values.join('|')
    case 'list':
      return '<item,...>'
  }
}

function shownDefault(spec: OptionSpec): string {
  switch (spec.type) {
    case 'bool':
      return String(spec.default)
    case 'list':
      return spec.default.length > 0 ? spec.default.join(',') : 'none'
    default:
      return spec.default === '' ? "''" : spec.default
  }
}

/** One aligned line per option, spelled the way `-D` takes it. */
export function optionHelpLines(specs: readonly OptionSpec[]): string[] {
  const usages = specs.map((spec) => `-D ${spec.name}=${placeholder(spec)}`)
  const width = Math.max(0, ...usages.map((usage) => usage.length))
  return specs.map((spec, index) => {
    const help = spec.help ? `${spec.help} ` : ''
    return `  ${usages[index].padEnd(width)}  ${help}(default: ${shownDefault(spec)})`
  })
}
