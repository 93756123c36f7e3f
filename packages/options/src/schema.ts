import { z } from 'zod'

export const OptionName = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_-]*$/, 'option names are letters, digits, "_" and "-"')

const Pattern = z.string().refine((pattern) => {
  try {
    new RegExp(pattern)
    return true
  } catch {
    return false
  }
}, 'not a valid regular expression')

const OptionBase = {
  name: OptionName,
  help: z.string().default(''),
}

const StringOption = z.object({
  ...OptionBase,
  type: z.literal('string'),
  default: z.string(),
  /** regular expression the whole value must match */
  pattern: Pattern.optional(),
})

const BoolOption = z.object({
  ...OptionBase,
  type: z.literal('bool'),
  default: z.boolean(),
})

const EnumOption = z.object({
  ...OptionBase,
  type: z.literal('enum'),
  values: z.array(z.string()).min(1),
  default: z.string(),
})

const ListOption = z.object({
  ...OptionBase,
  type: z.literal('list'),
  default: z.array(z.string()).default([]),
  /** regular expression every item must match */
  pattern: Pattern.optional(),
})

export const OptionDeclaration = z.discriminatedUnion('type', [
  StringOption,
  BoolOption,
  EnumOption,
  ListOption,
])
export type OptionDeclarationType = z.infer<typeof OptionDeclaration>
export type OptionType = OptionDeclarationType['type']

export const OptionFile = z.object({
  options: z.array(OptionDeclaration).default([]),
})
export type OptionFileType = z.infer<typeof OptionFile>

export type OptionValue = string | boolean | readonly string[]

/** Returns true when the value is acceptable, or a reason when it is not. */
export type OptionValidator = (value: OptionValue) => true | string

/** A declaration as held by the schema; validators only come from the typed API. */
export type OptionSpec = OptionDeclarationType & { validator?: OptionValidator }

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const where = issue.path.map(String).join('.')
    return where ? `${where}: ${issue.message}` : issue.message
  })
