export * from './schema.js'
export * from './resolvedOptions.js'
export * from './optionSchema.js'
export * from './load.js'
export * from './help.js'
