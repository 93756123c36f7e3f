export * from './context.js'
export * from './description.js'
export * from './load.js'
