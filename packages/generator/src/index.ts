export * from './writer.js'
export * from './environment.js'
export * from './generate.js'
