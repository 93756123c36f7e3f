export * from './fileSystem.js'
export * from './analysis.js'
export * from './builder.js'
