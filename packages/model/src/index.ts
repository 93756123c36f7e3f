export * from './types/index.js'
export * from './errors.js'
