export * from './emitter.js'
export * from './render.js'
export * from './registry.js'
export * from './ninja/emitter.js'
export * from './make/emitter.js'
