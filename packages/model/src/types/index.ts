export * from './file.js'
export * from './command.js'
export * from './edge.js'
export * from './toolchain.js'
export * from './target.js'
export * from './graph.js'
