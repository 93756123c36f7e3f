export * from './environment.js'
export * from './platforms.js'
export * from './languages.js'
export * from './registry.js'
export { ccDescriptor } from './families/cc.js'
export { msvcDescriptor } from './families/msvc.js'
