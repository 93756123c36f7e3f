export * from './iterate.js'
export * from './paths.js'
export * from './shell.js'

export const deepFreeze = <T>(x: T): Readonly<T> => {
  if (x === null || typeof x !== 'object' || Object.isFrozen(x)) return x
  for (const value of Object.values(x)) {
    deepFreeze(value)
  }
  return Object.freeze(x)
}
