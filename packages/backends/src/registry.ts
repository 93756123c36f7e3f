import { UnknownBackendError } from '@buildplan/model'

import { Emitter } from './emitter.js'
import { MakeEmitter } from './make/emitter.js'
import { NinjaEmitter } from './ninja/emitter.js'

const BACKENDS = new Map<string, () => Emitter>([
  ['ninja', () => new NinjaEmitter()],
  ['make', () => new MakeEmitter('gnu')],
  ['posix-make', () => new MakeEmitter('posix')],
])

export const DEFAULT_BACKEND = 'ninja'

export const listBackends = (): string[] => [...BACKENDS.keys()]

export function createEmitter(name: string): Emitter {
  const make = BACKENDS.get(name)
  if (!make) {
    throw new UnknownBackendError(name, listBackends())
  }
  return make()
}
