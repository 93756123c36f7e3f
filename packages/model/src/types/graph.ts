import { GraphVariable } from './command.js'
import { Edge } from './edge.js'
import { FileNode, FileRefType } from './file.js'

export const DEFAULT_ALIAS = 'all'

/**
 * The validated dependency graph: acyclic, every output produced exactly once,
 * enumerated in declaration order. The sole input of every backend emitter.
 */
export interface Graph {
  /** path of the source directory as seen from the build directory */
  readonly srcdir: string
  readonly nodes: readonly FileNode[]
  readonly edges: readonly Edge[]
  readonly variables: readonly GraphVariable[]
  /** alias names built when the executor is run without arguments */
  readonly defaults: readonly string[]
  /** description files; a change to any of them re-runs the generator */
  readonly buildInputs: readonly FileRefType[]
  /** argv re-running the generator for this build directory */
  readonly regenerate?: readonly string[]
}
