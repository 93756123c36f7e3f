import { EdgeCommand } from './command.js'
import { FileRefType } from './file.js'

interface EdgeBase {
  /** name of the target that owns this edge */
  readonly target: string
  readonly site: string
}

export interface BuildStep extends EdgeBase {
  /** explicit inputs, passed to the command */
  readonly inputs: readonly FileRefType[]
  /** inputs that trigger a rebuild but are not passed as $in */
  readonly implicit: readonly FileRefType[]
  /** inputs that must exist first but never make the outputs stale */
  readonly orderOnly: readonly FileRefType[]
  readonly outputs: readonly FileRefType[]
  readonly command: EdgeCommand
  /** progress text shown by the executor */
  readonly description?: string
}

export interface NormalEdge extends BuildStep {
  readonly kind: 'normal'
}

/** A step whose every dependency is order-only: `inputs` and `implicit` stay empty. */
export interface OrderOnlyEdge extends BuildStep {
  readonly kind: 'order-only'
}

export type Dependency =
  | { readonly type: 'file'; readonly ref: FileRefType }
  | { readonly type: 'alias'; readonly name: string }

export interface PhonyEdge extends EdgeBase {
  readonly kind: 'phony'
  readonly alias: string
  readonly inputs: readonly Dependency[]
}

export type Edge = NormalEdge | OrderOnlyEdge | PhonyEdge

export const isBuildStep = (edge: Edge): edge is NormalEdge | OrderOnlyEdge =>
  edge.kind !== 'phony'
