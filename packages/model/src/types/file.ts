import { z } from 'zod'

export const Root = z.enum(['srcdir', 'builddir'])
export type RootType = z.infer<typeof Root>

export const FileRef = z.object({
  root: Root,
  path: z.string().min(1),
})
export type FileRefType = Readonly<z.infer<typeof FileRef>>

export const srcFile = (path: string): FileRefType => ({ root: 'srcdir', path })
export const buildFile = (path: string): FileRefType => ({ root: 'builddir', path })

/** Identity of a file in the graph; two refs with the same key are the same node. */
export const fileKey = (ref: FileRefType): string =>
  ref.root === 'srcdir' ? `$srcdir/${ref.path}` : ref.path

export type FileNodeKind = 'source' | 'output'

export interface FileNode {
  readonly key: string
  readonly ref: FileRefType
  readonly kind: FileNodeKind
  /** index into Graph.edges of the one edge producing this node; outputs only */
  readonly producer?: number
  /** indices of edges consuming this node, in declaration order */
  readonly consumers: readonly number[]
}
