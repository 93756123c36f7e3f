import fs from 'node:fs'
import path from 'node:path'
import { FileRefType } from '@buildplan/model'

/** Read-only view of the source tree, asked whether a source file exists. */
export interface FileSystemView {
  exists(ref: FileRefType): boolean
}

export class DiskFileSystemView implements FileSystemView {
  constructor(private readonly srcdir: string) {}

  public exists(ref: FileRefType): boolean {
    return ref.root === 'srcdir' && fs.existsSync(path.join(this.srcdir, ref.path))
  }
}

export class InMemoryFileSystemView implements FileSystemView {
  private readonly files: ReadonlySet<string>

  constructor(files: Iterable<string>) {
    this.files = new Set(files)
  }

  public exists(ref: FileRefType): boolean {
    return ref.root === 'srcdir' && this.files.has(ref.path)
  }
}
