import path from 'node:path'
import { z } from 'zod'

/**
 * Canonical form of a project-relative path: POSIX separators, no `.` or `..`
 * segments, no leading `./` and no trailing slash. Returns undefined for paths
 * that are absolute or climb out of their root.
 */
export function canonicalPath(raw: string): string | undefined {
  const slashed = raw.replace(/\\/g, '/')
  if (slashed === '' || path.posix.isAbsolute(slashed) || /^[A-Za-z]:\//.test(slashed)) {
    return undefined
  }
  const normalized = path.posix.normalize(slashed).replace(/\/+$/, '')
  if (normalized === '..' || normalized.startsWith('../') || normalized === '.') {
    return undefined
  }
  return normalized
}

export const RelativePath = z
  .string()
  .min(1)
  .refine((p) => !p.includes('\n'), 'paths may not contain newlines')
  .refine((p) => canonicalPath(p) !== undefined, 'expected a relative path inside the project')
  .transform((p) => canonicalPath(p) ?? p)
export type RelativePathType = z.infer<typeof RelativePath>

export const posixDirname = (p: string): string => path.posix.dirname(p)

export const posixBasename = (p: string): string => path.posix.basename(p)

export function splitExtension(p: string): { stem: string; ext: string } {
  const ext = path.posix.extname(p)
  return { stem: ext ? p.slice(0, -ext.length) : p, ext }
}

/** Relative POSIX path leading from directory `from` to `to`; '.' when equal. */
export function relativePosix(from: string, to: string): string {
  const rel = path.relative(from, to).split(path.sep).join('/')
  return rel === '' ? '.' : rel
}
