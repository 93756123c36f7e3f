import fs from 'node:fs'
import path from 'node:path'
import { WriteFailedError } from '@buildplan/model'
import { makeLogger } from '@buildplan/logger'
import { Artifact } from '@buildplan/backends'

const logger = makeLogger('writer')

/**
 * Writes every artifact under `outdir`. Each file is staged as
 * `<name>.<pid>.tmp` and renamed into place only once all of them have been
 * staged; on failure the staged files are removed and the files already in
 * place are left as they were. Returns the absolute paths written.
 */
export function writeArtifacts(
  outdir: string,
  artifacts: readonly Artifact[],
  pid: number = process.pid,
): string[] {
  const staged: { tmp: string; dest: string }[] = []
  let current = outdir

  try {
    for (const artifact of artifacts) {
      const dest = path.resolve(outdir, artifact.path)
      current = dest
      fs.mkdirSync(path.dirname(dest), { recursive: true })
      const tmp = `${dest}.${pid}.tmp`
      staged.push({ tmp, dest })
      fs.writeFileSync(tmp, artifact.contents)
    }
    for (const { tmp, dest } of staged) {
      current = dest
      fs.renameSync(tmp, dest)
    }
  } catch (err) {
    for (const { tmp } of staged) fs.rmSync(tmp, { force: true })
    logger.debug(`discarded ${staged.length} staged file(s)`, { outdir })
    throw new WriteFailedError(current, err)
  }

  const written = staged.map(({ dest }) => dest)
  logger.debug(`wrote ${written.length} file(s)`, { outdir })
  return written
}
