import { randomUUID } from 'node:crypto'
import { mkdir, rm, symlink } from 'node:fs/promises'
import * as path from 'node:path'

export const defaultArtifactDir = '.e2e-artifacts'

export type ArtifactOptions = {
  artifactDir?: string | undefined
  artifactPrefix?: string | undefined
}

export type ArtifactRun = { root: string; dir: string; prefix: string }

// Overlapping sessions in one process must never share a run directory.
const uniquePrefix = () => `${Math.floor(Date.now() / 1000)}-${randomUUID().slice(0, 8)}`

const markLastRun = async (root: string, dir: string): Promise<boolean> => {
  const lastRun = path.join(root, 'last-run')
  try {
    await rm(lastRun, { force: true, recursive: true })
    await symlink(path.resolve(dir), lastRun, 'junction')
    return true
  } catch {
    return false
  }
}

/**
 * Prepares the artifact directory of one session run and points `last-run` at it.
 */
export const prepareArtifactRun = async (opts: ArtifactOptions = {}): Promise<ArtifactRun> => {
  const root = opts.artifactDir ?? defaultArtifactDir
  const prefix = opts.artifactPrefix ?? uniquePrefix()
  const dir = path.join(root, prefix)
  await mkdir(dir, { recursive: true })
  await markLastRun(root, dir)
  return { root, dir, prefix }
}
