/**
 * Cross-process guards for the files that several CLI invocations share.
 * The in-process mutexes order work inside one process; these locks order
 * read-modify-write cycles between processes.
 */
import { randomBytes } from 'crypto'
import { promises as fs } from 'fs'
import path from 'path'
import { lock } from 'proper-lockfile'

const LOCK_OPTIONS = {
  realpath: false,
  stale: 10000,
  retries: { retries: 200, minTimeout: 5, maxTimeout: 100 },
}

/** Run `task` while holding `<target>.lock`, waiting for other holders. */
export async function withFileLock<T>(target: string, task: () => Promise<T>): Promise<T> {
  await fs.mkdir(path.dirname(target), { recursive: true })
  const release = await lock(target, LOCK_OPTIONS)
  try {
    return await task()
  } finally {
    await release()
  }
}

// Unique per write, so two writers never share a temp file
export function tempPathFor(target: string): string {
  return `${target}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
}

/** Replace `target` through a temp file and rename. */
export async function replaceFile(target: string, contents: string): Promise<void> {
  const tempPath = tempPathFor(target)
  await fs.writeFile(tempPath, contents, 'utf-8')
  await fs.rename(tempPath, target)
}
