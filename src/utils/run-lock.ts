import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Logger } from 'pino'
import lockfile from 'proper-lockfile'
import { LockContentionError, toError } from './errors.js'

/** A lock not refreshed for this long is considered abandoned */
const STALE_LOCK_MS = 60000

function isLockedError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ELOCKED'
}

/**
 * Runs `fn` while holding an exclusive cross-process lock on `lockPath`.
 *
 * Acquisition never waits: a held lock fails immediately with
 * LockContentionError, before `fn` runs. The lock is released on every exit
 * path of `fn`.
 */
export async function withRunLock<T>(
  lockPath: string,
  log: Logger,
  fn: () => Promise<T>,
): Promise<T> {
  await mkdir(dirname(lockPath), { recursive: true })

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(lockPath, {
      realpath: false,
      retries: 0,
      stale: STALE_LOCK_MS,
      onCompromised: (error) => {
        log.error({ error }, `Run lock on ${lockPath} was compromised`)
      },
    })
  } catch (error) {
    if (isLockedError(error)) {
      throw new LockContentionError(lockPath, { cause: error })
    }
    throw toError(error)
  }

  log.debug(`Acquired run lock ${lockPath}`)
  try {
    return await fn()
  } finally {
    try {
      await release()
      log.debug(`Released run lock ${lockPath}`)
    } catch (error) {
      log.warn({ error }, `Failed to release run lock ${lockPath}`)
    }
  }
}
