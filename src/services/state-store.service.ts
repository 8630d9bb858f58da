/**
 * State Store
 *
 * Loads and atomically persists the connectivity ledger. Writes go to a
 * sibling `.tmp` file which is renamed into place, so a crash mid-write never
 * leaves a truncated ledger behind.
 */
import { mkdir, open, readFile, rename, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Ledger } from '@root/types/connectivity.types.js'
import {
  emptyLedger,
  parseLedger,
  serializeLedger,
} from '@utils/connectivity/ledger.js'
import { PersistenceError, StateReadError } from '@utils/errors.js'
import type { Logger } from 'pino'

export interface StateStore {
  load(): Promise<Ledger>
  save(ledger: Ledger): Promise<void>
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  )
}

export class FileStateStore implements StateStore {
  constructor(
    private readonly log: Logger,
    readonly filePath: string,
  ) {}

  get tempPath(): string {
    return `${this.filePath}.tmp`
  }

  /**
   * Reads the ledger. A missing file is a cold start and yields an empty
   * ledger; malformed lines are skipped with a warning.
   *
   * @throws StateReadError when the file exists but cannot be read
   */
  async load(): Promise<Ledger> {
    let content: string
    try {
      content = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        this.log.info(`State file '${this.filePath}' not found. Starting fresh.`)
        return emptyLedger()
      }
      throw new StateReadError(`Cannot read state file ${this.filePath}`, {
        cause: error,
      })
    }

    const { ledger, malformedLines } = parseLedger(content)
    for (const line of malformedLines) {
      this.log.warn({ line }, 'Skipping malformed line in state file')
    }

    this.log.info(
      `Loaded state: ${ledger.connected.size} previously connected peers, ${ledger.lastHandshake.size} known handshakes`,
    )
    return ledger
  }

  /**
   * Replaces the persisted ledger wholesale.
   *
   * @throws PersistenceError when the new ledger could not be put in place
   */
  async save(ledger: Ledger): Promise<void> {
    const tempPath = this.tempPath
    try {
      await mkdir(dirname(this.filePath), { recursive: true })
      const handle = await open(tempPath, 'w', 0o600)
      try {
        await handle.writeFile(serializeLedger(ledger), 'utf8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(tempPath, this.filePath)
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.log.warn(
          { error: cleanupError },
          `Failed to remove temporary state file ${tempPath}`,
        )
      })
      throw new PersistenceError(`Failed to save state to ${this.filePath}`, {
        cause: error,
      })
    }

    this.log.debug(
      `State saved: ${ledger.connected.size} connected peers, ${ledger.lastHandshake.size} handshakes`,
    )
  }
}
