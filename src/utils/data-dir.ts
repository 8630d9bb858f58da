import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

export const projectRoot = resolve(__dirname, '..', '..')

/**
 * Resolves the sentinel data directory.
 *
 * Priority:
 * 1. process.env.DATA_DIR (explicit override, e.g. a mounted Docker volume)
 * 2. {projectRoot}/data
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.DATA_DIR?.trim()
  return override ? resolve(override) : resolve(projectRoot, 'data')
}

/**
 * Default ledger location: {dataDir}/sentinel.state
 */
export function resolveStatePath(dataDir: string = resolveDataDir()): string {
  return resolve(dataDir, 'sentinel.state')
}

/**
 * Default log directory: {dataDir}/logs
 */
export function resolveLogPath(dataDir: string = resolveDataDir()): string {
  return resolve(dataDir, 'logs')
}

/**
 * Default lock target. Lives in the OS temp directory so a stale lock never
 * survives a reboot.
 */
export function resolveLockPath(): string {
  return resolve(tmpdir(), 'wg-peer-sentinel')
}

/**
 * Resolves the .env file path: {projectRoot}/.env
 */
export function resolveEnvPath(): string {
  return resolve(projectRoot, '.env')
}
