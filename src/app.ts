/**
 * Wires configuration, logging and services into the three CLI commands.
 */
import { parseArgs } from 'node:util'
import type { SentinelConfig } from '@root/types/config.types.js'
import { WireGuardHandshakeSource } from '@services/handshake-source.service.js'
import { WireGuardNameResolver } from '@services/name-resolver.service.js'
import { createNotifier } from '@services/notifications/index.js'
import { SchedulerService } from '@services/scheduler.service.js'
import {
  type CycleResult,
  SentinelService,
} from '@services/sentinel.service.js'
import { FileStateStore } from '@services/state-store.service.js'
import { loadConfig, loadEnvFile } from '@utils/config.js'
import { resolveLogPath } from '@utils/data-dir.js'
import { type CommandRunner, DockerContainer, runCommand } from '@utils/docker.js'
import { LockContentionError, SetupError } from '@utils/errors.js'
import { createLogger, createServiceLogger } from '@utils/logger.js'
import { withRunLock } from '@utils/run-lock.js'
import closeWithGrace from 'close-with-grace'
import type { Logger } from 'pino'

export const COMMANDS = ['run', 'check', 'watch'] as const
export type Command = (typeof COMMANDS)[number]

export const USAGE = [
  'Usage: wg-peer-sentinel [run|check|watch] [--env-file <path>]',
  '  run    one reconciliation cycle (default)',
  '  check  validate configuration and reach the WireGuard container',
  '  watch  run a cycle every POLL_INTERVAL_SECONDS until stopped',
].join('\n')

export interface CliArgs {
  command: Command
  envFile?: string
  help: boolean
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value)
}

/**
 * Parses CLI arguments.
 *
 * @throws Error on unknown options or commands
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const parsed = parseArgs({
    args: argv,
    options: {
      'env-file': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: true,
  })

  if (parsed.positionals.length > 1) {
    throw new Error(`Unexpected arguments: ${parsed.positionals.slice(1).join(' ')}`)
  }

  const command = parsed.positionals[0] ?? 'run'
  if (!isCommand(command)) {
    throw new Error(`Unknown command: ${command}`)
  }

  return {
    command,
    envFile: parsed.values['env-file'],
    help: parsed.values.help ?? false,
  }
}

export interface SentinelApp {
  sentinel: SentinelService
  handshakeSource: WireGuardHandshakeSource
}

/**
 * Builds the service graph for one configuration.
 */
export function buildSentinel(
  config: SentinelConfig,
  log: Logger,
  run: CommandRunner = runCommand,
): SentinelApp {
  const container = new DockerContainer(config.containerName, run)
  const handshakeSource = new WireGuardHandshakeSource(
    createServiceLogger(log, 'wireguard'),
    container,
  )

  const sentinel = new SentinelService(
    createServiceLogger(log, 'sentinel'),
    {
      stateStore: new FileStateStore(
        createServiceLogger(log, 'state'),
        config.stateFile,
      ),
      handshakeSource,
      names: new WireGuardNameResolver(
        createServiceLogger(log, 'names'),
        container,
        config.wgConfigPath,
      ),
      notifier: createNotifier(config, createServiceLogger(log, 'notify')),
    },
    {
      timeoutThresholdSeconds: config.timeoutThresholdSeconds,
      vpnName: config.vpnName,
    },
  )

  return { sentinel, handshakeSource }
}

/**
 * One locked cycle. Lock contention surfaces as LockContentionError before
 * anything is loaded.
 */
export function runLockedCycle(
  app: SentinelApp,
  config: SentinelConfig,
  log: Logger,
): Promise<CycleResult> {
  return withRunLock(config.lockFile, log, () => app.sentinel.runCycle())
}

function logSetupFailure(log: Logger, error: unknown): void {
  if (error instanceof LockContentionError) {
    log.error(
      `Script is already running or lock '${error.lockPath}' is stale. Exiting.`,
    )
  } else {
    log.error({ error }, 'Setup failed')
  }
}

/**
 * Runs a cycle every `pollIntervalSeconds` until SIGINT/SIGTERM. Resolves
 * with the exit code.
 */
function watch(app: SentinelApp, config: SentinelConfig, log: Logger): Promise<number> {
  const scheduler = new SchedulerService(createServiceLogger(log, 'scheduler'))

  scheduler.scheduleInterval('reconcile', config.pollIntervalSeconds, async () => {
    try {
      await runLockedCycle(app, config, log)
    } catch (error) {
      if (error instanceof LockContentionError) {
        log.warn('Previous run still holds the lock; skipping this tick')
        return
      }
      if (error instanceof SetupError) {
        log.error({ error }, 'Cycle aborted')
        return
      }
      throw error
    }
  })

  return new Promise((resolve) => {
    closeWithGrace({ delay: 10000 }, async ({ err, signal }) => {
      if (err) {
        log.error({ error: err }, 'Stopping after uncaught error')
      } else {
        log.info(`Received ${signal ?? 'shutdown'}, stopping`)
      }
      scheduler.stop()
      resolve(err ? 1 : 0)
    })
  })
}

export interface MainOptions {
  env?: NodeJS.ProcessEnv
  /** Overrides the logger built from configuration */
  logger?: Logger
  run?: CommandRunner
}

/**
 * CLI entry. Returns the process exit code: 0 on success (including cycles
 * with no changes), 1 on any setup failure.
 */
export async function main(
  argv: string[],
  options: MainOptions = {},
): Promise<number> {
  let args: CliArgs
  try {
    args = parseCliArgs(argv)
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error))
    console.error(USAGE)
    return 1
  }

  if (args.help) {
    console.log(USAGE)
    return 0
  }

  const env = options.env ?? process.env
  if (!options.env) {
    loadEnvFile(args.envFile)
  }

  let config: SentinelConfig
  try {
    config = loadConfig(env)
  } catch (error) {
    const log =
      options.logger ?? createLogger({ level: 'info', destination: 'terminal' })
    log.error({ error }, 'Fatal configuration error')
    return 1
  }

  const log =
    options.logger ??
    createLogger({
      level: config.logLevel,
      destination: config.logDestination,
      logDir: resolveLogPath(config.dataDir),
    })

  if (config.notifications.channel === 'none') {
    log.warn(
      'No notification channel configured (PUSHOVER_APP_TOKEN/PUSHOVER_USER_KEY or APPRISE_URL/APPRISE_TARGETS). Notifications will be skipped.',
    )
  }

  const app = buildSentinel(config, log, options.run)

  try {
    switch (args.command) {
      case 'check':
        await app.handshakeSource.checkAvailability()
        log.info(`Container ${config.containerName} is reachable`)
        return 0
      case 'run':
        log.info('Script started')
        await runLockedCycle(app, config, log)
        log.info('Script finished')
        return 0
      case 'watch':
        return await watch(app, config, log)
    }
  } catch (error) {
    if (error instanceof SetupError) {
      logSetupFailure(log, error)
      return 1
    }
    throw error
  }
}
