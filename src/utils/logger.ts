import fs from 'node:fs'
import type { LogDestination } from '@root/types/config.types.js'
import type { LevelWithSilent, Logger, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export interface SentinelLoggerSettings {
  level: LevelWithSilent
  destination: LogDestination
  /** Directory for rotated log files; required unless destination is 'terminal' */
  logDir?: string
}

const PRETTY_OPTIONS = {
  translateTime: 'SYS:yyyy-mm-dd HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true, // Force colors even in Docker
}

/**
 * Structured log fields that may carry notification credentials.
 */
export const REDACTED_PATHS = [
  'appToken',
  'userKey',
  '*.appToken',
  '*.userKey',
  'notifications.appToken',
  'notifications.userKey',
]

type SerializableError = Error | Record<string, unknown> | string | number | boolean

/**
 * Creates an error serializer that keeps message, name, type, stack and cause,
 * plus any custom enumerable properties (e.g. the HTTP status of a DeliveryError).
 */
export function createErrorSerializer() {
  const serialize = (err: SerializableError): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof AggregateError) {
      serialized.type = 'AggregateError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    if ('stack' in err && err.stack) {
      serialized.stack = err.stack
    }

    // cause is often non-enumerable on Error
    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        cause instanceof Error ||
        typeof cause === 'string' ||
        typeof cause === 'number' ||
        typeof cause === 'boolean'
          ? serialize(cause)
          : typeof cause === 'object'
            ? serialize({ ...cause })
            : String(cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (!['message', 'stack', 'name', 'status', 'type'].includes(key)) {
        serialized[key] = value
      }
    }

    return serialized
  }

  return serialize
}

/**
 * Generates a log filename for rotating-file-stream.
 *
 * Without a time this is the active file, 'sentinel-current.log'; rotated files
 * are named 'sentinel-YYYY-MM-DD[-index].log'.
 */
export function logFilename(time: number | Date | null, index?: number): string {
  if (!time) return 'sentinel-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `sentinel-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates a rotating file stream in `logDir`, falling back to stdout when the
 * directory cannot be created.
 */
function getFileStream(logDir: string): rfs.RotatingFileStream | NodeJS.WriteStream {
  try {
    fs.mkdirSync(logDir, { recursive: true })
    return rfs.createStream(logFilename, {
      size: '10M',
      path: logDir,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

/**
 * Options shared by every destination.
 */
export function createLoggerOptions(level: LevelWithSilent): LoggerOptions {
  return {
    level,
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
    serializers: {
      err: createErrorSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Builds the root logger for a run.
 *
 * - terminal: pino-pretty on stdout (cron and Docker capture it)
 * - file: rotating files under `logDir`
 * - both: pino-pretty and rotating files
 */
export function createLogger(settings: SentinelLoggerSettings): Logger {
  const options = createLoggerOptions(settings.level)

  if (settings.destination === 'terminal' || !settings.logDir) {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
    })
  }

  const fileStream = getFileStream(settings.logDir)

  if (settings.destination === 'file') {
    return pino(options, fileStream)
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
    })
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  return pino(
    options,
    pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
  )
}

/**
 * Creates a child logger whose messages carry an uppercased `[NAME] ` prefix.
 */
export function createServiceLogger(parent: Logger, serviceName: string): Logger {
  return parent.child({}, { msgPrefix: `[${serviceName.toUpperCase()}] ` })
}
