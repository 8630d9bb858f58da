import { resolve } from 'node:path'
import { EnvSchema, type Env } from '@schemas/config.schema.js'
import type {
  NotificationChannelConfig,
  SentinelConfig,
} from '@root/types/config.types.js'
import { config as loadDotenv } from 'dotenv'
import {
  resolveDataDir,
  resolveEnvPath,
  resolveLockPath,
  resolveStatePath,
} from './data-dir.js'
import { ConfigError } from './errors.js'

/**
 * Loads a .env file into process.env without overriding variables that are
 * already set (values passed with `docker run -e` win).
 */
export function loadEnvFile(path: string = resolveEnvPath()): void {
  loadDotenv({ path })
}

function resolveChannel(env: Env): NotificationChannelConfig {
  if (env.PUSHOVER_APP_TOKEN && env.PUSHOVER_USER_KEY) {
    return {
      channel: 'pushover',
      appToken: env.PUSHOVER_APP_TOKEN,
      userKey: env.PUSHOVER_USER_KEY,
      apiUrl: env.PUSHOVER_API_URL,
    }
  }
  if (env.APPRISE_URL && env.APPRISE_TARGETS) {
    return {
      channel: 'apprise',
      baseUrl: env.APPRISE_URL,
      targets: env.APPRISE_TARGETS,
    }
  }
  return { channel: 'none' }
}

/**
 * Validates the environment and builds the sentinel configuration.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): SentinelConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`,
      ),
    )
  }

  const values = parsed.data
  const dataDir = resolveDataDir(env)

  return {
    containerName: values.WG_CONTAINER_NAME,
    wgConfigPath: values.WG_CONFIG_PATH,
    timeoutThresholdSeconds: values.TIMEOUT_THRESHOLD,
    vpnName: values.VPN_NAME,
    dataDir,
    stateFile: values.STATE_FILE
      ? resolve(values.STATE_FILE)
      : resolveStatePath(dataDir),
    lockFile: values.LOCK_FILE ? resolve(values.LOCK_FILE) : resolveLockPath(),
    notifications: resolveChannel(values),
    retry: {
      maxAttempts: values.NOTIFY_MAX_ATTEMPTS,
      delayMs: values.NOTIFY_RETRY_DELAY_SECONDS * 1000,
    },
    pollIntervalSeconds: values.POLL_INTERVAL_SECONDS,
    logLevel: values.LOG_LEVEL,
    logDestination: values.LOG_DESTINATION,
  }
}
