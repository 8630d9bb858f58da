import type { LevelWithSilent } from 'pino'
import type { RetryPolicy } from './notification.types.js'

export type LogDestination = 'terminal' | 'file' | 'both'

export interface PushoverChannelConfig {
  channel: 'pushover'
  appToken: string
  userKey: string
  apiUrl: string
}

export interface AppriseChannelConfig {
  channel: 'apprise'
  /** Base URL of the Apprise API container */
  baseUrl: string
  /** Comma separated Apprise target URLs */
  targets: string
}

export interface DisabledChannelConfig {
  channel: 'none'
}

export type NotificationChannelConfig =
  | PushoverChannelConfig
  | AppriseChannelConfig
  | DisabledChannelConfig

export interface SentinelConfig {
  /** Docker container running WireGuard */
  containerName: string
  /** Path of the WireGuard config inside the container */
  wgConfigPath: string
  /** A peer whose last handshake is at least this old is disconnected */
  timeoutThresholdSeconds: number
  /** Optional system label shown in notification titles */
  vpnName?: string
  dataDir: string
  stateFile: string
  lockFile: string
  notifications: NotificationChannelConfig
  retry: RetryPolicy
  pollIntervalSeconds: number
  logLevel: LevelWithSilent
  logDestination: LogDestination
}
