import type { TransitionKind } from './connectivity.types.js'
import type { DeliveryError } from '@utils/errors.js'

/**
 * Fixed-delay bounded retry applied to every notification.
 */
export interface RetryPolicy {
  maxAttempts: number
  delayMs: number
}

export interface NotificationMessage {
  title: string
  body: string
  /** Direction of the transition the message reports, when there is one */
  kind?: TransitionKind
}

export type DeliveryResult =
  | { status: 'sent'; attempts: number }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; attempts: number; error: DeliveryError }

/**
 * Delivers a titled message to the configured push channel.
 * Implementations own their retry policy and never throw.
 */
export interface Notifier {
  readonly channel: string
  send(message: NotificationMessage): Promise<DeliveryResult>
}
