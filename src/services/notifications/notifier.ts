import { setTimeout as delay } from 'node:timers/promises'
import type {
  DeliveryResult,
  NotificationMessage,
  Notifier,
  RetryPolicy,
} from '@root/types/notification.types.js'
import { DeliveryError, toError } from '@utils/errors.js'
import type { Logger } from 'pino'

/** One delivery attempt; throws on failure */
export type DeliverFn = (message: NotificationMessage) => Promise<void>

export type SleepFn = (ms: number) => Promise<void>

const defaultSleep: SleepFn = async (ms) => {
  await delay(ms)
}

/**
 * Wraps a channel's single-attempt delivery in a fixed-delay bounded retry.
 * Never throws: exhaustion is reported as a `failed` result.
 */
export class RetryingNotifier implements Notifier {
  constructor(
    private readonly log: Logger,
    readonly channel: string,
    private readonly deliver: DeliverFn,
    private readonly retry: RetryPolicy,
    private readonly sleep: SleepFn = defaultSleep,
  ) {}

  async send(message: NotificationMessage): Promise<DeliveryResult> {
    const { maxAttempts, delayMs } = this.retry
    let lastError = new DeliveryError('No delivery attempt was made')

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      this.log.debug(
        `Attempt ${attempt}/${maxAttempts}: Sending notification '${message.title}'`,
      )
      try {
        await this.deliver(message)
        this.log.info(
          `Notification '${message.title}' sent successfully on attempt ${attempt}`,
        )
        return { status: 'sent', attempts: attempt }
      } catch (error) {
        lastError =
          error instanceof DeliveryError
            ? error
            : new DeliveryError(toError(error).message, undefined, {
                cause: error,
              })
        this.log.warn(
          { error: lastError },
          `Attempt ${attempt}/${maxAttempts} failed for notification '${message.title}'`,
        )
      }

      if (attempt < maxAttempts) {
        this.log.debug(`Waiting ${delayMs}ms before next attempt`)
        await this.sleep(delayMs)
      }
    }

    return {
      status: 'failed',
      attempts: Math.max(maxAttempts, 0),
      error: lastError,
    }
  }
}

/**
 * Stand-in used when no channel is configured, so a run without credentials
 * still reconciles and persists state.
 */
export class DisabledNotifier implements Notifier {
  readonly channel = 'none'

  constructor(private readonly log: Logger) {}

  async send(message: NotificationMessage): Promise<DeliveryResult> {
    this.log.warn(
      `Notification credentials not set. Skipping notification: '${message.title}'`,
    )
    return { status: 'skipped', reason: 'no notification channel configured' }
  }
}
