import type { SentinelConfig } from '@root/types/config.types.js'
import type { Notifier } from '@root/types/notification.types.js'
import type { Logger } from 'pino'
import { sendAppriseMessage } from './channels/apprise.js'
import { sendPushoverMessage } from './channels/pushover.js'
import { DisabledNotifier, RetryingNotifier, type SleepFn } from './notifier.js'

/**
 * Builds the notifier for the configured channel.
 */
export function createNotifier(
  config: Pick<SentinelConfig, 'notifications' | 'retry'>,
  log: Logger,
  sleep?: SleepFn,
): Notifier {
  const channel = config.notifications

  switch (channel.channel) {
    case 'pushover':
      return new RetryingNotifier(
        log,
        'pushover',
        (message) => sendPushoverMessage(message, { log, config: channel }),
        config.retry,
        sleep,
      )
    case 'apprise':
      return new RetryingNotifier(
        log,
        'apprise',
        (message) => sendAppriseMessage(message, { log, config: channel }),
        config.retry,
        sleep,
      )
    case 'none':
      return new DisabledNotifier(log)
  }
}
