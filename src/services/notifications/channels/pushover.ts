/**
 * Pushover Channel
 *
 * Pure function for a single Pushover delivery attempt. Retries belong to
 * the notifier wrapping it.
 */
import type { PushoverChannelConfig } from '@root/types/config.types.js'
import type { NotificationMessage } from '@root/types/notification.types.js'
import { DeliveryError, toError } from '@utils/errors.js'
import { truncate } from '@utils/text.js'
import type { Logger } from 'pino'

/** Pushover API limits */
export const PUSHOVER_MAX_TITLE_LENGTH = 250
export const PUSHOVER_MAX_MESSAGE_LENGTH = 1024

const DEFAULT_TIMEOUT_MS = 10000

export interface PushoverDeps {
  log: Logger
  config: PushoverChannelConfig
  timeoutMs?: number
}

/**
 * Posts one message to the Pushover messages endpoint.
 *
 * @throws DeliveryError on a non-200 response, a network error or a timeout
 */
export async function sendPushoverMessage(
  message: NotificationMessage,
  deps: PushoverDeps,
): Promise<void> {
  const { log, config } = deps

  const form = new URLSearchParams({
    token: config.appToken,
    user: config.userKey,
    title: truncate(message.title, PUSHOVER_MAX_TITLE_LENGTH),
    message: truncate(message.body, PUSHOVER_MAX_MESSAGE_LENGTH),
  })

  const controller = new AbortController()
  const timeoutId = setTimeout(
    () => controller.abort(),
    deps.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  )

  let response: Response
  try {
    response = await fetch(config.apiUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
      signal: controller.signal,
    })
  } catch (error) {
    throw new DeliveryError(
      `Pushover request failed: ${toError(error).message}`,
      undefined,
      { cause: error },
    )
  } finally {
    clearTimeout(timeoutId)
  }

  if (response.status !== 200) {
    const responseBody = await response.text().catch(() => '')
    throw new DeliveryError(
      `Pushover request failed: HTTP ${response.status}${responseBody ? ` ${truncate(responseBody, 200)}` : ''}`,
      response.status,
    )
  }

  log.debug({ title: message.title }, 'Pushover accepted notification')
}
