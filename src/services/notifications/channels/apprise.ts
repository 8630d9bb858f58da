/**
 * Apprise Channel
 *
 * Pure function for a single delivery attempt through an Apprise API
 * container (POST /notify with explicit target URLs).
 */
import type { AppriseChannelConfig } from '@root/types/config.types.js'
import type { NotificationMessage } from '@root/types/notification.types.js'
import { DeliveryError, toError } from '@utils/errors.js'
import { truncate } from '@utils/text.js'
import type { Logger } from 'pino'

export type AppriseMessageType = 'info' | 'success' | 'warning' | 'failure'

const DEFAULT_TIMEOUT_MS = 10000

export interface AppriseDeps {
  log: Logger
  config: AppriseChannelConfig
  timeoutMs?: number
}

export function appriseTypeFor(message: NotificationMessage): AppriseMessageType {
  switch (message.kind) {
    case 'connected':
      return 'success'
    case 'disconnected':
      return 'warning'
    default:
      return 'info'
  }
}

/**
 * Sends one plain-text notification to every configured Apprise target.
 *
 * @throws DeliveryError on a non-2xx response, a network error or a timeout
 */
export async function sendAppriseMessage(
  message: NotificationMessage,
  deps: AppriseDeps,
): Promise<void> {
  const { log, config } = deps

  const payload = {
    urls: config.targets,
    title: message.title,
    body: message.body,
    type: appriseTypeFor(message),
    format: 'text',
  }

  log.debug(
    { urlCount: config.targets.split(',').length },
    'Sending Apprise notification',
  )

  const url = new URL('/notify', config.baseUrl)

  const controller = new AbortController()
  const timeoutId = setTimeout(
    () => controller.abort(),
    deps.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  )

  let response: Response
  try {
    response = await fetch(url.toString(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: controller.signal,
    })
  } catch (error) {
    throw new DeliveryError(
      `Apprise request failed: ${toError(error).message}`,
      undefined,
      { cause: error },
    )
  } finally {
    clearTimeout(timeoutId)
  }

  if (!response.ok) {
    const responseBody = await response.text().catch(() => '')
    throw new DeliveryError(
      `Apprise request failed: HTTP ${response.status}${responseBody ? ` ${truncate(responseBody, 200)}` : ''}`,
      response.status,
    )
  }
}
