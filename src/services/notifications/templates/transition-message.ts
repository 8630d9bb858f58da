import type { TransitionEvent } from '@root/types/connectivity.types.js'
import type { NotificationMessage } from '@root/types/notification.types.js'
import { formatElapsed } from '@utils/duration.js'
import { truncate } from '@utils/text.js'
import { displayPeer, type NameResolver } from '@services/name-resolver.service.js'

/** Longest system label kept in a title */
export const MAX_SYSTEM_LABEL_LENGTH = 32

const TITLES = {
  connected: '🟢 Peer Connected',
  disconnected: '🔴 Peer Disconnected',
} as const

/**
 * Normalizes the optional system label; empty labels become undefined.
 */
export function formatSystemLabel(label?: string): string | undefined {
  const trimmed = label?.trim()
  return trimmed ? truncate(trimmed, MAX_SYSTEM_LABEL_LENGTH) : undefined
}

export function buildTransitionMessage(
  event: TransitionEvent,
  names: NameResolver,
  systemLabel?: string,
): NotificationMessage {
  const label = formatSystemLabel(systemLabel)
  const title = label ? `${TITLES[event.kind]} [${label}]` : TITLES[event.kind]
  const display = displayPeer(names, event.peer)

  if (event.kind === 'connected') {
    return {
      title,
      kind: event.kind,
      body: `${display} is now online (last handshake ${formatElapsed(event.elapsedSeconds)} ago).`,
    }
  }

  const body =
    event.lastHandshakeUnixSeconds === 0
      ? `${display} appears to be offline (no handshake on record).`
      : `${display} appears to be offline (last handshake ${formatElapsed(event.elapsedSeconds)} ago).`

  return { title, kind: event.kind, body }
}
