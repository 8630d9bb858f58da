import type { Ledger, PeerId } from '@root/types/connectivity.types.js'

export interface ParsedLedger {
  ledger: Ledger
  /** Lines that were skipped, verbatim, in file order */
  malformedLines: string[]
}

const UNIX_SECONDS_PATTERN = /^\d+$/

/**
 * Returns a ledger with no connected peers and no known handshakes.
 */
export function emptyLedger(): Ledger {
  return { connected: new Set(), lastHandshake: new Map() }
}

/**
 * Parses the newline-delimited `kind:identifier:value` ledger format.
 *
 * The kind is everything before the first colon and the value everything
 * after the last one, so identifiers may themselves contain colons.
 * Unknown kinds and malformed values are reported, not thrown.
 */
export function parseLedger(content: string): ParsedLedger {
  const connected = new Set<PeerId>()
  const lastHandshake = new Map<PeerId, number>()
  const malformedLines: string[] = []

  for (const rawLine of content.split(/\r?\n/)) {
    if (rawLine.trim() === '') continue

    const firstColon = rawLine.indexOf(':')
    const lastColon = rawLine.lastIndexOf(':')
    if (firstColon === -1 || firstColon === lastColon) {
      malformedLines.push(rawLine)
      continue
    }

    const kind = rawLine.slice(0, firstColon).trim()
    const peer = rawLine.slice(firstColon + 1, lastColon).trim()
    const value = rawLine.slice(lastColon + 1).trim()

    const timestamp = UNIX_SECONDS_PATTERN.test(value)
      ? Number.parseInt(value, 10)
      : Number.NaN

    if (kind === 'handshake' && peer && Number.isSafeInteger(timestamp)) {
      lastHandshake.set(peer, timestamp)
    } else if (kind === 'connected' && peer && value === '1') {
      connected.add(peer)
    } else {
      malformedLines.push(rawLine)
    }
  }

  return { ledger: { connected, lastHandshake }, malformedLines }
}

/**
 * Serializes a ledger: one `connected:<peer>:1` line per connected peer,
 * then one `handshake:<peer>:<unixSeconds>` line per known handshake.
 */
export function serializeLedger(ledger: Ledger): string {
  const lines: string[] = []
  for (const peer of ledger.connected) {
    lines.push(`connected:${peer}:1`)
  }
  for (const [peer, timestamp] of ledger.lastHandshake) {
    lines.push(`handshake:${peer}:${timestamp}`)
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : ''
}
