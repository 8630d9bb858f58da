import type { HandshakeRecord } from '@root/types/connectivity.types.js'

export interface ParsedHandshakes {
  records: HandshakeRecord[]
  /** Non-empty lines that did not match `<interface> <peer> <unixSeconds>` */
  discardedLines: string[]
}

const HANDSHAKE_LINE = /^(\S+)\s+(\S+)\s+(\d+)$/

/**
 * Parses `wg show all latest-handshakes` output.
 *
 * Each line is `<interfaceName>\t<publicKey>\t<unixSeconds>`; everything else
 * is discarded so the reconciler only ever sees well-formed records.
 */
export function parseHandshakeOutput(output: string): ParsedHandshakes {
  const records: HandshakeRecord[] = []
  const discardedLines: string[] = []

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue

    const match = HANDSHAKE_LINE.exec(line)
    const timestamp = match ? Number.parseInt(match[3], 10) : Number.NaN
    if (!match || !Number.isSafeInteger(timestamp)) {
      discardedLines.push(line)
      continue
    }

    records.push({ peer: match[2], lastHandshakeUnixSeconds: timestamp })
  }

  return { records, discardedLines }
}
