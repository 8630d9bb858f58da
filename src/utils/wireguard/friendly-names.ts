import type { PeerId } from '@root/types/connectivity.types.js'

export interface ParsedFriendlyNames {
  names: Map<PeerId, string>
  /** Public keys found without a preceding `# Client:` comment */
  unnamedKeys: PeerId[]
}

const CLIENT_COMMENT = /^# Client: (.*) \(.+\)$/
const PUBLIC_KEY_LINE = /^PublicKey\s*=\s*(.+)$/

/**
 * Extracts PublicKey → client name pairs from a wg-easy generated `wg0.conf`.
 *
 * wg-easy writes a `# Client: <name> (<id>)` comment above every `[Peer]`
 * block; the name binds to the next `PublicKey` line only.
 */
export function parseFriendlyNames(config: string): ParsedFriendlyNames {
  const names = new Map<PeerId, string>()
  const unnamedKeys: PeerId[] = []
  let pendingName = ''

  for (const rawLine of config.split(/\r?\n/)) {
    const line = rawLine.trim()

    const comment = CLIENT_COMMENT.exec(line)
    if (comment) {
      pendingName = comment[1].trim()
      continue
    }

    const key = PUBLIC_KEY_LINE.exec(line)
    if (key) {
      const publicKey = key[1].trim()
      if (pendingName && publicKey) {
        names.set(publicKey, pendingName)
      } else if (publicKey) {
        unnamedKeys.push(publicKey)
      }
      pendingName = ''
    }
  }

  return { names, unnamedKeys }
}
