import type {
  HandshakeRecord,
  Ledger,
  PeerId,
  ReconcileResult,
  TransitionEvent,
} from '@root/types/connectivity.types.js'

/**
 * Diffs one handshake snapshot against the previously persisted ledger.
 *
 * A peer is connected when its last handshake is strictly younger than
 * `thresholdSeconds` relative to `nowUnixSeconds`. The classification depends
 * on the snapshot alone; `previous` only decides whether a classification is
 * new (and therefore produces an event).
 *
 * When a snapshot lists a peer more than once (one line per interface), the
 * peer is connected if any of its records is fresh, and the last record is
 * the handshake kept in the new ledger. A connected event is emitted once, at
 * the peer's first fresh record.
 *
 * Events are ordered: every `connected` event in snapshot order, then every
 * `disconnected` event in `previous.connected` order.
 */
export function reconcile(
  snapshot: readonly HandshakeRecord[],
  previous: Ledger,
  nowUnixSeconds: number,
  thresholdSeconds: number,
): ReconcileResult {
  const currentHandshakes = new Map<PeerId, number>()
  const currentConnected = new Set<PeerId>()
  const connectedEvents: TransitionEvent[] = []

  for (const { peer, lastHandshakeUnixSeconds: lastHandshake } of snapshot) {
    currentHandshakes.set(peer, lastHandshake)

    const elapsed = nowUnixSeconds - lastHandshake
    if (elapsed >= thresholdSeconds || currentConnected.has(peer)) continue

    currentConnected.add(peer)
    if (!previous.connected.has(peer)) {
      connectedEvents.push({
        kind: 'connected',
        peer,
        elapsedSeconds: elapsed,
        lastHandshakeUnixSeconds: lastHandshake,
      })
    }
  }

  const disconnectedEvents: TransitionEvent[] = []

  for (const peer of previous.connected) {
    if (currentConnected.has(peer)) continue

    const lastKnown = previous.lastHandshake.get(peer) ?? 0
    disconnectedEvents.push({
      kind: 'disconnected',
      peer,
      elapsedSeconds: nowUnixSeconds - lastKnown,
      lastHandshakeUnixSeconds: lastKnown,
    })
  }

  return {
    events: [...connectedEvents, ...disconnectedEvents],
    next: {
      connected: currentConnected,
      lastHandshake: currentHandshakes,
    },
  }
}
