/**
 * Opaque, stable identifier for a VPN peer (a WireGuard public key).
 * Compared with exact, case-sensitive string equality.
 */
export type PeerId = string

/**
 * One row of a live handshake poll.
 */
export interface HandshakeRecord {
  peer: PeerId
  /** Unix seconds of the latest handshake; 0 when the peer never completed one */
  lastHandshakeUnixSeconds: number
}

/**
 * Durable connectivity state carried between reconciliation cycles.
 * Replaced wholesale at the end of every cycle, never merged.
 */
export interface Ledger {
  connected: ReadonlySet<PeerId>
  lastHandshake: ReadonlyMap<PeerId, number>
}

export type TransitionKind = 'connected' | 'disconnected'

export interface TransitionEvent {
  kind: TransitionKind
  peer: PeerId
  /** Seconds between `now` and the handshake the event was derived from */
  elapsedSeconds: number
  /** The handshake timestamp used for `elapsedSeconds`; 0 when none was on record */
  lastHandshakeUnixSeconds: number
}

export interface ReconcileResult {
  events: TransitionEvent[]
  next: Ledger
}
