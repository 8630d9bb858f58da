/**
 * Sentinel Service
 *
 * Runs one reconciliation cycle: load the ledger, poll handshakes, diff,
 * notify every transition, then persist the new ledger.
 *
 * Responsible for:
 * - Aborting before any state mutation when setup fails
 * - Delivering events in order without letting delivery failures block persistence
 * - Logging (not propagating) persistence failures
 */
import type {
  Ledger,
  TransitionEvent,
} from '@root/types/connectivity.types.js'
import type { Notifier } from '@root/types/notification.types.js'
import { reconcile } from '@utils/connectivity/reconcile.js'
import { PersistenceError } from '@utils/errors.js'
import type { Logger } from 'pino'
import type { HandshakeSource } from './handshake-source.service.js'
import type { NameResolver } from './name-resolver.service.js'
import { buildTransitionMessage } from './notifications/templates/transition-message.js'
import type { StateStore } from './state-store.service.js'

export interface NameResolverLoader {
  load(): Promise<NameResolver>
}

export interface SentinelDeps {
  stateStore: StateStore
  handshakeSource: HandshakeSource
  names: NameResolverLoader
  notifier: Notifier
  /** Current time in unix seconds */
  clock?: () => number
}

export interface SentinelSettings {
  timeoutThresholdSeconds: number
  vpnName?: string
}

export interface CycleResult {
  events: TransitionEvent[]
  delivered: number
  skipped: number
  failed: number
  /** False when the new ledger could not be saved */
  persisted: boolean
  next: Ledger
}

export const unixNow = (): number => Math.floor(Date.now() / 1000)

export class SentinelService {
  private readonly clock: () => number

  constructor(
    private readonly log: Logger,
    private readonly deps: SentinelDeps,
    private readonly settings: SentinelSettings,
  ) {
    this.clock = deps.clock ?? unixNow
  }

  /**
   * Executes a single poll-diff-notify-persist pass.
   *
   * @throws SetupError subclasses (backend, state read) before anything is sent or saved
   */
  async runCycle(): Promise<CycleResult> {
    const { stateStore, handshakeSource, names, notifier } = this.deps

    await handshakeSource.checkAvailability()

    const previous = await stateStore.load()
    const resolver = await names.load()
    const snapshot = await handshakeSource.snapshot()

    const now = this.clock()
    const { events, next } = reconcile(
      snapshot,
      previous,
      now,
      this.settings.timeoutThresholdSeconds,
    )

    const result: CycleResult = {
      events,
      delivered: 0,
      skipped: 0,
      failed: 0,
      persisted: false,
      next,
    }

    for (const event of events) {
      const message = buildTransitionMessage(
        event,
        resolver,
        this.settings.vpnName,
      )
      this.log.info(
        { peer: event.peer, elapsedSeconds: event.elapsedSeconds },
        message.body,
      )

      const delivery = await notifier.send(message)
      switch (delivery.status) {
        case 'sent':
          result.delivered++
          break
        case 'skipped':
          result.skipped++
          break
        case 'failed':
          result.failed++
          this.log.error(
            { error: delivery.error, attempts: delivery.attempts },
            `Failed to send ${event.kind} notification for ${event.peer}`,
          )
          break
      }
    }

    try {
      await stateStore.save(next)
      result.persisted = true
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error
      this.log.error(
        { error },
        'Error saving state. State will be stale for the next run.',
      )
    }

    this.log.info(
      `Cycle complete: ${next.connected.size} connected, ${events.length} transitions, ${result.failed} failed deliveries`,
    )
    return result
  }
}
