/**
 * Handshake Source
 *
 * Reads live peer handshakes from the WireGuard instance running inside a
 * Docker container (`wg show all latest-handshakes`).
 */
import type { HandshakeRecord } from '@root/types/connectivity.types.js'
import { type DockerContainer, describeCommandFailure } from '@utils/docker.js'
import { BackendUnavailableError } from '@utils/errors.js'
import { parseHandshakeOutput } from '@utils/wireguard/handshakes.js'
import type { Logger } from 'pino'

export interface HandshakeSource {
  /** Preflight: fails with BackendUnavailableError when snapshot() cannot work */
  checkAvailability(): Promise<void>
  /** One poll; an empty array is a valid result, distinct from failure */
  snapshot(): Promise<HandshakeRecord[]>
}

export class WireGuardHandshakeSource implements HandshakeSource {
  constructor(
    private readonly log: Logger,
    private readonly container: DockerContainer,
  ) {}

  async checkAvailability(): Promise<void> {
    try {
      await this.container.info()
    } catch (error) {
      throw new BackendUnavailableError(
        `Cannot connect to the Docker daemon: ${describeCommandFailure(error)}`,
        { cause: error },
      )
    }

    let status: string
    try {
      status = await this.container.status()
    } catch (error) {
      throw new BackendUnavailableError(
        `Cannot inspect container ${this.container.name}: ${describeCommandFailure(error)}`,
        { cause: error },
      )
    }

    if (status !== 'running') {
      throw new BackendUnavailableError(
        `Container ${this.container.name} is not running (state: ${status || 'unknown'})`,
      )
    }

    this.log.debug(`Container ${this.container.name} is running`)
  }

  async snapshot(): Promise<HandshakeRecord[]> {
    let output: string
    try {
      output = await this.container.exec(['wg', 'show', 'all', 'latest-handshakes'])
    } catch (error) {
      throw new BackendUnavailableError(
        `Error retrieving handshake info from container ${this.container.name}: ${describeCommandFailure(error)}`,
        { cause: error },
      )
    }

    const { records, discardedLines } = parseHandshakeOutput(output)

    for (const line of discardedLines) {
      this.log.warn({ line }, 'Discarding malformed handshake line')
    }

    if (records.length === 0) {
      this.log.info('No peers found in current handshake info')
    } else {
      this.log.debug(`Fetched ${records.length} handshake records`)
    }

    return records
  }
}
