/**
 * Name Resolver
 *
 * Maps WireGuard public keys to the client names wg-easy records in its
 * generated server config.
 */
import type { PeerId } from '@root/types/connectivity.types.js'
import { type DockerContainer, describeCommandFailure } from '@utils/docker.js'
import { BackendUnavailableError } from '@utils/errors.js'
import { parseFriendlyNames } from '@utils/wireguard/friendly-names.js'
import type { Logger } from 'pino'

export interface NameResolver {
  /** Friendly name for a peer, or the raw identifier when none is known */
  labelFor(peer: PeerId): string
}

/**
 * Resolver backed by a fixed map. Also what WireGuardNameResolver hands out
 * after loading.
 */
export class StaticNameResolver implements NameResolver {
  constructor(private readonly names: ReadonlyMap<PeerId, string> = new Map()) {}

  labelFor(peer: PeerId): string {
    return this.names.get(peer) || peer
  }
}

/**
 * Display form used in notifications: `'alice' (KEY)` when a friendly name is
 * known, otherwise the bare key.
 */
export function displayPeer(resolver: NameResolver, peer: PeerId): string {
  const label = resolver.labelFor(peer)
  return label === peer ? peer : `'${label}' (${peer})`
}

export class WireGuardNameResolver {
  constructor(
    private readonly log: Logger,
    private readonly container: DockerContainer,
    private readonly configPath: string,
  ) {}

  /**
   * Reads the WireGuard config out of the container. Called once per cycle
   * so renamed or newly added clients are picked up.
   */
  async load(): Promise<StaticNameResolver> {
    let config: string
    try {
      config = await this.container.exec(['cat', this.configPath])
    } catch (error) {
      throw new BackendUnavailableError(
        `Error retrieving ${this.configPath} from container ${this.container.name}: ${describeCommandFailure(error)}`,
        { cause: error },
      )
    }

    const { names, unnamedKeys } = parseFriendlyNames(config)

    for (const [publicKey, name] of names) {
      this.log.debug(`Mapped PublicKey ${publicKey} to friendly name '${name}'`)
    }
    for (const publicKey of unnamedKeys) {
      this.log.warn(
        `Found PublicKey '${publicKey}' without preceding friendly name comment`,
      )
    }
    if (names.size === 0) {
      this.log.warn('No friendly names found in the WireGuard config')
    }

    return new StaticNameResolver(names)
  }
}
