import { WireGuardHandshakeSource } from '@services/handshake-source.service.js'
import { DockerContainer } from '@utils/docker.js'
import { BackendUnavailableError } from '@utils/errors.js'
import { describe, expect, it } from 'vitest'
import { commandFailure, createFakeDocker } from '../../mocks/docker.js'
import { createMockLogger } from '../../mocks/logger.js'

describe('WireGuardHandshakeSource', () => {
  describe('snapshot', () => {
    it('should run wg show inside the container and parse its output', async () => {
      const run = createFakeDocker({
        handshakes: 'wg0\tkeyA=\t1700000000\nwg0\tkeyB=\t0\n',
      })
      const source = new WireGuardHandshakeSource(
        createMockLogger(),
        new DockerContainer('wg-easy', run),
      )

      const records = await source.snapshot()

      expect(run).toHaveBeenCalledWith('docker', [
        'exec',
        'wg-easy',
        'wg',
        'show',
        'all',
        'latest-handshakes',
      ])
      expect(records).toEqual([
        { peer: 'keyA=', lastHandshakeUnixSeconds: 1700000000 },
        { peer: 'keyB=', lastHandshakeUnixSeconds: 0 },
      ])
    })

    it('should return an empty snapshot for empty output', async () => {
      const log = createMockLogger()
      const source = new WireGuardHandshakeSource(
        log,
        new DockerContainer('wg-easy', createFakeDocker({ handshakes: '' })),
      )

      await expect(source.snapshot()).resolves.toEqual([])
      expect(log.info).toHaveBeenCalledWith(
        'No peers found in current handshake info',
      )
    })

    it('should warn about discarded lines', async () => {
      const log = createMockLogger()
      const source = new WireGuardHandshakeSource(
        log,
        new DockerContainer(
          'wg-easy',
          createFakeDocker({ handshakes: 'bogus line\nwg0 k= 5\n' }),
        ),
      )

      await expect(source.snapshot()).resolves.toEqual([
        { peer: 'k=', lastHandshakeUnixSeconds: 5 },
      ])
      expect(log.warn).toHaveBeenCalledWith(
        { line: 'bogus line' },
        'Discarding malformed handshake line',
      )
    })

    it('should fail with BackendUnavailableError when the command fails', async () => {
      const source = new WireGuardHandshakeSource(
        createMockLogger(),
        new DockerContainer(
          'wg-easy',
          createFakeDocker({
            handshakes: commandFailure('Error: No such container: wg-easy'),
          }),
        ),
      )

      await expect(source.snapshot()).rejects.toThrow(
        new BackendUnavailableError(
          'Error retrieving handshake info from container wg-easy: Error: No such container: wg-easy',
        ),
      )
    })
  })

  describe('checkAvailability', () => {
    it('should pass when the daemon answers and the container is running', async () => {
      const run = createFakeDocker({ info: '27.0.1\n', status: 'running\n' })
      const source = new WireGuardHandshakeSource(
        createMockLogger(),
        new DockerContainer('wg-easy', run),
      )

      await expect(source.checkAvailability()).resolves.toBeUndefined()
      expect(run).toHaveBeenCalledWith('docker', [
        'container',
        'inspect',
        'wg-easy',
        '--format',
        '{{.State.Status}}',
      ])
    })

    it('should report a missing docker binary', async () => {
      const source = new WireGuardHandshakeSource(
        createMockLogger(),
        new DockerContainer(
          'wg-easy',
          createFakeDocker({
            info: Object.assign(new Error('spawn docker ENOENT'), {
              code: 'ENOENT',
            }),
          }),
        ),
      )

      await expect(source.checkAvailability()).rejects.toThrow(
        'Cannot connect to the Docker daemon: docker command not found',
      )
    })

    it('should report a stopped container', async () => {
      const source = new WireGuardHandshakeSource(
        createMockLogger(),
        new DockerContainer('wg-easy', createFakeDocker({ status: 'exited\n' })),
      )

      const error = await source.checkAvailability().catch((e: unknown) => e)
      expect(error).toBeInstanceOf(BackendUnavailableError)
      expect(error).toHaveProperty(
        'message',
        'Container wg-easy is not running (state: exited)',
      )
    })

    it('should report a container that cannot be inspected', async () => {
      const source = new WireGuardHandshakeSource(
        createMockLogger(),
        new DockerContainer(
          'vpn',
          createFakeDocker({ status: commandFailure('Error: No such container: vpn') }),
        ),
      )

      await expect(source.checkAvailability()).rejects.toThrow(
        'Cannot inspect container vpn: Error: No such container: vpn',
      )
    })
  })
})
