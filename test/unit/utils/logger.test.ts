import { DeliveryError } from '@utils/errors.js'
import {
  createErrorSerializer,
  createLoggerOptions,
  createServiceLogger,
  logFilename,
  REDACTED_PATHS,
} from '@utils/logger.js'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('logger', () => {
  describe('createServiceLogger', () => {
    it('should create a child logger with uppercased service prefix', () => {
      const parent = createMockLogger()
      createServiceLogger(parent, 'wireguard')

      expect(parent.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[WIREGUARD] ' },
      )
    })
  })

  describe('logFilename', () => {
    it('should name the active file without a time', () => {
      expect(logFilename(null)).toBe('sentinel-current.log')
    })

    it('should name rotated files by local date', () => {
      expect(logFilename(new Date(2025, 0, 5))).toBe('sentinel-2025-01-05.log')
    })

    it('should append the rotation index', () => {
      expect(logFilename(new Date(2025, 11, 31).getTime(), 2)).toBe(
        'sentinel-2025-12-31-2.log',
      )
    })
  })

  describe('createLoggerOptions', () => {
    it('should redact notification credentials', () => {
      const options = createLoggerOptions('warn')

      expect(options.level).toBe('warn')
      expect(options.redact).toEqual({
        paths: REDACTED_PATHS,
        censor: '[REDACTED]',
      })
    })

    it('should register the error serializer for err and error', () => {
      const options = createLoggerOptions('info')

      expect(options.serializers?.err).toBeTypeOf('function')
      expect(options.serializers?.error).toBeTypeOf('function')
    })
  })

  describe('createErrorSerializer', () => {
    const serialize = createErrorSerializer()

    it('should keep the status and cause of a delivery error', () => {
      const error = new DeliveryError('HTTP 500', 500, {
        cause: new Error('upstream'),
      })

      expect(serialize(error)).toMatchObject({
        message: 'HTTP 500',
        name: 'DeliveryError',
        status: 500,
        type: 'Error',
        cause: { message: 'upstream', name: 'Error', type: 'Error' },
      })
    })

    it('should keep custom enumerable properties', () => {
      const error = Object.assign(new Error('Command failed'), {
        stderr: 'permission denied',
      })

      expect(serialize(error)).toMatchObject({
        message: 'Command failed',
        stderr: 'permission denied',
      })
    })

    it('should wrap primitives', () => {
      expect(serialize('boom')).toEqual({
        message: 'boom',
        type: 'StringError',
      })
      expect(serialize(42)).toEqual({ message: '42', type: 'NumberError' })
    })

    it('should classify built-in error types', () => {
      expect(serialize(new TypeError('bad'))).toMatchObject({
        type: 'TypeError',
      })
    })
  })
})
