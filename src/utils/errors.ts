/**
 * Failure that aborts a run before any state is touched.
 * The CLI maps every subclass to exit code 1.
 */
export class SetupError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SetupError'
  }
}

export class ConfigError extends SetupError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class BackendUnavailableError extends SetupError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'BackendUnavailableError'
  }
}

export class LockContentionError extends SetupError {
  readonly lockPath: string

  constructor(lockPath: string, options?: ErrorOptions) {
    super(`Another run holds the lock on ${lockPath}`, options)
    this.name = 'LockContentionError'
    this.lockPath = lockPath
  }
}

export class StateReadError extends SetupError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'StateReadError'
  }
}

/**
 * The new ledger could not be written. Logged, never fatal: the next
 * successful save heals the state.
 */
export class PersistenceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PersistenceError'
  }
}

export class DeliveryError extends Error {
  readonly status?: number

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DeliveryError'
    this.status = status
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
