export class NotFoundError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'NotFoundError'
  }
}

export class AlreadyExistsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'AlreadyExistsError'
  }
}

export class TransportError extends Error {
  readonly statusCode: number | null

  constructor(message: string, options?: ErrorOptions & { statusCode?: number | null }) {
    super(message, options)
    this.name = 'TransportError'
    this.statusCode = options?.statusCode ?? null
  }
}

export class OwnershipError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'OwnershipError'
  }
}

export class DecodeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'DecodeError'
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export const isNotFound = (error: unknown): error is NotFoundError => error instanceof NotFoundError

export const isAlreadyExists = (error: unknown): error is AlreadyExistsError => error instanceof AlreadyExistsError

export const isStoreError = (error: unknown): error is NotFoundError | AlreadyExistsError | TransportError =>
  error instanceof NotFoundError || error instanceof AlreadyExistsError || error instanceof TransportError

export const abortedError = (signal: AbortSignal) => new TransportError('request aborted', { cause: signal.reason })

export const formatError = (error: unknown) => (error instanceof Error ? error.message : String(error))
