/**
 * Base class of every error raised by the IR drivers.
 */
export class DriverError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Thrown when a device id does not resolve to any enumerated device.
 */
export class DeviceNotFoundError extends DriverError {
  constructor(public readonly deviceId: string) {
    super(`Device not found: ${deviceId}`)
  }
}

/**
 * Thrown when a device driver cannot load the data backing its device.
 */
export class DriverConstructionError extends DriverError {
  constructor(public readonly deviceId: string, cause: unknown) {
    super(`Unable to create driver for device ${deviceId}: ${describeError(cause)}`, { cause })
  }
}

/**
 * Thrown when an open transmission channel fails to deliver a signal.
 */
export class TransmissionError extends DriverError {
  constructor(public readonly deviceId: string, public readonly key: string, cause: unknown) {
    super(`Unable to send ${key} to ${deviceId}: ${describeError(cause)}`, { cause })
  }
}

export class DecodeError extends DriverError {
  constructor(message: string, public readonly errors: string[]) {
    super(`${message}: ${errors.join('; ')}`)
  }
}

export const describeError = (e: unknown): string =>
  e instanceof Error ? e.message : String(e)
