/**
 * @file packages/gateway/src/domain/errors/app-error.ts
 * @description Error taxonomy for mission loading, secure transport and sensing.
 */

export type ErrorCode =
  | 'INVALID_MISSION'
  | 'UNSUPPORTED_DESTINATION'
  | 'UNSUPPORTED_PROTOCOL'
  | 'INVALID_ENVELOPE'
  | 'CRYPTO_ERROR'
  | 'SENSOR_UNAVAILABLE'
  | 'TRANSPORT_ERROR'
  | 'UNKNOWN_AGENT'
  | 'CONFIG_ERROR';

/**
 * Base class for every error raised by FieldLink.
 * Operational errors are expected at runtime (bad input, flaky radio);
 * anything else indicates a programming fault.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly isOperational: boolean = true,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed mission profile or trigger set. Raised at load time. */
export class InvalidMissionError extends AppError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message, 'INVALID_MISSION');
  }
}

export class UnsupportedDestinationError extends AppError {
  constructor(public readonly destination: string) {
    super(`Unsupported destination "${destination}"`, 'UNSUPPORTED_DESTINATION');
  }
}

export class UnsupportedProtocolError extends AppError {
  constructor(public readonly protocol: string) {
    super(`No transport registered for protocol "${protocol}"`, 'UNSUPPORTED_PROTOCOL');
  }
}

export class InvalidEnvelopeError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INVALID_ENVELOPE', true, options);
  }
}

/** Malformed or truncated token, bad key material, decode failure. */
export class CryptoError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CRYPTO_ERROR', true, options);
  }
}

export class SensorUnavailableError extends AppError {
  constructor(
    public readonly quantity: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Sensor for "${quantity}" unavailable: ${reason}`, 'SENSOR_UNAVAILABLE', true, options);
  }
}

export class TransportError extends AppError {
  constructor(
    public readonly protocol: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${protocol}] ${message}`, 'TRANSPORT_ERROR', true, options);
  }
}

export class UnknownAgentError extends AppError {
  constructor(public readonly agentId: string) {
    super(`No mission assigned to agent "${agentId}"`, 'UNKNOWN_AGENT');
  }
}

export class ConfigError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', true, options);
  }
}
