export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends GatewayError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID');
  }
}

export class MessageValidationError extends GatewayError {
  constructor(message: string) {
    super(message, 'MESSAGE_INVALID');
  }
}

export class RegistrationError extends GatewayError {
  constructor(message: string) {
    super(message, 'REGISTRATION_CLOSED');
  }
}

export type TransportErrorCode = 'timeout' | 'network' | 'aborted';

/**
 * Raised by an HttpTransport when no HTTP response was obtained.
 * Responses with an error status are not errors at this layer.
 */
export class TransportError extends GatewayError {
  constructor(
    message: string,
    public readonly reason: TransportErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, `TRANSPORT_${reason.toUpperCase()}`);
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}
