/**
 * Exception classes for the SensorTag bridge.
 */

export class SensorTagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SensorTagError';
  }
}

/**
 * BLE link could not be established. Fatal for the cycle, never retried.
 */
export class ConnectionError extends SensorTagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Raised by a transport when the link drops during an operation.
 */
export class LinkLostError extends SensorTagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkLostError';
  }
}

/**
 * Link dropped on every attempt of a cycle.
 */
export class DisconnectError extends SensorTagError {
  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DisconnectError';
  }
}

export class ProtocolError extends SensorTagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/**
 * Raw characteristic value does not match the sensor's byte layout.
 */
export class DecodeError extends ProtocolError {
  constructor(
    readonly sensorKind: string,
    readonly receivedLength: number,
    readonly expectedLength: number
  ) {
    super(
      `Cannot decode ${sensorKind}: expected ${expectedLength} bytes, got ${receivedLength}`
    );
    this.name = 'DecodeError';
  }
}

export class PublishError extends SensorTagError {
  constructor(
    message: string,
    readonly topic: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PublishError';
  }
}

export class ConfigError extends SensorTagError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
