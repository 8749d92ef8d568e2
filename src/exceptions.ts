/**
 * Exception classes for the CTAPHID frame codec.
 */

import type { ErrorCode } from './protocol/constants';

export class CtapHidError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CtapHidError';
  }
}

export class ProtocolError extends CtapHidError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class MalformedFrameError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedFrameError';
  }
}

export class PayloadTooLargeError extends MalformedFrameError {
  constructor(
    public readonly length: number,
    public readonly max: number
  ) {
    super(`Payload too large: ${length} bytes (max ${max})`);
    this.name = 'PayloadTooLargeError';
  }
}

export class InvalidResponseError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidResponseError';
  }
}

export class UnknownErrorCodeError extends InvalidResponseError {
  constructor(public readonly byte: number) {
    super(`Unknown error code 0x${byte.toString(16).padStart(2, '0')}`);
    this.name = 'UnknownErrorCodeError';
  }
}

/**
 * Failure reported by the authenticator in an ERROR frame.
 */
export class DeviceError extends ProtocolError {
  constructor(
    public readonly code: ErrorCode,
    description: string
  ) {
    super(description);
    this.name = 'DeviceError';
  }
}
