/**
 * CTAPHID error codes and ERROR frame parsing.
 */

import {
  DeviceError,
  InvalidResponseError,
  UnknownErrorCodeError,
} from '../exceptions';
import { commandName } from './commands';
import { CommandCode, ErrorCode } from './constants';
import type { InitPacket } from './init-packet';
import { toHex } from './packet';

const ERROR_DESCRIPTIONS: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_CMD]: 'The command in the request is invalid',
  [ErrorCode.INVALID_PAR]: 'The parameter(s) in the request is invalid',
  [ErrorCode.INVALID_LEN]: 'The length field (BCNT) is invalid for the request',
  [ErrorCode.INVALID_SEQ]: 'The sequence does not match expected value',
  [ErrorCode.MSG_TIMEOUT]: 'The message has timed out',
  [ErrorCode.CHANNEL_BUSY]: 'The device is busy for the requesting channel',
  [ErrorCode.LOCK_REQUIRED]: 'Command requires channel lock',
  [ErrorCode.NA]: 'Reserved error',
  [ErrorCode.OTHER]: 'Unspecified error',
};

const ERROR_CODES_BY_BYTE = new Map<number, ErrorCode>([
  [0x01, ErrorCode.INVALID_CMD],
  [0x02, ErrorCode.INVALID_PAR],
  [0x03, ErrorCode.INVALID_LEN],
  [0x04, ErrorCode.INVALID_SEQ],
  [0x05, ErrorCode.MSG_TIMEOUT],
  [0x06, ErrorCode.CHANNEL_BUSY],
  [0x0a, ErrorCode.LOCK_REQUIRED],
  [0x0b, ErrorCode.NA],
  [0x7f, ErrorCode.OTHER],
]);

export function describeErrorCode(code: ErrorCode): string {
  return (
    ERROR_DESCRIPTIONS[code] ??
    `Unknown error 0x${Number(code).toString(16).padStart(2, '0')}`
  );
}

/**
 * Decode an error byte.
 *
 * Unlike commands there is no catch-all variant, so unknown bytes fail.
 *
 * @throws {UnknownErrorCodeError} If the byte is not a defined error code
 */
export function errorCodeFromWireFormat(byte: number): ErrorCode {
  const code = ERROR_CODES_BY_BYTE.get(byte);
  if (code === undefined) {
    throw new UnknownErrorCodeError(byte);
  }
  return code;
}

/**
 * Read the error carried by an ERROR init frame.
 *
 * Format: cmd = ERROR, bcnt = 1, payload = [code:1]
 *
 * @param packet - Decoded init frame
 * @returns DeviceError describing the reported code
 * @throws {InvalidResponseError} If the frame is not an ERROR frame or is empty
 * @throws {UnknownErrorCodeError} If the code byte is not defined
 */
export function parseErrorResponse(packet: InitPacket): DeviceError {
  if (packet.cmd !== CommandCode.ERROR) {
    throw new InvalidResponseError(
      `Expected ERROR frame, got ${commandName(packet.cmd)}`
    );
  }
  if (packet.size < 1) {
    throw new InvalidResponseError('ERROR frame carries no error code');
  }

  const code = errorCodeFromWireFormat(packet.payload[0]);
  const description = describeErrorCode(code);
  console.warn(
    `Device reported error 0x${code.toString(16).padStart(2, '0')} on channel ${toHex(packet.cid)}: ${description}`
  );

  return new DeviceError(code, description);
}
