/**
 * CTAPHID command code conversions.
 */

import { ProtocolError } from '../exceptions';
import { CommandCode } from './constants';

const COMMAND_NAMES: Record<CommandCode, string> = {
  [CommandCode.INVALID]: 'INVALID',
  [CommandCode.PING]: 'PING',
  [CommandCode.MSG]: 'MSG',
  [CommandCode.LOCK]: 'LOCK',
  [CommandCode.INIT]: 'INIT',
  [CommandCode.WINK]: 'WINK',
  [CommandCode.CBOR]: 'CBOR',
  [CommandCode.CANCEL]: 'CANCEL',
  [CommandCode.KEEPALIVE]: 'KEEPALIVE',
  [CommandCode.ERROR]: 'ERROR',
};

const COMMANDS_BY_BYTE = new Map<number, CommandCode>([
  [0x00, CommandCode.INVALID],
  [0x01, CommandCode.PING],
  [0x03, CommandCode.MSG],
  [0x04, CommandCode.LOCK],
  [0x06, CommandCode.INIT],
  [0x08, CommandCode.WINK],
  [0x10, CommandCode.CBOR],
  [0x11, CommandCode.CANCEL],
  [0x3b, CommandCode.KEEPALIVE],
  [0x3f, CommandCode.ERROR],
]);

/**
 * Check whether a byte is one of the defined command codes.
 */
export function isKnownCommand(byte: number): boolean {
  return COMMANDS_BY_BYTE.has(byte);
}

/**
 * Convert a command to its wire byte.
 *
 * @throws {ProtocolError} If the value is not a defined command
 *   (only reachable through a cast)
 */
export function commandToWireFormat(cmd: CommandCode): number {
  if (COMMANDS_BY_BYTE.get(cmd) !== cmd) {
    throw new ProtocolError(
      `Cannot encode unknown command 0x${Number(cmd).toString(16).padStart(2, '0')}`
    );
  }
  return cmd;
}

/**
 * Decode a command byte (frame-type bit already removed).
 *
 * Unrecognized bytes map to INVALID so a receiver can still answer
 * the channel with ERR_INVALID_CMD.
 */
export function commandFromWireFormat(byte: number): CommandCode {
  return COMMANDS_BY_BYTE.get(byte) ?? CommandCode.INVALID;
}

/**
 * Human-readable command name for logs.
 */
export function commandName(cmd: CommandCode): string {
  return COMMAND_NAMES[cmd] ?? `UNKNOWN(0x${Number(cmd).toString(16)})`;
}
