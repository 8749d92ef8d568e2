import { describe, expect, it } from 'vitest';
import { ProtocolError } from '../exceptions';
import {
  commandFromWireFormat,
  commandName,
  commandToWireFormat,
  isKnownCommand,
} from './commands';
import { CommandCode } from './constants';

const WIRE_VALUES: Array<[CommandCode, number]> = [
  [CommandCode.INVALID, 0x00],
  [CommandCode.PING, 0x01],
  [CommandCode.MSG, 0x03],
  [CommandCode.LOCK, 0x04],
  [CommandCode.INIT, 0x06],
  [CommandCode.WINK, 0x08],
  [CommandCode.CBOR, 0x10],
  [CommandCode.CANCEL, 0x11],
  [CommandCode.KEEPALIVE, 0x3b],
  [CommandCode.ERROR, 0x3f],
];

describe('CommandCode', () => {
  it('maps every command to its wire byte and back', () => {
    for (const [cmd, byte] of WIRE_VALUES) {
      expect(commandToWireFormat(cmd)).toBe(byte);
      expect(commandFromWireFormat(byte)).toBe(cmd);
      expect(isKnownCommand(byte)).toBe(true);
    }
  });

  it('decodes undefined bytes as INVALID', () => {
    expect(commandFromWireFormat(0x7e)).toBe(CommandCode.INVALID);
    expect(commandFromWireFormat(0x02)).toBe(CommandCode.INVALID);
    expect(isKnownCommand(0x7e)).toBe(false);
  });

  it('refuses to encode a forged command value', () => {
    const forged: number = 0x7e;

    expect(() => commandToWireFormat(forged)).toThrow(ProtocolError);
    expect(() => commandToWireFormat(forged)).toThrow('Cannot encode unknown command 0x7e');
  });

  it('names commands for logging', () => {
    expect(commandName(CommandCode.KEEPALIVE)).toBe('KEEPALIVE');
    expect(commandName(CommandCode.INVALID)).toBe('INVALID');
  });
});
