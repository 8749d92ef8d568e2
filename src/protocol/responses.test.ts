import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  DeviceError,
  InvalidResponseError,
  UnknownErrorCodeError,
} from '../exceptions';
import { CommandCode, ErrorCode } from './constants';
import { InitPacket } from './init-packet';
import {
  describeErrorCode,
  errorCodeFromWireFormat,
  parseErrorResponse,
} from './responses';

const CID = new Uint8Array([0x11, 0x22, 0x33, 0x44]);

describe('ErrorCode', () => {
  it('decodes every defined error byte', () => {
    expect(errorCodeFromWireFormat(0x01)).toBe(ErrorCode.INVALID_CMD);
    expect(errorCodeFromWireFormat(0x02)).toBe(ErrorCode.INVALID_PAR);
    expect(errorCodeFromWireFormat(0x03)).toBe(ErrorCode.INVALID_LEN);
    expect(errorCodeFromWireFormat(0x04)).toBe(ErrorCode.INVALID_SEQ);
    expect(errorCodeFromWireFormat(0x05)).toBe(ErrorCode.MSG_TIMEOUT);
    expect(errorCodeFromWireFormat(0x06)).toBe(ErrorCode.CHANNEL_BUSY);
    expect(errorCodeFromWireFormat(0x0a)).toBe(ErrorCode.LOCK_REQUIRED);
    expect(errorCodeFromWireFormat(0x0b)).toBe(ErrorCode.NA);
    expect(errorCodeFromWireFormat(0x7f)).toBe(ErrorCode.OTHER);
  });

  it('fails on undefined error bytes', () => {
    expect(() => errorCodeFromWireFormat(0x00)).toThrow(UnknownErrorCodeError);
    expect(() => errorCodeFromWireFormat(0x07)).toThrow('Unknown error code 0x07');
  });

  it('describes error codes', () => {
    expect(describeErrorCode(ErrorCode.INVALID_LEN)).toBe(
      'The length field (BCNT) is invalid for the request'
    );
    expect(describeErrorCode(ErrorCode.OTHER)).toBe('Unspecified error');
  });

  it('describes a forged error code without failing', () => {
    const forged: number = 0x20;

    expect(describeErrorCode(forged)).toBe('Unknown error 0x20');
  });
});

describe('parseErrorResponse', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads the error code from an ERROR frame', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const packet = new InitPacket(CID, CommandCode.ERROR, 1, new Uint8Array([0x06]));

    const error = parseErrorResponse(packet);

    expect(error).toBeInstanceOf(DeviceError);
    expect(error.code).toBe(ErrorCode.CHANNEL_BUSY);
    expect(error.message).toBe('The device is busy for the requesting channel');
    expect(warn).toHaveBeenCalledWith(
      'Device reported error 0x06 on channel 11 22 33 44: The device is busy for the requesting channel'
    );
  });

  it('rejects frames that are not ERROR frames', () => {
    const packet = new InitPacket(CID, CommandCode.PING, 1, new Uint8Array([0x06]));

    expect(() => parseErrorResponse(packet)).toThrow(
      new InvalidResponseError('Expected ERROR frame, got PING')
    );
  });

  it('rejects an ERROR frame without a code', () => {
    const packet = new InitPacket(CID, CommandCode.ERROR, 0, new Uint8Array(0));

    expect(() => parseErrorResponse(packet)).toThrow('ERROR frame carries no error code');
  });

  it('propagates undefined error codes', () => {
    const packet = new InitPacket(CID, CommandCode.ERROR, 1, new Uint8Array([0x20]));

    expect(() => parseErrorResponse(packet)).toThrow(UnknownErrorCodeError);
  });
});
