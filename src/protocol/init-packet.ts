/**
 * CTAPHID initialization frame.
 */

import { MalformedFrameError, PayloadTooLargeError } from '../exceptions';
import { commandFromWireFormat, commandToWireFormat } from './commands';
import {
  BCNT_OFFSET,
  CID_OFFSET,
  CID_SIZE,
  CMD_OFFSET,
  CommandCode,
  FRAME_INIT,
  INIT_PAYLOAD_OFFSET,
  INIT_PAYLOAD_SIZE,
  MAX_MESSAGE_SIZE,
} from './constants';
import { assertChannelId, toReport, type Packet } from './packet';

/**
 * Leading frame of a CTAPHID message.
 *
 * Layout of the 65-byte report:
 *   [0][cid:4][0x80|cmd:1][bcnt:2 BE][payload:57]
 *
 * @example
 * ```typescript
 * const packet = new InitPacket(cid, CommandCode.PING, 1, new Uint8Array([0xaa]));
 * await device.write(packet.toWireFormat());
 * ```
 */
export class InitPacket implements Packet {
  readonly cid: Uint8Array;
  readonly cmd: CommandCode;

  /** Total message length (BCNT) across this frame and its continuations */
  readonly size: number;

  /** Full 57-byte payload region, zero-padded */
  readonly payload: Uint8Array;

  /**
   * @param cid - Channel id (4 bytes)
   * @param cmd - Command code
   * @param size - Total message length, 0-65535
   * @param payload - First chunk of the message (at most 57 bytes)
   * @throws {MalformedFrameError} If cid or size is out of range
   * @throws {PayloadTooLargeError} If payload exceeds 57 bytes
   */
  constructor(cid: Uint8Array, cmd: CommandCode, size: number, payload: Uint8Array) {
    assertChannelId(cid);
    if (!Number.isInteger(size) || size < 0 || size > MAX_MESSAGE_SIZE) {
      throw new MalformedFrameError(
        `Message size ${size} out of range (0-${MAX_MESSAGE_SIZE})`
      );
    }
    if (payload.length > INIT_PAYLOAD_SIZE) {
      throw new PayloadTooLargeError(payload.length, INIT_PAYLOAD_SIZE);
    }

    this.cid = Uint8Array.from(cid);
    this.cmd = cmd;
    this.size = size;
    this.payload = new Uint8Array(INIT_PAYLOAD_SIZE);
    this.payload.set(payload);
  }

  /**
   * Rebuild an init frame from a 64-byte report body.
   *
   * The frame-type bit is not checked; unknown command bytes read back
   * as INVALID.
   *
   * @throws {MalformedFrameError} If data is not 64 bytes
   */
  static fromWireFormat(data: Uint8Array): InitPacket {
    const report = toReport(data);
    const view = new DataView(report.buffer);

    return new InitPacket(
      report.subarray(CID_OFFSET, CID_OFFSET + CID_SIZE),
      commandFromWireFormat(report[CMD_OFFSET] & ~FRAME_INIT),
      view.getUint16(BCNT_OFFSET, false), // false = big-endian
      report.subarray(INIT_PAYLOAD_OFFSET)
    );
  }

  toWireFormat(): Uint8Array {
    const buffer = new ArrayBuffer(INIT_PAYLOAD_OFFSET + INIT_PAYLOAD_SIZE);
    const view = new DataView(buffer);
    const report = new Uint8Array(buffer);

    report.set(this.cid, CID_OFFSET);
    view.setUint8(CMD_OFFSET, FRAME_INIT | commandToWireFormat(this.cmd));
    view.setUint16(BCNT_OFFSET, this.size, false);
    report.set(this.payload, INIT_PAYLOAD_OFFSET);

    return report;
  }

  /**
   * The part of this frame's payload that belongs to the message,
   * i.e. the payload trimmed to BCNT.
   */
  message(): Uint8Array {
    return this.payload.subarray(0, Math.min(this.size, INIT_PAYLOAD_SIZE));
  }
}
