/**
 * CTAPHID continuation frame.
 */

import { MalformedFrameError, PayloadTooLargeError } from '../exceptions';
import {
  CID_OFFSET,
  CID_SIZE,
  CONT_PAYLOAD_OFFSET,
  CONT_PAYLOAD_SIZE,
  MAX_SEQUENCE,
  SEQ_OFFSET,
} from './constants';
import { assertChannelId, toReport, type Packet } from './packet';

/**
 * Follow-up frame carrying the next chunk of a message.
 *
 * Layout of the 65-byte report:
 *   [0][cid:4][seq:1][payload:59]
 */
export class ContPacket implements Packet {
  readonly cid: Uint8Array;
  private _seq: number;

  /** Full 59-byte payload region, zero-padded */
  readonly payload: Uint8Array;

  /**
   * @param cid - Channel id (4 bytes)
   * @param seq - Sequence number; bit 7 must stay clear
   * @param payload - Next chunk of the message (at most 59 bytes)
   * @throws {MalformedFrameError} If cid or seq is out of range
   * @throws {PayloadTooLargeError} If payload exceeds 59 bytes
   */
  constructor(cid: Uint8Array, seq: number, payload: Uint8Array) {
    assertChannelId(cid);
    if (!Number.isInteger(seq) || seq < 0 || seq > MAX_SEQUENCE) {
      throw new MalformedFrameError(
        `Sequence number ${seq} out of range (0-${MAX_SEQUENCE})`
      );
    }
    if (payload.length > CONT_PAYLOAD_SIZE) {
      throw new PayloadTooLargeError(payload.length, CONT_PAYLOAD_SIZE);
    }

    this.cid = Uint8Array.from(cid);
    this._seq = seq;
    this.payload = new Uint8Array(CONT_PAYLOAD_SIZE);
    this.payload.set(payload);
  }

  /**
   * Sequence number. 0-127 for frames built here; a decoded frame keeps
   * the raw byte.
   */
  get seq(): number {
    return this._seq;
  }

  /**
   * Rebuild a continuation frame from a 64-byte report body.
   *
   * The sequence byte is taken as-is, without range or frame-type checks.
   *
   * @throws {MalformedFrameError} If data is not 64 bytes
   */
  static fromWireFormat(data: Uint8Array): ContPacket {
    const report = toReport(data);

    const packet = new ContPacket(
      report.subarray(CID_OFFSET, CID_OFFSET + CID_SIZE),
      0,
      report.subarray(CONT_PAYLOAD_OFFSET)
    );
    packet._seq = report[SEQ_OFFSET];
    return packet;
  }

  /**
   * @throws {MalformedFrameError} If a decoded sequence byte has the
   *   init-frame bit set
   */
  toWireFormat(): Uint8Array {
    if (this.seq > MAX_SEQUENCE) {
      throw new MalformedFrameError(
        `Sequence number ${this.seq} out of range (0-${MAX_SEQUENCE})`
      );
    }

    const report = new Uint8Array(CONT_PAYLOAD_OFFSET + CONT_PAYLOAD_SIZE);
    report.set(this.cid, CID_OFFSET);
    report[SEQ_OFFSET] = this.seq;
    report.set(this.payload, CONT_PAYLOAD_OFFSET);
    return report;
  }
}
