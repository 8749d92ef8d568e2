/**
 * Shared contract for CTAPHID init and continuation frames.
 *
 * Both frame kinds serialize to a 65-byte HID report whose first byte is the
 * (always zero) report ID, and decode from the 64-byte report body the
 * transport hands back.
 */

import { MalformedFrameError } from '../exceptions';
import {
  CID_SIZE,
  CMD_OFFSET,
  FRAME_INIT,
  HID_REPORT_SIZE,
  PACKET_SIZE,
} from './constants';

/**
 * A frame that can be written to the device as a HID report.
 */
export interface Packet {
  /** 4-byte channel identifier */
  readonly cid: Uint8Array;

  /**
   * Serialize to a fresh 65-byte report (byte 0 = report ID 0x00).
   */
  toWireFormat(): Uint8Array;
}

/**
 * Static side of a frame class: rebuilds a frame from a 64-byte report body.
 */
export interface PacketDecoder<T extends Packet> {
  fromWireFormat(data: Uint8Array): T;
}

export type FrameKind = 'init' | 'cont';

/**
 * Format bytes as space-separated lower-case hex.
 */
export function toHex(data: Uint8Array): string {
  return Array.from(data)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join(' ');
}

/**
 * @throws {MalformedFrameError} If the channel id is not exactly 4 bytes
 */
export function assertChannelId(cid: Uint8Array): void {
  if (cid.length !== CID_SIZE) {
    throw new MalformedFrameError(
      `Channel id must be ${CID_SIZE} bytes, got ${cid.length}`
    );
  }
}

/**
 * @throws {MalformedFrameError} If the report body is not exactly 64 bytes
 */
export function assertPacketLength(data: Uint8Array): void {
  if (data.length !== PACKET_SIZE) {
    throw new MalformedFrameError(
      `Report body must be ${PACKET_SIZE} bytes, got ${data.length}`
    );
  }
}

/**
 * Copy a 64-byte report body into a zeroed 65-byte report.
 */
export function toReport(data: Uint8Array): Uint8Array {
  assertPacketLength(data);
  const report = new Uint8Array(HID_REPORT_SIZE);
  report.set(data, 1);
  return report;
}

/**
 * Drop the report-ID slot from a full 65-byte report.
 *
 * @throws {MalformedFrameError} If the report has the wrong size or a
 *   non-zero report ID
 */
export function stripReportId(report: Uint8Array): Uint8Array {
  if (report.length !== HID_REPORT_SIZE) {
    throw new MalformedFrameError(
      `HID report must be ${HID_REPORT_SIZE} bytes, got ${report.length}`
    );
  }
  if (report[0] !== 0) {
    throw new MalformedFrameError(
      `Unexpected report ID 0x${report[0].toString(16).padStart(2, '0')}`
    );
  }
  return report.slice(1);
}

/**
 * Tell init and continuation frames apart by the high bit of the
 * command/sequence byte.
 *
 * @param data - 64-byte report body
 */
export function frameKind(data: Uint8Array): FrameKind {
  assertPacketLength(data);
  // Body offsets are one less than report offsets
  return (data[CMD_OFFSET - 1] & FRAME_INIT) !== 0 ? 'init' : 'cont';
}

export function isInitFrame(data: Uint8Array): boolean {
  return frameKind(data) === 'init';
}
