/**
 * CTAPHID wire constants.
 */

// Frame geometry
export const HID_REPORT_SIZE = 65; // Report-ID slot + 64-byte body
export const PACKET_SIZE = 64; // Report body as delivered by the transport
export const CID_SIZE = 4;
export const INIT_PAYLOAD_SIZE = 57;
export const CONT_PAYLOAD_SIZE = 59;

// Field offsets within the 65-byte report
export const CID_OFFSET = 1;
export const CMD_OFFSET = 5;
export const SEQ_OFFSET = 5;
export const BCNT_OFFSET = 6;
export const INIT_PAYLOAD_OFFSET = 8;
export const CONT_PAYLOAD_OFFSET = 6;

export const FRAME_INIT = 0x80; // Set in byte 5 of every init frame
export const MAX_SEQUENCE = 0x7f;
export const MAX_MESSAGE_SIZE = 0xffff; // BCNT is a uint16

/**
 * Channel id used for INIT before a channel has been allocated.
 *
 * Returns a new array on each call.
 */
export function broadcastCid(): Uint8Array {
  return new Uint8Array([0xff, 0xff, 0xff, 0xff]);
}

/**
 * CTAPHID command identifiers.
 */
export enum CommandCode {
  INVALID = 0x00,
  PING = 0x01,
  MSG = 0x03,
  LOCK = 0x04,
  INIT = 0x06,
  WINK = 0x08,
  CBOR = 0x10,
  CANCEL = 0x11,
  KEEPALIVE = 0x3b,
  ERROR = 0x3f,
}

/**
 * Error codes carried in the payload of an ERROR frame.
 */
export enum ErrorCode {
  INVALID_CMD = 0x01,
  INVALID_PAR = 0x02,
  INVALID_LEN = 0x03,
  INVALID_SEQ = 0x04,
  MSG_TIMEOUT = 0x05,
  CHANNEL_BUSY = 0x06,
  LOCK_REQUIRED = 0x0a,
  NA = 0x0b,
  OTHER = 0x7f,
}
