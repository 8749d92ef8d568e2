/**
 * Receiver-side frame decoding.
 */

import { commandName } from './commands';
import { ContPacket } from './cont-packet';
import { InitPacket } from './init-packet';
import { frameKind, toHex, type Packet, type PacketDecoder } from './packet';

export type Frame = InitPacket | ContPacket;

/**
 * Decode a 64-byte report body with a frame class the caller has chosen.
 */
export function decodePacket<T extends Packet>(
  decoder: PacketDecoder<T>,
  data: Uint8Array
): T {
  return decoder.fromWireFormat(data);
}

/**
 * Decode a 64-byte report body, picking the frame kind from the
 * init-frame bit.
 *
 * @throws {MalformedFrameError} If data is not 64 bytes
 */
export function decodeFrame(data: Uint8Array): Frame {
  if (frameKind(data) === 'init') {
    const packet = decodePacket(InitPacket, data);
    console.debug(
      `RX init cid=${toHex(packet.cid)} cmd=${commandName(packet.cmd)} bcnt=${packet.size}`
    );
    return packet;
  }

  const packet = decodePacket(ContPacket, data);
  console.debug(`RX cont cid=${toHex(packet.cid)} seq=${packet.seq}`);
  return packet;
}
