import {
  MAVLINK_CHECKSUM_SIZE,
  MAVLINK_IFLAG_SIGNED,
  MAVLINK_MAX_PAYLOAD_SIZE,
  MAVLINK_SIGNATURE_SIZE,
  mavlinkHeaderSize,
  mavlinkMagic,
} from "./constants";
import { mavlinkChecksum } from "./crcX25";
import crcExtras from "./crcExtras.json";
import payloadLengths from "./payloadLengths.json";
import type { FrameParseResult, MavlinkCodec, ParseFrameArgs } from "./MavlinkCodec";
import { UsageError } from "../errors";
import type { MavlinkHeader, MavlinkMessage, MavlinkVersion } from "../types";

export type MavlinkFrameCodecOptions = {
  /**
   * CRC_EXTRA byte per message id, mixed into every frame checksum. Defaults to the common
   * message set.
   */
  crcExtras?: ReadonlyMap<number, number>;

  /**
   * When set to true, frames whose message id has no CRC_EXTRA entry are accepted without
   * checking their checksum. When false (the default) they are treated like frames with a bad
   * checksum.
   */
  allowUnknownMessages?: boolean;

  /**
   * Full payload length per message id, extension fields included. MAVLink 2 payloads shorter
   * than this are zero-extended on decode. Defaults to the common message set.
   */
  payloadLengths?: ReadonlyMap<number, number>;
};

export function defaultCrcExtras(): Map<number, number> {
  return new Map(Object.entries(crcExtras).map(([id, extra]) => [Number(id), extra]));
}

export function defaultPayloadLengths(): Map<number, number> {
  return new Map(Object.entries(payloadLengths).map(([id, length]) => [Number(id), length]));
}

/**
 * Frame-level MAVLink 1 and 2 codec. Frames are checked with their X.25 checksum; payloads are
 * passed through undecoded.
 */
export class MavlinkFrameCodec implements MavlinkCodec {
  #crcExtras: ReadonlyMap<number, number>;
  #allowUnknownMessages: boolean;
  #payloadLengths: ReadonlyMap<number, number>;

  constructor({
    crcExtras = defaultCrcExtras(),
    allowUnknownMessages = false,
    payloadLengths = defaultPayloadLengths(),
  }: MavlinkFrameCodecOptions = {}) {
    this.#crcExtras = crcExtras;
    this.#allowUnknownMessages = allowUnknownMessages;
    this.#payloadLengths = payloadLengths;
  }

  parseFrame({ view, startOffset, version, resync }: ParseFrameArgs): FrameParseResult {
    const bytes = new Uint8Array(view.buffer, view.byteOffset, view.byteLength);
    const magic = mavlinkMagic(version);
    let offset = startOffset;

    for (;;) {
      if (resync === "lenient") {
        offset = bytes.indexOf(magic, offset);
        if (offset === -1) {
          return { status: "incomplete" };
        }
      } else if (offset >= bytes.length) {
        return { status: "incomplete" };
      } else if (bytes[offset] !== magic) {
        return {
          status: "corrupt",
          reason: `Expected MAVLink ${version} start marker 0x${magic.toString(16)}, found 0x${bytes[
            offset
          ]!.toString(16)}`,
        };
      }

      const result = this.#parseCandidate(bytes, offset, version);
      if (result.status === "incomplete") {
        return result;
      }
      if (result.status === "frame") {
        return { ...result, usedBytes: offset + result.usedBytes - startOffset };
      }
      if (resync === "strict") {
        return result;
      }
      offset += 1;
    }
  }

  /** Decode the frame whose start marker is at `offset`. `usedBytes` is relative to `offset`. */
  #parseCandidate(bytes: Uint8Array, offset: number, version: MavlinkVersion): FrameParseResult {
    const headerSize = mavlinkHeaderSize(version);
    if (bytes.length - offset < headerSize) {
      return { status: "incomplete" };
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset + offset, bytes.length - offset);
    const payloadLength = view.getUint8(1);

    let incompatFlags = 0;
    let compatFlags = 0;
    let sequence: number;
    let systemId: number;
    let componentId: number;
    let messageId: number;
    if (version === 2) {
      incompatFlags = view.getUint8(2);
      compatFlags = view.getUint8(3);
      sequence = view.getUint8(4);
      systemId = view.getUint8(5);
      componentId = view.getUint8(6);
      messageId = view.getUint8(7) | (view.getUint8(8) << 8) | (view.getUint8(9) << 16);
    } else {
      sequence = view.getUint8(2);
      systemId = view.getUint8(3);
      componentId = view.getUint8(4);
      messageId = view.getUint8(5);
    }

    if ((incompatFlags & ~MAVLINK_IFLAG_SIGNED) !== 0) {
      return {
        status: "corrupt",
        reason: `Unknown incompatibility flags 0x${incompatFlags.toString(16)}`,
      };
    }
    const signatureSize = (incompatFlags & MAVLINK_IFLAG_SIGNED) !== 0 ? MAVLINK_SIGNATURE_SIZE : 0;
    const checksumOffset = headerSize + payloadLength;
    const frameSize = checksumOffset + MAVLINK_CHECKSUM_SIZE + signatureSize;
    if (view.byteLength < frameSize) {
      return { status: "incomplete" };
    }

    const crcExtra = this.#crcExtras.get(messageId);
    if (crcExtra == undefined) {
      if (!this.#allowUnknownMessages) {
        return { status: "corrupt", reason: `No CRC_EXTRA known for message id ${messageId}` };
      }
    } else {
      const expected = view.getUint16(checksumOffset, true);
      const actual = mavlinkChecksum(bytes.subarray(offset + 1, offset + checksumOffset), crcExtra);
      if (actual !== expected) {
        return {
          status: "corrupt",
          reason:
            `Incorrect checksum 0x${actual.toString(16)} for message id ${messageId}` +
            ` (expected 0x${expected.toString(16)})`,
        };
      }
    }

    const header: MavlinkHeader = { sequence, systemId, componentId, incompatFlags, compatFlags };
    if (signatureSize > 0) {
      const signatureOffset = offset + checksumOffset + MAVLINK_CHECKSUM_SIZE;
      header.signature = bytes.slice(signatureOffset, signatureOffset + signatureSize);
    }

    const wirePayload = bytes.subarray(offset + headerSize, offset + checksumOffset);
    let payload: Uint8Array;
    const fullLength = version === 2 ? this.#payloadLengths.get(messageId) : undefined;
    if (fullLength != undefined && fullLength > wirePayload.length) {
      // restore the trailing zero bytes dropped by the sender
      payload = new Uint8Array(fullLength);
      payload.set(wirePayload);
    } else {
      payload = wirePayload.slice();
    }
    return { status: "frame", header, message: { messageId, payload }, usedBytes: frameSize };
  }

  serializeFrame(header: MavlinkHeader, message: MavlinkMessage, version: MavlinkVersion): Uint8Array {
    const { messageId } = message;
    let payload = message.payload;
    if (version === 1 && messageId > 0xff) {
      throw new UsageError(`Message id ${messageId} does not fit in a MAVLink 1 frame`);
    }
    if (version === 2) {
      // MAVLink 2 drops trailing zero bytes from the payload, keeping at least one
      let end = payload.length;
      while (end > 1 && payload[end - 1] === 0) {
        end--;
      }
      payload = payload.subarray(0, end);
    }
    if (payload.length > MAVLINK_MAX_PAYLOAD_SIZE) {
      throw new UsageError(`Payload of ${payload.length} bytes exceeds the MAVLink frame limit`);
    }
    const crcExtra = this.#crcExtras.get(messageId);
    if (crcExtra == undefined && !this.#allowUnknownMessages) {
      throw new UsageError(`No CRC_EXTRA known for message id ${messageId}`);
    }

    const incompatFlags = version === 2 ? header.incompatFlags : 0;
    const signed = (incompatFlags & MAVLINK_IFLAG_SIGNED) !== 0;
    if (signed && header.signature?.length !== MAVLINK_SIGNATURE_SIZE) {
      throw new UsageError(`Signed frames need a ${MAVLINK_SIGNATURE_SIZE} byte signature`);
    }

    const headerSize = mavlinkHeaderSize(version);
    const checksumOffset = headerSize + payload.length;
    const frame = new Uint8Array(
      checksumOffset + MAVLINK_CHECKSUM_SIZE + (signed ? MAVLINK_SIGNATURE_SIZE : 0),
    );
    const view = new DataView(frame.buffer);
    view.setUint8(0, mavlinkMagic(version));
    view.setUint8(1, payload.length);
    if (version === 2) {
      view.setUint8(2, incompatFlags);
      view.setUint8(3, header.compatFlags);
      view.setUint8(4, header.sequence);
      view.setUint8(5, header.systemId);
      view.setUint8(6, header.componentId);
      view.setUint8(7, messageId & 0xff);
      view.setUint8(8, (messageId >> 8) & 0xff);
      view.setUint8(9, (messageId >> 16) & 0xff);
    } else {
      view.setUint8(2, header.sequence);
      view.setUint8(3, header.systemId);
      view.setUint8(4, header.componentId);
      view.setUint8(5, messageId);
    }
    frame.set(payload, headerSize);
    view.setUint16(
      checksumOffset,
      mavlinkChecksum(frame.subarray(1, checksumOffset), crcExtra ?? 0),
      true,
    );
    if (signed && header.signature) {
      frame.set(header.signature, checksumOffset + MAVLINK_CHECKSUM_SIZE);
    }
    return frame;
  }
}
