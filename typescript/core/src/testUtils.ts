import { MavlinkFrameCodec } from "./mavlink/MavlinkFrameCodec";
import type { MavlinkHeader, MavlinkMessage, MavlinkVersion } from "./types";

export function uint16LE(n: number): Uint8Array {
  const result = new Uint8Array(2);
  new DataView(result.buffer).setUint16(0, n, true);
  return result;
}

export function uint32LE(n: number): Uint8Array {
  const result = new Uint8Array(4);
  new DataView(result.buffer).setUint32(0, n, true);
  return result;
}

export function uint64LE(n: bigint): Uint8Array {
  const result = new Uint8Array(8);
  new DataView(result.buffer).setBigUint64(0, n, true);
  return result;
}

export function uint64BE(n: bigint): Uint8Array {
  const result = new Uint8Array(8);
  new DataView(result.buffer).setBigUint64(0, n, false);
  return result;
}

/** `str` as ASCII, NUL-padded to `size` bytes. */
export function fixedString(str: string, size = 32): Uint8Array {
  const result = new Uint8Array(size);
  result.set(Array.from(str, (c) => c.charCodeAt(0)));
  return result;
}

export function concat(...parts: (Uint8Array | number[])[]): Uint8Array {
  const totalLen = parts.reduce((total, part) => total + part.length, 0);
  const result = new Uint8Array(totalLen);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

export type HeaderFields = {
  formatVersion?: number;
  formatFlags?: number;
  versionMajor?: number;
  versionMinor?: number;
  payloadType?: number;
  size?: number;
  payload?: Uint8Array;
};

export const TEST_UUID = Uint8Array.from([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15]);

/** A file header laid out by hand, field by field. */
export function fileHeaderBytes({
  formatVersion = 1,
  formatFlags = 0,
  versionMajor = 2,
  versionMinor = 1,
  payloadType = 0,
  size = 0,
  payload = new Uint8Array(),
}: HeaderFields = {}): Uint8Array {
  return concat(
    TEST_UUID,
    uint64LE(0x1100000000000010n),
    fixedString("app"),
    uint32LE(formatVersion),
    uint16LE(formatFlags),
    uint32LE(versionMajor),
    uint32LE(versionMinor),
    fixedString("test"),
    uint16LE(payloadType),
    uint32LE(size),
    payload,
  );
}

/**
 * HEARTBEAT from system 255, component 0, sequence 0 (submarine, ArduPilot
 * autopilot, standby), as serialized by a reference MAVLink 2 implementation.
 */
export const HEARTBEAT_V2_FRAME = Uint8Array.from([
  253, 9, 0, 0, 0, 255, 0, 0, 0, 0, 0, 0, 0, 0, 12, 3, 0, 3, 3, 98, 190,
]);

export const HEARTBEAT_V2_HEADER: MavlinkHeader = {
  sequence: 0,
  systemId: 255,
  componentId: 0,
  incompatFlags: 0,
  compatFlags: 0,
};

export const HEARTBEAT_V2_MESSAGE: MavlinkMessage = {
  messageId: 0,
  payload: Uint8Array.from([0, 0, 0, 0, 12, 3, 0, 3, 3]),
};

export function testHeader(sequence: number): MavlinkHeader {
  return { sequence, systemId: 1, componentId: 2, incompatFlags: 0, compatFlags: 0 };
}

/**
 * Cycle through HEARTBEAT, ATTITUDE and GPS2_RAW messages at their full payload length, with
 * contents derived from `i`. The last `i % 4` payload bytes are zero.
 */
export function testMessage(i: number): MavlinkMessage {
  const kinds = [
    { messageId: 0, length: 9 },
    { messageId: 30, length: 28 },
    { messageId: 124, length: 57 },
  ] as const;
  const kind = kinds[i % kinds.length]!;
  const payload = new Uint8Array(kind.length);
  for (let j = 0; j < payload.length - (i % 4); j++) {
    payload[j] = ((i + j) % 11) + 1;
  }
  return { messageId: kind.messageId, payload };
}

const codec = new MavlinkFrameCodec();

export function testFrame(i: number, version: MavlinkVersion = 2): Uint8Array {
  return codec.serializeFrame(testHeader(i % 256), testMessage(i), version);
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of iterable) {
    result.push(item);
  }
  return result;
}

export function toView(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
