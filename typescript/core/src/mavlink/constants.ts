import type { MavlinkVersion } from "../types";

export const MAVLINK_V1_MAGIC = 0xfe;
export const MAVLINK_V2_MAGIC = 0xfd;

/** magic(1) + len(1) + seq(1) + sysid(1) + compid(1) + msgid(1) */
export const MAVLINK_V1_HEADER_SIZE = 6;
/** magic(1) + len(1) + incompat(1) + compat(1) + seq(1) + sysid(1) + compid(1) + msgid(3) */
export const MAVLINK_V2_HEADER_SIZE = 10;
export const MAVLINK_CHECKSUM_SIZE = 2;
export const MAVLINK_SIGNATURE_SIZE = 13;
export const MAVLINK_MAX_PAYLOAD_SIZE = 255;

/** The only incompatibility flag defined by the protocol: the frame carries a signature. */
export const MAVLINK_IFLAG_SIGNED = 0x01;

export function mavlinkMagic(version: MavlinkVersion): number {
  return version === 2 ? MAVLINK_V2_MAGIC : MAVLINK_V1_MAGIC;
}

export function mavlinkHeaderSize(version: MavlinkVersion): number {
  return version === 2 ? MAVLINK_V2_HEADER_SIZE : MAVLINK_V1_HEADER_SIZE;
}
