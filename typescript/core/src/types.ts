import type { DefinitionPayloadType } from "./constants";

/** Wire version of the embedded MAVLink protocol. */
export type MavlinkVersion = 1 | 2;

/**
 * How a reader reacts when a record boundary cannot be trusted.
 *
 * - `lenient`: skip forward to the next valid MAVLink frame (the historical behavior).
 * - `strict`: report a corrupt record instead of skipping any bytes.
 */
export type ResyncPolicy = "lenient" | "strict";

export type FormatFlags = {
  /** Every record is a MAVLink frame, with no entry type tag and no length prefix. */
  mavlinkOnly: boolean;
  /** Records carry no timestamp field. */
  notTimestamped: boolean;
};

export type MavlinkMessageDefinition = {
  versionMajor: number;
  versionMinor: number;
  dialect: string;
  payloadType: DefinitionPayloadType;
  /** Number of definition payload bytes following the fixed header. */
  size: number;
  payload: Uint8Array | undefined;
};

export type FileHeader = {
  /** 16 raw bytes; use `stringify` from the uuid package for the canonical text form. */
  uuid: Uint8Array;
  /** Microseconds since the Unix epoch at file creation. */
  timestampUs: bigint;
  srcApplicationId: string;
  formatVersion: number;
  formatFlags: FormatFlags;
  messageDefinition: MavlinkMessageDefinition;
};

export type MavlinkHeader = {
  sequence: number;
  systemId: number;
  componentId: number;
  /** Always 0 for MAVLink 1 frames. */
  incompatFlags: number;
  /** Always 0 for MAVLink 1 frames. */
  compatFlags: number;
  /** 13 byte signature, present on MAVLink 2 frames with the signed flag set. */
  signature?: Uint8Array;
};

export type MavlinkMessage = {
  messageId: number;
  payload: Uint8Array;
};

export type RawEntry = {
  /** Absent when the file is not timestamped, or when no timestamp could be recovered. */
  timestamp: bigint | undefined;
  raw: Uint8Array;
};

export type TextEntry = {
  timestamp: bigint | undefined;
  text: string;
};

export type MavlinkEntry = {
  timestamp: bigint | undefined;
  header: MavlinkHeader;
  message: MavlinkMessage;
};

export type LogEntries = {
  Raw: RawEntry;
  Text: TextEntry;
  Mavlink: MavlinkEntry;
};

export type TypedLogEntries = {
  [E in keyof LogEntries]: LogEntries[E] & { type: E };
};

type Values<T> = T[keyof T];
export type TypedLogEntry = Values<TypedLogEntries>;

/**
 * IReadable describes a random-access reader interface.
 */
export interface IReadable {
  size(): Promise<bigint>;
  read(offset: bigint, size: bigint): Promise<Uint8Array>;
}

/** Wall clock returning microseconds since the Unix epoch. */
export type MicrosecondClock = () => bigint;
